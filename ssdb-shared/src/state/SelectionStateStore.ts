/**
 * Session selection state: entry, its item ids, the selected item, style,
 * view mode and theme. Mutations validate against the injected database and
 * keep `selectedItem ∈ itemIds` at all times.
 */

import type { Theme } from '../types/disulfide';
import { RenderStyle, isRenderStyle } from '../render/styles';
import { SsdbError } from '../errors';

export interface UIState {
  selectedEntry: string | null;
  itemIds: readonly string[];
  selectedItem: string | null;
  style: RenderStyle;
  /** Style most recently applied to a single-view render. */
  appliedStyle: RenderStyle;
  singleView: boolean;
  theme: Theme;
}

export interface EntryLookup {
  hasEntry(entryId: string): boolean;
}

export interface SelectionStoreOptions {
  theme: Theme;
  style?: RenderStyle;
  singleView?: boolean;
}

export interface ItemListChange {
  selectedItem: string | null;
  /** True when the new list is empty and nothing can be rendered. */
  empty: boolean;
}

type Listener = (state: Readonly<UIState>) => void;

export class SelectionStateStore {
  private _state: UIState;
  private _listeners: Listener[] = [];
  private _batchDepth = 0;
  private _dirty = false;

  constructor(private readonly entries: EntryLookup, opts: SelectionStoreOptions) {
    const style = opts.style ?? RenderStyle.SplitBonds;
    this._state = {
      selectedEntry: null,
      itemIds: [],
      selectedItem: null,
      style,
      appliedStyle: style,
      singleView: opts.singleView ?? true,
      theme: opts.theme,
    };
  }

  /** Frozen copy of the current state. */
  snapshot(): Readonly<UIState> {
    return Object.freeze({ ...this._state });
  }

  get theme(): Theme {
    return this._state.theme;
  }

  /** Register a listener; returns an unsubscribe function. */
  subscribe(listener: Listener): () => void {
    this._listeners.push(listener);
    return () => {
      this._listeners = this._listeners.filter(l => l !== listener);
    };
  }

  setEntry(entryId: string): void {
    if (!this.entries.hasEntry(entryId)) {
      throw new SsdbError('UnknownEntry', `Unknown entry: ${entryId}`, { entryId });
    }
    this.patch({ selectedEntry: entryId });
  }

  setItemIds(list: readonly string[]): ItemListChange {
    const itemIds = Object.freeze([...list]);
    if (itemIds.length === 0) {
      this.patch({ itemIds, selectedItem: null });
      return { selectedItem: null, empty: true };
    }
    const current = this._state.selectedItem;
    const selectedItem = current !== null && itemIds.includes(current) ? current : itemIds[0];
    this.patch({ itemIds, selectedItem });
    return { selectedItem, empty: false };
  }

  setSelectedItem(itemId: string): void {
    if (!this._state.itemIds.includes(itemId)) {
      throw new SsdbError('InvalidItem', `${itemId} is not an item of ${this._state.selectedEntry ?? 'the current entry'}`, {
        itemId,
        entryId: this._state.selectedEntry,
      });
    }
    this.patch({ selectedItem: itemId });
  }

  setStyle(style: RenderStyle): void {
    if (!isRenderStyle(style)) {
      throw new SsdbError('InvalidStyle', `Unknown render style: ${String(style)}`, { style });
    }
    this.patch(this._state.singleView ? { style, appliedStyle: style } : { style });
  }

  setSingleView(singleView: boolean): void {
    this.patch(singleView ? { singleView, appliedStyle: this._state.style } : { singleView });
  }

  /**
   * Run several mutations as one. Listeners fire once at the end; if `fn`
   * throws, the state before the call is restored and the error rethrown.
   */
  transaction<T>(fn: () => T): T {
    const before = this._state;
    this._batchDepth++;
    try {
      return fn();
    } catch (err) {
      this._state = before;
      throw err;
    } finally {
      this._batchDepth--;
      if (this._batchDepth === 0 && this._dirty) {
        this._dirty = false;
        if (this._state !== before) this.notify();
      }
    }
  }

  private patch(changes: Partial<Omit<UIState, 'theme'>>): void {
    this._state = { ...this._state, ...changes };
    if (this._batchDepth > 0) {
      this._dirty = true;
      return;
    }
    this.notify();
  }

  private notify(): void {
    const snap = this.snapshot();
    for (const listener of [...this._listeners]) listener(snap);
  }
}
