/**
 * Wires browser events to state mutations and render passes.
 *
 *   EntrySelected   → setEntry → item ids → setItemIds → ItemSelected(default)
 *   ItemSelected    → setSelectedItem → render
 *   StyleChanged    → setStyle → render
 *   ViewModeChanged → setSingleView → style control on/off → render
 *   RefreshRequested → render
 *
 * Every failure leaves the previous state and surface in place; its text is
 * written to the output region and reported to `onError` listeners.
 */

import type { DisulfideDatabase } from '../database/DisulfideDatabase';
import type { SelectionStateStore } from '../state/SelectionStateStore';
import type { RenderInvocation, RenderOutcome } from '../render/RenderInvocation';
import type { TextRegions } from '../render/types';
import { SsdbError, toMessage } from '../errors';
import { EventBus } from './EventBus';
import type { DispatchResult, Handler, HandlerContext } from './EventBus';
import type { BrowserEvent, BrowserEventType } from './events';

export interface ControlsState {
  /** Style radio is only live in single view. */
  styleEnabled: boolean;
  /** False while the selected entry has no items. */
  itemSelectorEnabled: boolean;
}

export interface CascadeControllerDeps {
  database: Pick<DisulfideDatabase, 'listItemIdsFor'>;
  store: SelectionStateStore;
  render: RenderInvocation;
  regions: TextRegions;
}

type Ctx = HandlerContext<BrowserEvent>;

export class CascadeController {
  private readonly bus = new EventBus<BrowserEvent>();
  /** Errors whose text is already in the output region. */
  private readonly surfaced = new WeakSet<object>();
  private _controls: ControlsState;
  private _controlListeners: Array<(controls: ControlsState) => void> = [];
  private _outcomeListeners: Array<(outcome: RenderOutcome) => void> = [];

  constructor(private readonly deps: CascadeControllerDeps) {
    this._controls = {
      styleEnabled: deps.store.snapshot().singleView,
      itemSelectorEnabled: true,
    };

    this.bus.on('EntrySelected', (e, ctx) => this.guard(() => this.handleEntrySelected(e.entryId, ctx)));
    this.bus.on('ItemSelected', (e) => this.guard(() => this.handleItemSelected(e.itemId)));
    this.bus.on('StyleChanged', (e) => this.guard(() => this.handleStyleChanged(e)));
    this.bus.on('ViewModeChanged', (e) => this.guard(() => this.handleViewModeChanged(e.singleView)));
    this.bus.on('RefreshRequested', () => this.guard(() => this.renderCurrent()));
  }

  get controls(): Readonly<ControlsState> {
    return this._controls;
  }

  /** Queue an event; settles once its cascade (including follow-ups) has run. */
  dispatch(event: BrowserEvent): Promise<DispatchResult<BrowserEvent>> {
    return this.bus.dispatch(event);
  }

  whenIdle(): Promise<void> {
    return this.bus.whenIdle();
  }

  /** Attach an extra handler; it runs after the controller's own. */
  on<T extends BrowserEventType>(type: T, handler: Handler<BrowserEvent, T>): () => void {
    return this.bus.on(type, handler);
  }

  onError(listener: (error: unknown, event: BrowserEvent) => void): () => void {
    return this.bus.onError(listener);
  }

  onControlsChange(listener: (controls: ControlsState) => void): () => void {
    this._controlListeners.push(listener);
    return () => {
      this._controlListeners = this._controlListeners.filter(l => l !== listener);
    };
  }

  onRenderOutcome(listener: (outcome: RenderOutcome) => void): () => void {
    this._outcomeListeners.push(listener);
    return () => {
      this._outcomeListeners = this._outcomeListeners.filter(l => l !== listener);
    };
  }

  // ── Handlers ──

  private handleEntrySelected(entryId: string, ctx: Ctx): void {
    const { store, database } = this.deps;
    const change = store.transaction(() => {
      store.setEntry(entryId);
      return store.setItemIds(database.listItemIdsFor(entryId));
    });

    if (change.empty || change.selectedItem === null) {
      this.setControls({ itemSelectorEnabled: false });
      throw new SsdbError('EmptySelection', `Entry ${entryId} has no disulfides`, { entryId });
    }
    this.setControls({ itemSelectorEnabled: true });
    ctx.emit({ type: 'ItemSelected', itemId: change.selectedItem });
  }

  private async handleItemSelected(itemId: string): Promise<void> {
    this.deps.store.setSelectedItem(itemId);
    await this.renderCurrent();
  }

  private async handleStyleChanged(event: Extract<BrowserEvent, { type: 'StyleChanged' }>): Promise<void> {
    this.deps.store.setStyle(event.style);
    await this.renderCurrent();
  }

  private async handleViewModeChanged(singleView: boolean): Promise<void> {
    this.deps.store.setSingleView(singleView);
    this.setControls({ styleEnabled: singleView });
    await this.renderCurrent();
  }

  // ── Helpers ──

  private async renderCurrent(): Promise<void> {
    const outcome = await this.deps.render.invoke(this.deps.store.snapshot());
    for (const listener of [...this._outcomeListeners]) listener(outcome);
    if (outcome.status === 'failed') {
      // RenderInvocation has already written it to the output region
      this.surfaced.add(outcome.error);
      throw outcome.error;
    }
  }

  /** Surface a state-step failure in the output region, then rethrow. */
  private async guard(step: () => void | Promise<void>): Promise<void> {
    try {
      await step();
    } catch (err) {
      if (!(typeof err === 'object' && err !== null && this.surfaced.has(err))) {
        this.deps.regions.output.set(`Error: ${toMessage(err)}`);
      }
      throw err;
    }
  }

  private setControls(changes: Partial<ControlsState>): void {
    const next = { ...this._controls, ...changes };
    if (next.styleEnabled === this._controls.styleEnabled && next.itemSelectorEnabled === this._controls.itemSelectorEnabled) {
      return;
    }
    this._controls = next;
    for (const listener of [...this._controlListeners]) listener(next);
  }
}
