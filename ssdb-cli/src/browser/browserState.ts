/**
 * UI-only state of the Ink browser (focus, overlays, entry filter, toasts)
 * and the key-to-style helpers. Selection state lives in the session store.
 */

import { RENDER_STYLES } from 'ssdb-shared';
import type { DisulfideDatabase, RenderStyle } from 'ssdb-shared';

// ── Types ──

export type FocusTarget = 'entries' | 'items';
export type OverlayKind = null | 'help' | 'filter';
export type ToastSeverity = 'error' | 'warning' | 'info';

export interface ToastEntry {
  id: number;
  message: string;
  severity: ToastSeverity;
}

export interface BrowserUIState {
  focus: FocusTarget;
  overlay: OverlayKind;
  filter: string;
  toasts: ToastEntry[];
}

export type Action =
  | { type: 'SET_FOCUS'; target: FocusTarget }
  | { type: 'TOGGLE_FOCUS' }
  | { type: 'SET_OVERLAY'; overlay: OverlayKind }
  | { type: 'SET_FILTER'; value: string }
  | { type: 'ADD_TOAST'; toast: ToastEntry }
  | { type: 'REMOVE_TOAST'; id: number };

export const TOAST_DURATIONS: Record<ToastSeverity, number> = { error: 4000, warning: 3000, info: 2000 };

/** Pending toast timers, cleared together when the browser unmounts. */
export interface ToastTimers {
  schedule(fn: () => void, ms: number): void;
  clearAll(): void;
  readonly size: number;
}

export function createToastTimers(): ToastTimers {
  const pending = new Set<ReturnType<typeof setTimeout>>();
  return {
    schedule(fn, ms) {
      const timer = setTimeout(() => {
        pending.delete(timer);
        fn();
      }, ms);
      pending.add(timer);
    },
    clearAll() {
      for (const timer of pending) clearTimeout(timer);
      pending.clear();
    },
    get size() {
      return pending.size;
    },
  };
}

export const initialUIState: BrowserUIState = {
  focus: 'entries',
  overlay: null,
  filter: '',
  toasts: [],
};

export function reducer(state: BrowserUIState, action: Action): BrowserUIState {
  switch (action.type) {
    case 'SET_FOCUS':
      return { ...state, focus: action.target };

    case 'TOGGLE_FOCUS':
      return { ...state, focus: state.focus === 'entries' ? 'items' : 'entries' };

    case 'SET_OVERLAY':
      // The filter edits the entry list, so it pulls focus there
      return action.overlay === 'filter'
        ? { ...state, overlay: action.overlay, focus: 'entries' }
        : { ...state, overlay: action.overlay };

    case 'SET_FILTER':
      return { ...state, filter: action.value };

    case 'ADD_TOAST':
      return { ...state, toasts: [...state.toasts, action.toast] };

    case 'REMOVE_TOAST':
      return { ...state, toasts: state.toasts.filter(t => t.id !== action.id) };

    default:
      return state;
  }
}

// ── Helpers ──

/** Entry ids shown in the side list for the current filter. */
export function visibleEntries(db: Pick<DisulfideDatabase, 'listEntryIds' | 'searchEntryIds'>, filter: string): readonly string[] {
  return filter ? db.searchEntryIds(filter, db.listEntryIds().length) : db.listEntryIds();
}

/**
 * Index after moving `delta` rows from `current`, clamped to the list.
 * From no selection (-1), down starts at the top and up at the bottom.
 * Returns -1 for an empty list.
 */
export function moveIndex(current: number, delta: number, length: number): number {
  if (length === 0) return -1;
  const from = current >= 0 ? current : delta > 0 ? -1 : length;
  return Math.max(0, Math.min(from + delta, length - 1));
}

/** Style bound to a number key: `1` is the first style. */
export function styleForKey(input: string): RenderStyle | null {
  if (!/^[1-9]$/.test(input)) return null;
  return RENDER_STYLES[Number(input) - 1] ?? null;
}

export function nextStyle(style: RenderStyle): RenderStyle {
  const idx = RENDER_STYLES.indexOf(style);
  return RENDER_STYLES[(idx + 1) % RENDER_STYLES.length];
}
