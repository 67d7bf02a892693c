/**
 * User-originated events understood by the cascade controller.
 */

import type { RenderStyle } from '../render/styles';

export type BrowserEvent =
  | { type: 'EntrySelected'; entryId: string }
  | { type: 'ItemSelected'; itemId: string }
  | { type: 'StyleChanged'; style: RenderStyle }
  | { type: 'ViewModeChanged'; singleView: boolean }
  | { type: 'RefreshRequested' };

export type BrowserEventType = BrowserEvent['type'];

export const entrySelected = (entryId: string): BrowserEvent => ({ type: 'EntrySelected', entryId });
export const itemSelected = (itemId: string): BrowserEvent => ({ type: 'ItemSelected', itemId });
export const styleChanged = (style: RenderStyle): BrowserEvent => ({ type: 'StyleChanged', style });
export const viewModeChanged = (singleView: boolean): BrowserEvent => ({ type: 'ViewModeChanged', singleView });
export const refreshRequested = (): BrowserEvent => ({ type: 'RefreshRequested' });
