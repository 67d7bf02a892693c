/**
 * Assembles one browser session: theme, state store, render slot, text
 * regions, render invocation and cascade controller around an injected
 * database and renderer.
 */

import type { DisulfideDatabase } from '../database/DisulfideDatabase';
import type { Theme } from '../types/disulfide';
import { SelectionStateStore } from '../state/SelectionStateStore';
import { createThemeCache } from '../state/themeResolver';
import type { SessionContext } from '../state/themeResolver';
import { RenderSlot, createSurfaceFactory } from '../render/RenderSlot';
import { RenderInvocation } from '../render/RenderInvocation';
import { TextRenderer } from '../render/TextRenderer';
import { createTextRegions } from '../render/textRegions';
import type { TextRegionSet } from '../render/textRegions';
import { DEFAULT_LAYOUT } from '../render/types';
import type { Renderer, SurfaceFactory, SurfaceLayout } from '../render/types';
import type { RenderStyle } from '../render/styles';
import { CascadeController } from './CascadeController';
import type { DispatchResult } from './EventBus';
import type { BrowserEvent } from './events';

export interface BrowserSessionOptions {
  database: DisulfideDatabase;
  context: SessionContext;
  renderer?: Renderer;
  surfaces?: SurfaceFactory;
  layout?: Readonly<SurfaceLayout>;
  style?: RenderStyle;
  singleView?: boolean;
}

export interface BrowserSession {
  theme: Theme;
  database: DisulfideDatabase;
  store: SelectionStateStore;
  slot: RenderSlot;
  regions: TextRegionSet;
  render: RenderInvocation;
  controller: CascadeController;
  /**
   * Select the starting entry (first entry when null) and, when given, the
   * starting item. Returns the results of the dispatched events.
   */
  start(entryId: string | null, itemId?: string | null): Promise<DispatchResult<BrowserEvent>[]>;
}

export function createBrowserSession(opts: BrowserSessionOptions): BrowserSession {
  const theme = createThemeCache()(opts.context);
  const store = new SelectionStateStore(opts.database, {
    theme,
    style: opts.style,
    singleView: opts.singleView,
  });
  const slot = new RenderSlot();
  const regions = createTextRegions();
  const render = new RenderInvocation({
    items: opts.database,
    renderer: opts.renderer ?? new TextRenderer(),
    surfaces: opts.surfaces ?? createSurfaceFactory(),
    slot,
    regions,
    layout: opts.layout ?? DEFAULT_LAYOUT,
  });
  const controller = new CascadeController({ database: opts.database, store, render, regions });

  return {
    theme,
    database: opts.database,
    store,
    slot,
    regions,
    render,
    controller,
    async start(entryId, itemId) {
      const first = entryId ?? opts.database.listEntryIds()[0];
      if (first === undefined) return [];
      const results = [await controller.dispatch({ type: 'EntrySelected', entryId: first })];
      if (itemId && itemId !== store.snapshot().selectedItem) {
        results.push(await controller.dispatch({ type: 'ItemSelected', itemId }));
      }
      return results;
    },
  };
}
