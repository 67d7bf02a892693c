/**
 * One render pass: state → request → renderer → surface → slot swap.
 *
 * Failures abort the pass only. The previous surface stays in the slot and
 * the error text goes to the output region.
 */

import type { Disulfide } from '../types/disulfide';
import type { UIState } from '../state/SelectionStateStore';
import { SsdbError, isSsdbError, toMessage } from '../errors';
import * as presenter from '../formatters/infoPresenter';
import type { RenderSlot } from './RenderSlot';
import type {
  RenderRequest,
  RenderSurface,
  Renderer,
  SurfaceFactory,
  SurfaceLayout,
  TextRegions,
} from './types';

export interface ItemSource {
  getItem(itemId: string): Disulfide;
}

export interface RenderInvocationDeps {
  items: ItemSource;
  renderer: Renderer;
  surfaces: SurfaceFactory;
  slot: RenderSlot;
  regions: TextRegions;
  layout: Readonly<SurfaceLayout>;
}

export type RenderOutcome =
  | { status: 'rendered'; request: RenderRequest; surface: RenderSurface }
  | { status: 'skipped'; reason: 'no-selection' }
  | { status: 'failed'; request: RenderRequest | null; error: SsdbError };

/** Request for the current state, or null when nothing is selected. */
export function buildRenderRequest(state: Readonly<UIState>): RenderRequest | null {
  if (state.selectedItem === null) return null;
  return {
    itemId: state.selectedItem,
    style: state.appliedStyle,
    singleView: state.singleView,
    lightMode: state.theme !== 'dark',
    shadows: false,
  };
}

export class RenderInvocation {
  private _lastRequest: RenderRequest | null = null;

  constructor(private readonly deps: RenderInvocationDeps) {}

  /** The request of the most recent successful render. */
  get lastRequest(): RenderRequest | null {
    return this._lastRequest;
  }

  async invoke(state: Readonly<UIState>): Promise<RenderOutcome> {
    const request = buildRenderRequest(state);
    if (!request) return { status: 'skipped', reason: 'no-selection' };

    let item: Disulfide;
    try {
      item = this.deps.items.getItem(request.itemId);
    } catch (err) {
      const error = isSsdbError(err)
        ? err
        : new SsdbError('ItemNotFound', `Cannot find disulfide ${request.itemId}`, { itemId: request.itemId }, { cause: err });
      return this.fail(request, error);
    }

    let surface: RenderSurface;
    try {
      const handle = await this.deps.renderer.render(
        item, request.style, request.singleView, request.shadows, request.lightMode,
      );
      surface = this.deps.surfaces.create(handle, this.deps.layout);
    } catch (err) {
      const error = isSsdbError(err)
        ? err
        : new SsdbError('RenderFailed', `Rendering ${request.itemId} failed: ${toMessage(err)}`, { itemId: request.itemId }, { cause: err });
      return this.fail(request, error);
    }

    this.deps.slot.replace(surface);
    this._lastRequest = request;
    this.deps.regions.title.set(presenter.title(item));
    this.deps.regions.info.set(presenter.info(item));
    this.deps.regions.output.set(presenter.summary(item));
    return { status: 'rendered', request, surface };
  }

  private fail(request: RenderRequest, error: SsdbError): RenderOutcome {
    this.deps.regions.output.set(`Error: ${error.message}`);
    return { status: 'failed', request, error };
  }
}
