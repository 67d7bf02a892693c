import { describe, it, expect, vi } from 'vitest';
import { RenderInvocation, buildRenderRequest } from './RenderInvocation';
import { RenderSlot, createSurfaceFactory } from './RenderSlot';
import { RenderStyle } from './styles';
import { createTextRegions } from './textRegions';
import { DEFAULT_LAYOUT } from './types';
import type { RenderHandle, Renderer } from './types';
import type { Disulfide } from '../types/disulfide';
import type { UIState } from '../state/SelectionStateStore';
import { makeDatabase } from '../testing/fixtures';

function makeState(overrides: Partial<UIState> = {}): UIState {
  return {
    selectedEntry: '2q7q',
    itemIds: ['2q7q_75D_140D', '2q7q_81D_113D'],
    selectedItem: '2q7q_75D_140D',
    style: RenderStyle.SplitBonds,
    appliedStyle: RenderStyle.SplitBonds,
    singleView: true,
    theme: 'default',
    ...overrides,
  };
}

function fakeHandle(item: Disulfide, style: RenderStyle, light: boolean): RenderHandle {
  return { itemId: item.id, lines: [[{ text: `${item.id}:${style}` }]], lightMode: light };
}

function setup(renderer?: Renderer) {
  const render = vi.fn((item: Disulfide, style: RenderStyle, _single: boolean, _shadows: boolean, light: boolean) =>
    fakeHandle(item, style, light));
  const slot = new RenderSlot();
  const regions = createTextRegions();
  const invocation = new RenderInvocation({
    items: makeDatabase(),
    renderer: renderer ?? { render },
    surfaces: createSurfaceFactory(),
    slot,
    regions,
    layout: DEFAULT_LAYOUT,
  });
  return { render, slot, regions, invocation };
}

describe('buildRenderRequest', () => {
  it('uses the applied style and the theme', () => {
    const state = makeState({ style: RenderStyle.BallAndStick, appliedStyle: RenderStyle.CPK, singleView: false, theme: 'dark' });
    expect(buildRenderRequest(state)).toEqual({
      itemId: '2q7q_75D_140D',
      style: RenderStyle.CPK,
      singleView: false,
      lightMode: false,
      shadows: false,
    });
  });

  it('returns null without a selection', () => {
    expect(buildRenderRequest(makeState({ selectedItem: null }))).toBeNull();
  });
});

describe('RenderInvocation', () => {
  it('renders, swaps the surface and fills the text regions', async () => {
    const { render, slot, regions, invocation } = setup();
    const outcome = await invocation.invoke(makeState());

    expect(outcome.status).toBe('rendered');
    expect(render).toHaveBeenCalledTimes(1);
    expect(render.mock.calls[0].slice(1)).toEqual([RenderStyle.SplitBonds, true, false, true]);
    expect(slot.current()?.handle.itemId).toBe('2q7q_75D_140D');
    expect(regions.title.text).toBe('2q7q_75D_140D');
    expect(regions.info.text.split('\n')[1]).toBe('Resolution: 1.80 Å');
    expect(regions.output.text).toBe(
      'Cα-Cα: 5.60 Å Cβ-Cβ: 3.81 Å Torsion Length: 105.22° Resolution: 1.80 Å Energy: 2.31 kcal/mol',
    );
    expect(invocation.lastRequest).toEqual({
      itemId: '2q7q_75D_140D',
      style: RenderStyle.SplitBonds,
      singleView: true,
      lightMode: true,
      shadows: false,
    });
  });

  it('awaits asynchronous renderers', async () => {
    const { slot, invocation } = setup({
      render: async (item, style, _single, _shadows, light) => fakeHandle(item, style, light),
    });
    await invocation.invoke(makeState());
    expect(slot.current()?.handle.lines).toEqual([[{ text: '2q7q_75D_140D:SplitBonds' }]]);
  });

  it('skips when nothing is selected', async () => {
    const { render, invocation } = setup();
    expect(await invocation.invoke(makeState({ selectedItem: null }))).toEqual({ status: 'skipped', reason: 'no-selection' });
    expect(render).not.toHaveBeenCalled();
  });

  it('fails with ItemNotFound and keeps the previous surface', async () => {
    const { render, slot, regions, invocation } = setup();
    await invocation.invoke(makeState());
    const previous = slot.current();

    const outcome = await invocation.invoke(makeState({ itemIds: ['2q7q_1A_2A'], selectedItem: '2q7q_1A_2A' }));
    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') expect(outcome.error.kind).toBe('ItemNotFound');
    expect(render).toHaveBeenCalledTimes(1);
    expect(slot.current()).toBe(previous);
    expect(regions.output.text).toBe('Error: Cannot find disulfide 2q7q_1A_2A');
    expect(invocation.lastRequest?.itemId).toBe('2q7q_75D_140D');
  });

  it('wraps renderer errors as RenderFailed', async () => {
    const { slot, regions, invocation } = setup({
      render: () => {
        throw new Error('boom');
      },
    });
    const outcome = await invocation.invoke(makeState());
    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.error.kind).toBe('RenderFailed');
      expect(outcome.error.message).toBe('Rendering 2q7q_75D_140D failed: boom');
    }
    expect(slot.current()).toBeNull();
    expect(regions.output.text).toBe('Error: Rendering 2q7q_75D_140D failed: boom');
    expect(invocation.lastRequest).toBeNull();
  });

  it('produces equal surfaces for repeated renders of the same state', async () => {
    const { slot, invocation } = setup();
    await invocation.invoke(makeState());
    const first = slot.current();
    await invocation.invoke(makeState());
    const second = slot.current();
    expect(second?.handle).toEqual(first?.handle);
    expect(second?.serial).toBe(2);
  });
});
