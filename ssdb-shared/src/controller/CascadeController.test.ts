import { describe, it, expect, vi } from 'vitest';
import { createBrowserSession } from './session';
import type { BrowserSession } from './session';
import { RenderStyle } from '../render/styles';
import type { RenderHandle, Renderer } from '../render/types';
import type { DisulfideDatabase } from '../database/DisulfideDatabase';
import type { Disulfide } from '../types/disulfide';
import type { SessionContext } from '../state/themeResolver';
import { isSsdbError } from '../errors';
import { makeDatabase, withEmptyEntry } from '../testing/fixtures';

function fakeRenderer() {
  return {
    render: vi.fn((item: Disulfide, style: RenderStyle, single: boolean, _shadows: boolean, light: boolean): RenderHandle => ({
      itemId: item.id,
      lines: [[{ text: `${item.id} ${style} ${single ? 'single' : 'multi'}` }]],
      lightMode: light,
    })),
  };
}

/** Renders at once until `hold()`; then every render waits for `release()`. */
function gatedRenderer() {
  const inner = fakeRenderer();
  let gate: Promise<void> = Promise.resolve();
  let open: () => void = () => {};
  const renderer: Renderer = {
    render: async (item, style, single, shadows, light) => {
      await gate;
      return inner.render(item, style, single, shadows, light);
    },
  };
  return {
    inner,
    renderer,
    hold() {
      gate = new Promise<void>(r => {
        open = r;
      });
    },
    release() {
      open();
    },
  };
}

function setup(opts: { database?: DisulfideDatabase; context?: SessionContext; renderer?: Renderer } = {}) {
  const renderer = fakeRenderer();
  const session = createBrowserSession({
    database: opts.database ?? makeDatabase(),
    context: opts.context ?? {},
    renderer: opts.renderer ?? renderer,
  });
  return { session, renderer };
}

async function started(opts: Parameters<typeof setup>[0] = {}) {
  const env = setup(opts);
  await env.session.controller.dispatch({ type: 'EntrySelected', entryId: '2q7q' });
  return env;
}

function lastStyle(session: BrowserSession): RenderStyle | undefined {
  return session.render.lastRequest?.style;
}

describe('CascadeController', () => {
  describe('entry selection', () => {
    it('selects and renders the first item of the entry', async () => {
      const { session, renderer } = setup();
      const result = await session.controller.dispatch({ type: 'EntrySelected', entryId: '2q7q' });

      expect(result.errors).toEqual([]);
      expect(session.store.snapshot()).toMatchObject({
        selectedEntry: '2q7q',
        itemIds: ['2q7q_75D_140D', '2q7q_81D_113D', '2q7q_88D_171D'],
        selectedItem: '2q7q_75D_140D',
      });
      expect(session.render.lastRequest).toEqual({
        itemId: '2q7q_75D_140D',
        style: RenderStyle.SplitBonds,
        singleView: true,
        lightMode: true,
        shadows: false,
      });
      expect(renderer.render).toHaveBeenCalledTimes(1);
      expect(session.slot.current()?.handle.itemId).toBe('2q7q_75D_140D');
      expect(session.regions.title.text).toBe('2q7q_75D_140D');
    });

    it('moves the selection into the new entry', async () => {
      const { session } = await started();
      await session.controller.dispatch({ type: 'EntrySelected', entryId: '1crn' });
      const state = session.store.snapshot();
      expect(state.selectedItem).toBe('1crn_3A_40A');
      expect(state.itemIds).toContain(state.selectedItem);
      expect(session.controls.itemSelectorEnabled).toBe(true);
    });

    it('leaves state and surface alone for an unknown entry', async () => {
      const { session, renderer } = await started();
      const before = session.store.snapshot();
      const surface = session.slot.current();

      const result = await session.controller.dispatch({ type: 'EntrySelected', entryId: '0xyz' });

      expect(result.errors).toHaveLength(1);
      expect(isSsdbError(result.errors[0], 'UnknownEntry')).toBe(true);
      expect(session.store.snapshot()).toEqual(before);
      expect(session.slot.current()).toBe(surface);
      expect(renderer.render).toHaveBeenCalledTimes(1);
      expect(session.regions.output.text).toBe('Error: Unknown entry: 0xyz');
    });

    it('disables the item selector for an entry without items', async () => {
      const { session, renderer } = await started({ database: withEmptyEntry(makeDatabase(), '3abc') });
      const surface = session.slot.current();

      const result = await session.controller.dispatch({ type: 'EntrySelected', entryId: '3abc' });

      expect(isSsdbError(result.errors[0], 'EmptySelection')).toBe(true);
      expect(session.controls.itemSelectorEnabled).toBe(false);
      expect(session.store.snapshot()).toMatchObject({ selectedEntry: '3abc', itemIds: [], selectedItem: null });
      expect(renderer.render).toHaveBeenCalledTimes(1);
      expect(session.slot.current()).toBe(surface);
      expect(session.regions.output.text).toBe('Error: Entry 3abc has no disulfides');

      await session.controller.dispatch({ type: 'EntrySelected', entryId: '1crn' });
      expect(session.controls.itemSelectorEnabled).toBe(true);
    });
  });

  describe('item selection', () => {
    it('renders the chosen item', async () => {
      const { session } = await started();
      await session.controller.dispatch({ type: 'ItemSelected', itemId: '2q7q_88D_171D' });
      expect(session.render.lastRequest?.itemId).toBe('2q7q_88D_171D');
      expect(session.regions.title.text).toBe('2q7q_88D_171D');
    });

    it('rejects an item of another entry', async () => {
      const { session, renderer } = await started();
      const result = await session.controller.dispatch({ type: 'ItemSelected', itemId: '1crn_3A_40A' });
      expect(isSsdbError(result.errors[0], 'InvalidItem')).toBe(true);
      expect(session.store.snapshot().selectedItem).toBe('2q7q_75D_140D');
      expect(renderer.render).toHaveBeenCalledTimes(1);
    });
  });

  describe('style and view mode', () => {
    it('applies a style in single view', async () => {
      const { session } = await started();
      await session.controller.dispatch({ type: 'StyleChanged', style: RenderStyle.CPK });
      expect(lastStyle(session)).toBe(RenderStyle.CPK);
    });

    it('ignores style changes while in multi view', async () => {
      const { session } = await started();
      await session.controller.dispatch({ type: 'StyleChanged', style: RenderStyle.CPK });
      await session.controller.dispatch({ type: 'ViewModeChanged', singleView: false });

      expect(session.controls.styleEnabled).toBe(false);
      expect(session.render.lastRequest).toMatchObject({ style: RenderStyle.CPK, singleView: false });

      await session.controller.dispatch({ type: 'StyleChanged', style: RenderStyle.BallAndStick });
      expect(lastStyle(session)).toBe(RenderStyle.CPK);
      expect(session.store.snapshot().style).toBe(RenderStyle.BallAndStick);

      await session.controller.dispatch({ type: 'ViewModeChanged', singleView: true });
      expect(session.controls.styleEnabled).toBe(true);
      expect(session.render.lastRequest).toMatchObject({ style: RenderStyle.BallAndStick, singleView: true });
    });

    it('notifies control listeners on change only', async () => {
      const { session } = await started();
      const listener = vi.fn();
      session.controller.onControlsChange(listener);
      await session.controller.dispatch({ type: 'ViewModeChanged', singleView: true });
      expect(listener).not.toHaveBeenCalled();
      await session.controller.dispatch({ type: 'ViewModeChanged', singleView: false });
      expect(listener).toHaveBeenCalledWith({ styleEnabled: false, itemSelectorEnabled: true });
    });
  });

  describe('refresh', () => {
    it('produces the same request and surface each time', async () => {
      const { session, renderer } = await started();
      await session.controller.dispatch({ type: 'RefreshRequested' });
      const first = session.slot.current();
      await session.controller.dispatch({ type: 'RefreshRequested' });
      const second = session.slot.current();

      expect(renderer.render.mock.calls[1]).toEqual(renderer.render.mock.calls[2]);
      expect(second?.handle).toEqual(first?.handle);
      expect(second).not.toBe(first);
    });

    it('does nothing without a selection', async () => {
      const { session, renderer } = setup();
      const result = await session.controller.dispatch({ type: 'RefreshRequested' });
      expect(result.errors).toEqual([]);
      expect(renderer.render).not.toHaveBeenCalled();
    });
  });

  describe('theme', () => {
    it('renders in light mode by default', async () => {
      const { session } = await started({ context: {} });
      expect(session.theme).toBe('default');
      expect(session.render.lastRequest?.lightMode).toBe(true);
    });

    it('renders in dark mode for the dark marker', async () => {
      const { session } = await started({ context: { theme: 'dark' } });
      expect(session.theme).toBe('dark');
      expect(session.render.lastRequest?.lightMode).toBe(false);
    });

    it('treats other theme values as default', async () => {
      const { session } = await started({ context: { theme: 'Dark' } });
      expect(session.render.lastRequest?.lightMode).toBe(true);
    });
  });

  describe('failures', () => {
    it('keeps the previous surface when the renderer fails', async () => {
      let fail = false;
      const inner = fakeRenderer();
      const renderer: Renderer = {
        render: (item, style, single, shadows, light) => {
          if (fail) throw new Error('no display');
          return inner.render(item, style, single, shadows, light);
        },
      };
      const { session } = await started({ renderer });
      const surface = session.slot.current();
      const errors: unknown[] = [];
      session.controller.onError(err => errors.push(err));

      fail = true;
      const result = await session.controller.dispatch({ type: 'ItemSelected', itemId: '2q7q_81D_113D' });

      expect(isSsdbError(result.errors[0], 'RenderFailed')).toBe(true);
      expect(errors).toEqual(result.errors);
      expect(session.slot.current()).toBe(surface);
      expect(session.store.snapshot().selectedItem).toBe('2q7q_81D_113D');
      expect(session.regions.output.text).toBe('Error: Rendering 2q7q_81D_113D failed: no display');
    });

    it('reports render outcomes to listeners', async () => {
      const { session } = setup();
      const outcomes: string[] = [];
      session.controller.onRenderOutcome(o => outcomes.push(o.status));
      await session.controller.dispatch({ type: 'EntrySelected', entryId: '2q7q' });
      await session.controller.dispatch({ type: 'RefreshRequested' });
      expect(outcomes).toEqual(['rendered', 'rendered']);
    });
  });

  describe('ordering', () => {
    it('handles events queued during a render after it finishes', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>(r => {
        release = r;
      });
      const inner = fakeRenderer();
      const renderer: Renderer = {
        render: async (item, style, single, shadows, light) => {
          await gate;
          return inner.render(item, style, single, shadows, light);
        },
      };
      const { session } = setup({ renderer });

      const entry = session.controller.dispatch({ type: 'EntrySelected', entryId: '2q7q' });
      const style = session.controller.dispatch({ type: 'StyleChanged', style: RenderStyle.CPK });
      release();
      await Promise.all([entry, style]);

      expect(inner.render.mock.calls.map(c => [c[0].id, c[1]])).toEqual([
        ['2q7q_75D_140D', RenderStyle.SplitBonds],
        ['2q7q_75D_140D', RenderStyle.CPK],
      ]);
    });

    it('finishes an entry cascade before the next waiting event', async () => {
      const gated = gatedRenderer();
      const { session } = await started({ renderer: gated.renderer });

      gated.hold();
      const refresh = session.controller.dispatch({ type: 'RefreshRequested' });
      const entry = session.controller.dispatch({ type: 'EntrySelected', entryId: '1crn' });
      const style = session.controller.dispatch({ type: 'StyleChanged', style: RenderStyle.CPK });
      gated.release();
      const results = await Promise.all([refresh, entry, style]);

      expect(results.flatMap(r => r.errors)).toEqual([]);
      expect(gated.inner.render.mock.calls.slice(1).map(c => [c[0].id, c[1]])).toEqual([
        ['2q7q_75D_140D', RenderStyle.SplitBonds],
        ['1crn_3A_40A', RenderStyle.SplitBonds],
        ['1crn_3A_40A', RenderStyle.CPK],
      ]);
    });

    it('switches entries back to back without an item error', async () => {
      const gated = gatedRenderer();
      const { session } = await started({ renderer: gated.renderer });
      const onError = vi.fn();
      session.controller.onError(onError);

      gated.hold();
      const refresh = session.controller.dispatch({ type: 'RefreshRequested' });
      const first = session.controller.dispatch({ type: 'EntrySelected', entryId: '1crn' });
      const second = session.controller.dispatch({ type: 'EntrySelected', entryId: '2q7q' });
      gated.release();
      const results = await Promise.all([refresh, first, second]);

      expect(results.flatMap(r => r.errors)).toEqual([]);
      expect(onError).not.toHaveBeenCalled();
      expect(session.store.snapshot()).toMatchObject({ selectedEntry: '2q7q', selectedItem: '2q7q_75D_140D' });
      expect(session.regions.title.text).toBe('2q7q_75D_140D');
    });

    it('runs extra handlers after the render pass', async () => {
      const { session } = setup();
      const seen: Array<string | undefined> = [];
      session.controller.on('ItemSelected', () => {
        seen.push(session.slot.current()?.handle.itemId);
      });
      await session.controller.dispatch({ type: 'EntrySelected', entryId: '1crn' });
      expect(seen).toEqual(['1crn_3A_40A']);
    });
  });
});

describe('createBrowserSession', () => {
  it('starts at the first entry by default', async () => {
    const { session } = setup();
    await session.start(null);
    expect(session.store.snapshot().selectedEntry).toBe('1crn');
  });

  it('starts at a given entry and item', async () => {
    const { session } = setup();
    const results = await session.start('2q7q', '2q7q_88D_171D');
    expect(results).toHaveLength(2);
    expect(session.render.lastRequest?.itemId).toBe('2q7q_88D_171D');
  });

  it('skips the item step when it is already selected', async () => {
    const { session } = setup();
    const results = await session.start('2q7q', '2q7q_75D_140D');
    expect(results).toHaveLength(1);
  });
});
