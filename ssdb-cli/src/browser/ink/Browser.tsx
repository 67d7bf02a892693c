/**
 * Root Ink component of the disulfide browser.
 *
 * Keys become cascade events (EntrySelected, ItemSelected, StyleChanged,
 * ViewModeChanged, RefreshRequested); everything shown is read back from the
 * session, so the view never runs ahead of the store.
 */

import React, { useReducer, useCallback, useEffect, useRef } from 'react';
import { Box, useInput, useApp } from 'ink';
import {
  databaseBanner,
  entrySelected,
  isSsdbError,
  itemSelected,
  refreshRequested,
  styleChanged,
  toMessage,
  viewModeChanged,
} from 'ssdb-shared';
import type { BrowserEvent, BrowserSession, RenderStyle, SurfaceLayout } from 'ssdb-shared';
import { createToastTimers, initialUIState, moveIndex, nextStyle, reducer, styleForKey, visibleEntries, TOAST_DURATIONS } from '../browserState';
import type { ToastSeverity } from '../browserState';
import { useBrowserSession } from './useBrowserSession';
import { useTerminalSize } from './useTerminalSize';
import { useWindowedScroll } from './useWindowedScroll';
import { ControlBar } from './ControlBar';
import { SideList } from './SideList';
import { RenderPane } from './RenderPane';
import { InfoPane } from './InfoPane';
import { StatusBar } from './StatusBar';
import { HelpOverlay } from './HelpOverlay';
import { FilterBar } from './FilterBar';
import { ToastNotification } from './ToastNotification';
import { TooSmallOverlay } from './TooSmallOverlay';

// ── Constants ──

const ENTRY_LIST_WIDTH = 14;
const ITEM_LIST_WIDTH = 20;
const MIN_SCREEN_WIDTH = 60;
const MIN_SCREEN_HEIGHT = 15;

// ── Props ──

interface BrowserProps {
  session: BrowserSession;
  layout: Readonly<SurfaceLayout>;
  version: string;
}

// ── Component ──

export function Browser({ session, layout, version }: BrowserProps): React.ReactElement {
  const [ui, dispatch] = useReducer(reducer, initialUIState);
  const { exit } = useApp();
  const { columns, rows } = useTerminalSize();
  const view = useBrowserSession(session);
  const toastIdRef = useRef(0);
  const toastTimers = useRef(createToastTimers()).current;

  const { state, controls } = view;

  // ── Toast management ──
  const addToast = useCallback((message: string, severity: ToastSeverity) => {
    const id = ++toastIdRef.current;
    dispatch({ type: 'ADD_TOAST', toast: { id, message, severity } });
    toastTimers.schedule(() => {
      dispatch({ type: 'REMOVE_TOAST', id });
    }, TOAST_DURATIONS[severity]);
  }, [toastTimers]);

  useEffect(() => () => toastTimers.clearAll(), [toastTimers]);

  useEffect(() => session.controller.onError((err) => {
    addToast(toMessage(err), isSsdbError(err, 'EmptySelection') ? 'warning' : 'error');
  }), [session, addToast]);

  // Failures come back through onError, so the dispatch result is not needed here
  const post = useCallback((event: BrowserEvent) => {
    void session.controller.dispatch(event);
  }, [session]);

  // ── Derived values ──
  const entries = visibleEntries(session.database, ui.filter);
  const entryIndex = state.selectedEntry === null ? -1 : entries.indexOf(state.selectedEntry);
  const itemIndex = state.selectedItem === null ? -1 : state.itemIds.indexOf(state.selectedItem);

  const listViewportHeight = Math.max(1, rows - 5); // control bar + borders + label + status bar
  const entryOffset = useWindowedScroll({ selectedIndex: entryIndex, totalItems: entries.length, viewportHeight: listViewportHeight });
  const itemOffset = useWindowedScroll({ selectedIndex: itemIndex, totalItems: state.itemIds.length, viewportHeight: listViewportHeight });

  const tooSmall = columns < MIN_SCREEN_WIDTH || rows < MIN_SCREEN_HEIGHT;

  // ── Navigation ──
  const moveEntry = useCallback((target: number) => {
    const entryId = entries[target];
    if (entryId !== undefined && entryId !== state.selectedEntry) post(entrySelected(entryId));
  }, [entries, state.selectedEntry, post]);

  const moveItem = useCallback((target: number) => {
    if (!controls.itemSelectorEnabled) return;
    const itemId = state.itemIds[target];
    if (itemId !== undefined && itemId !== state.selectedItem) post(itemSelected(itemId));
  }, [controls.itemSelectorEnabled, state.itemIds, state.selectedItem, post]);

  const move = useCallback((delta: number) => {
    if (ui.focus === 'entries') moveEntry(moveIndex(entryIndex, delta, entries.length));
    else moveItem(moveIndex(itemIndex, delta, state.itemIds.length));
  }, [ui.focus, moveEntry, moveItem, entryIndex, itemIndex, entries.length, state.itemIds.length]);

  const applyStyle = useCallback((style: RenderStyle) => {
    if (!controls.styleEnabled) {
      addToast('Style is fixed in multi view (press v)', 'warning');
      return;
    }
    if (style !== state.style) post(styleChanged(style));
  }, [controls.styleEnabled, state.style, post, addToast]);

  // ── Keyboard input ──
  useInput((input, key) => {
    // Filter input captures everything, quit keys included
    if (ui.overlay === 'filter') {
      if (key.escape) {
        dispatch({ type: 'SET_FILTER', value: '' });
        dispatch({ type: 'SET_OVERLAY', overlay: null });
        return;
      }
      if (key.return) {
        dispatch({ type: 'SET_OVERLAY', overlay: null });
        if (entryIndex < 0 && entries.length > 0) moveEntry(0);
        return;
      }
      if (key.backspace || key.delete) {
        dispatch({ type: 'SET_FILTER', value: ui.filter.slice(0, -1) });
        return;
      }
      if (input && !key.ctrl && !key.meta) {
        dispatch({ type: 'SET_FILTER', value: ui.filter + input });
      }
      return;
    }

    if (input === 'q' || (key.ctrl && input === 'c')) {
      if (ui.overlay) {
        dispatch({ type: 'SET_OVERLAY', overlay: null });
        return;
      }
      exit();
      return;
    }

    if (ui.overlay === 'help') {
      if (key.escape || input === '?') dispatch({ type: 'SET_OVERLAY', overlay: null });
      return;
    }

    // ── Global keys (no overlay) ──

    if (key.escape) {
      if (ui.filter) dispatch({ type: 'SET_FILTER', value: '' });
      return;
    }
    if (input === '?') {
      dispatch({ type: 'SET_OVERLAY', overlay: 'help' });
      return;
    }
    if (input === '/') {
      dispatch({ type: 'SET_OVERLAY', overlay: 'filter' });
      return;
    }
    if (key.tab) {
      dispatch({ type: 'TOGGLE_FOCUS' });
      return;
    }
    if (input === 'r') {
      post(refreshRequested());
      return;
    }

    // Navigation
    if (input === 'j' || key.downArrow) {
      move(1);
      return;
    }
    if (input === 'k' || key.upArrow) {
      move(-1);
      return;
    }
    if (input === 'g') {
      if (ui.focus === 'entries') moveEntry(0);
      else moveItem(0);
      return;
    }
    if (input === 'G') {
      if (ui.focus === 'entries') moveEntry(entries.length - 1);
      else moveItem(state.itemIds.length - 1);
      return;
    }
    if (key.return) {
      if (ui.focus === 'entries') dispatch({ type: 'SET_FOCUS', target: 'items' });
      return;
    }

    // Style and view keys
    if (!layout.keybindings) return;
    if (input === 's') {
      applyStyle(nextStyle(state.style));
      return;
    }
    const numbered = styleForKey(input);
    if (numbered) {
      applyStyle(numbered);
      return;
    }
    if (input === 'v') {
      post(viewModeChanged(!state.singleView));
    }
  });

  // ── Render ──

  if (tooSmall) {
    return <TooSmallOverlay columns={columns} rows={rows} minColumns={MIN_SCREEN_WIDTH} minRows={MIN_SCREEN_HEIGHT} />;
  }

  return (
    <Box flexDirection="column" height={rows} width={columns}>
      <ControlBar
        title={view.title}
        style={state.style}
        singleView={state.singleView}
        styleEnabled={controls.styleEnabled}
      />

      <Box flexGrow={1} flexDirection="row">
        <SideList
          items={entries}
          selectedIndex={entryIndex}
          scrollOffset={entryOffset}
          focused={ui.focus === 'entries'}
          width={ENTRY_LIST_WIDTH}
          viewportHeight={listViewportHeight}
          panelTitle="Entries"
          emptyStateHint={ui.filter ? 'No match' : 'No entries'}
        />
        <SideList
          items={state.itemIds}
          selectedIndex={itemIndex}
          scrollOffset={itemOffset}
          focused={ui.focus === 'items'}
          disabled={!controls.itemSelectorEnabled}
          width={ITEM_LIST_WIDTH}
          viewportHeight={listViewportHeight}
          panelTitle="Disulfides"
          emptyStateHint="No disulfides"
        />

        <Box flexDirection="column" flexGrow={1}>
          <RenderPane surface={view.surface} layout={layout} />
          <InfoPane info={view.info} output={view.output} />
        </Box>
      </Box>

      <StatusBar
        banner={databaseBanner(session.database.stats())}
        version={version}
        filter={ui.filter}
        matchCount={entries.length}
        keybindings={layout.keybindings}
      />

      {ui.overlay === 'help' && <HelpOverlay keybindings={layout.keybindings} />}

      {ui.overlay === 'filter' && <FilterBar filter={ui.filter} matchCount={entries.length} rows={rows} />}

      {ui.toasts.length > 0 && (
        <ToastNotification toast={ui.toasts[ui.toasts.length - 1]} columns={columns} />
      )}
    </Box>
  );
}
