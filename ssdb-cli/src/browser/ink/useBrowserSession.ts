/**
 * Mirrors a browser session (store, slot, text regions, controls) into React
 * state so components re-render on every cascade step.
 */

import { useState, useEffect, useCallback } from 'react';
import type { BrowserSession, ControlsState, RenderSurface, UIState } from 'ssdb-shared';

export interface SessionView {
  state: Readonly<UIState>;
  surface: RenderSurface | null;
  title: string;
  info: string;
  output: string;
  controls: Readonly<ControlsState>;
}

export function useBrowserSession(session: BrowserSession): SessionView {
  const read = useCallback((): SessionView => ({
    state: session.store.snapshot(),
    surface: session.slot.current(),
    title: session.regions.title.text,
    info: session.regions.info.text,
    output: session.regions.output.text,
    controls: { ...session.controller.controls },
  }), [session]);

  const [view, setView] = useState<SessionView>(read);

  useEffect(() => {
    const refresh = () => setView(read());
    const unsubscribers = [
      session.store.subscribe(refresh),
      session.slot.subscribe(refresh),
      session.regions.title.subscribe(refresh),
      session.regions.info.subscribe(refresh),
      session.regions.output.subscribe(refresh),
      session.controller.onControlsChange(refresh),
    ];
    // Catch up with anything that changed before the subscriptions
    refresh();
    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }, [session, read]);

  return view;
}
