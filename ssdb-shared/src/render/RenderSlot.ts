/**
 * Holds the one surface currently on display. A new surface is swapped in
 * whole; there is never a moment where the slot is empty after the first
 * successful render.
 */

import type { RenderHandle, RenderSurface, SurfaceFactory, SurfaceLayout } from './types';

type SlotListener = (surface: RenderSurface, previous: RenderSurface | null) => void;

export class RenderSlot {
  private _current: RenderSurface | null = null;
  private _listeners: SlotListener[] = [];

  current(): RenderSurface | null {
    return this._current;
  }

  /** Swap in a fully built surface; returns the one it displaced. */
  replace(next: RenderSurface): RenderSurface | null {
    const previous = this._current;
    this._current = next;
    for (const listener of [...this._listeners]) listener(next, previous);
    return previous;
  }

  subscribe(listener: SlotListener): () => void {
    this._listeners.push(listener);
    return () => {
      this._listeners = this._listeners.filter(l => l !== listener);
    };
  }
}

export function createSurfaceFactory(): SurfaceFactory {
  let serial = 0;
  return {
    create(handle: RenderHandle, layout: Readonly<SurfaceLayout>): RenderSurface {
      serial++;
      return Object.freeze({
        serial,
        handle,
        layout: Object.freeze({ ...layout }),
      });
    },
  };
}
