/**
 * Contracts between the render cascade and its collaborators:
 * the renderer, the display surface factory and the text regions.
 */

import type { Disulfide } from '../types/disulfide';
import type { RenderStyle } from './styles';

/** What the cascade asks the renderer for. */
export interface RenderRequest {
  itemId: string;
  /** Style actually applied; the stored style is ignored in multi view. */
  style: RenderStyle;
  singleView: boolean;
  lightMode: boolean;
  shadows: false;
}

/** A run of text sharing one look. Colors are Ink/chalk color names. */
export interface Segment {
  text: string;
  color?: string;
  bold?: boolean;
  dim?: boolean;
}

export type StyledLine = Segment[];

/** Opaque-to-the-cascade result of a render call. */
export interface RenderHandle {
  itemId: string;
  lines: StyledLine[];
  lightMode: boolean;
}

export interface Renderer {
  render(item: Disulfide, style: RenderStyle, single: boolean, shadows: boolean, light: boolean): RenderHandle | Promise<RenderHandle>;
}

export type Sizing = 'fixed' | 'stretch_width' | 'stretch_both';

export interface SurfaceLayout {
  margin: number;
  sizing: Sizing;
  /** Show the atom legend beside the drawing. */
  orientationWidget: boolean;
  /** Accept style / view keys while the surface is focused. */
  keybindings: boolean;
  /** Rows reserved for the drawing. */
  minHeight: number;
}

export const DEFAULT_LAYOUT: Readonly<SurfaceLayout> = Object.freeze({
  margin: 0,
  sizing: 'stretch_both',
  orientationWidget: true,
  keybindings: true,
  minHeight: 8,
});

/** An embeddable surface built from a render handle. */
export interface RenderSurface {
  /** Monotonic per factory; lets views tell surfaces apart. */
  serial: number;
  handle: RenderHandle;
  layout: Readonly<SurfaceLayout>;
}

export interface SurfaceFactory {
  create(handle: RenderHandle, layout: Readonly<SurfaceLayout>): RenderSurface;
}

export interface TextRegionSink {
  set(text: string): void;
}

export interface TextRegions {
  title: TextRegionSink;
  info: TextRegionSink;
  output: TextRegionSink;
}
