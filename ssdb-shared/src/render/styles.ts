/**
 * Rendering styles offered by the browser and their renderer codes.
 */

export enum RenderStyle {
  SplitBonds = 'SplitBonds',
  CPK = 'CPK',
  BallAndStick = 'BallAndStick',
}

export type StyleCode = 'sb' | 'cpk' | 'bs';

export const RENDER_STYLES: readonly RenderStyle[] = [
  RenderStyle.SplitBonds,
  RenderStyle.CPK,
  RenderStyle.BallAndStick,
];

const STYLE_LABELS = {
  [RenderStyle.SplitBonds]: 'Split Bonds',
  [RenderStyle.CPK]: 'CPK',
  [RenderStyle.BallAndStick]: 'Ball and Stick',
} satisfies Record<RenderStyle, string>;

function assertNever(value: never): never {
  throw new Error(`Unhandled render style: ${String(value)}`);
}

/** Short code understood by the renderer. */
export function styleCode(style: RenderStyle): StyleCode {
  switch (style) {
    case RenderStyle.SplitBonds: return 'sb';
    case RenderStyle.CPK: return 'cpk';
    case RenderStyle.BallAndStick: return 'bs';
    default: return assertNever(style);
  }
}

export function styleLabel(style: RenderStyle): string {
  return STYLE_LABELS[style];
}

export function isRenderStyle(value: unknown): value is RenderStyle {
  return typeof value === 'string' && RENDER_STYLES.some(s => s === value);
}

/**
 * Parse a user-supplied style: enum name, display label or code, any case.
 * Spaces, dashes and underscores are ignored. Returns null when nothing matches.
 */
export function parseRenderStyle(text: string): RenderStyle | null {
  const key = text.toLowerCase().replace(/[\s_-]+/g, '');
  if (!key) return null;
  for (const style of RENDER_STYLES) {
    const names = [style, styleLabel(style), styleCode(style)]
      .map(n => n.toLowerCase().replace(/[\s_-]+/g, ''));
    if (names.includes(key)) return style;
  }
  return null;
}
