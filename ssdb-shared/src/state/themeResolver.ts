/**
 * Resolves the session theme from raw session arguments.
 * Only an exact `dark` marker selects the dark theme.
 */

import type { Theme } from '../types/disulfide';

export type SessionContext = Readonly<Record<string, unknown>>;

const DARK_MARKER = 'dark';

function argText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf-8');
  return null;
}

export function resolveTheme(context: SessionContext): Theme {
  let value = context.theme;
  // Session args may arrive as a list of values; the first one counts
  if (Array.isArray(value)) value = value[0];
  return argText(value) === DARK_MARKER ? 'dark' : 'default';
}

/** Resolve once per session; later calls return the first result. */
export function createThemeCache(): (context: SessionContext) => Theme {
  let cached: Theme | null = null;
  return (context) => {
    if (cached === null) cached = resolveTheme(context);
    return cached;
  };
}
