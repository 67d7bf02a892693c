/**
 * Error type shared by the database, the selection store and the render
 * cascade. Every failure carries a `kind` so callers can branch without
 * string matching.
 */

export type SsdbErrorKind =
  | 'UnknownEntry'
  | 'EmptySelection'
  | 'ItemNotFound'
  | 'InvalidItem'
  | 'InvalidStyle'
  | 'RenderFailed'
  | 'InvalidDatabase'
  | 'ConfigError';

export class SsdbError extends Error {
  readonly kind: SsdbErrorKind;
  readonly context: Record<string, unknown>;

  constructor(kind: SsdbErrorKind, message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SsdbError';
    this.kind = kind;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      context: this.context,
    };
  }
}

export function isSsdbError(err: unknown, kind?: SsdbErrorKind): err is SsdbError {
  if (!(err instanceof SsdbError)) return false;
  return kind === undefined || err.kind === kind;
}

/** Display text for any thrown value. */
export function toMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
