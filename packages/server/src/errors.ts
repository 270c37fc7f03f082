/** Failure categories surfaced by the mind-map pipeline. */
export type MindmapErrorKind = 'not_found' | 'bad_input' | 'internal';

const STATUS_BY_KIND: Record<MindmapErrorKind, number> = {
  not_found: 404,
  bad_input: 400,
  internal: 500,
};

/**
 * Error carrying the HTTP status it maps to.
 *
 * `message` is user-visible; the original failure, if any, is kept as
 * `cause` for the operator log.
 */
export class MindmapError extends Error {
  readonly kind: MindmapErrorKind;
  readonly status: number;

  constructor(kind: MindmapErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MindmapError';
    this.kind = kind;
    this.status = STATUS_BY_KIND[kind];
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
