export type WriteErrorKind = 'BackendUnreachable' | 'Timeout' | 'Rejected';

export class WriteError extends Error {
  override readonly name = 'WriteError';

  constructor(
    readonly kind: WriteErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
