export type DecodeErrorKind =
  | 'LengthMismatch'
  | 'MalformedPayload'
  | 'MissingField'
  | 'InvalidFlag';

/** A datagram that could not be turned into a record. Never fatal to ingestion. */
export class DecodeError extends Error {
  override readonly name = 'DecodeError';

  constructor(
    readonly kind: DecodeErrorKind,
    message: string,
    readonly field?: string,
  ) {
    super(message);
  }
}
