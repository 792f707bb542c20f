/** The datagram socket could not be bound. Fatal at startup. */
export class BindError extends Error {
  override readonly name = 'BindError';
  readonly kind = 'BindError';

  constructor(
    readonly host: string,
    readonly port: number,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`failed to bind udp ${host}:${port}${reason}`, options);
  }
}

/** Configuration could not be loaded or failed validation. Fatal at startup. */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
  readonly kind = 'ConfigError';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}
