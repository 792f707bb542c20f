export interface Datagram {
  readonly payload: Buffer;
  readonly receivedAt: Date;
  readonly remoteAddress: string;
  readonly remotePort: number;
}

export interface DatagramSourcePort {
  readonly host: string;
  readonly port: number;
  /** Datagrams discarded because they arrived faster than they were received. */
  readonly droppedDatagrams: number;
  /** Throws `BindError` when the socket cannot be bound. */
  bind(): Promise<void>;
  /** Next datagram, or `null` once `signal` aborts or the source is closed. */
  receive(signal: AbortSignal): Promise<Datagram | null>;
  close(): Promise<void>;
}
