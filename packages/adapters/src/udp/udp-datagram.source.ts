import { createSocket } from 'node:dgram';
import type { Socket } from 'node:dgram';
import { BindError } from '@grid-stream/domain';
import type { Datagram, DatagramSourcePort } from '@grid-stream/domain';
import { createLogger, describeError } from '../logging/logger.js';

const log = createLogger('udp-source');

export interface UdpDatagramSourceOptions {
  host: string;
  port: number;
  /** Datagrams held while nobody is receiving; the oldest is dropped beyond this. */
  maxQueued?: number;
}

/**
 * Turns the socket's `message` events into an awaitable `receive()`. One
 * receiver at a time; a pending receive resolves `null` on abort or close.
 */
export class UdpDatagramSource implements DatagramSourcePort {
  readonly host: string;
  private boundPort: number;
  private readonly maxQueued: number;
  private socket: Socket | null = null;
  private readonly queue: Datagram[] = [];
  private waiter: ((datagram: Datagram | null) => void) | null = null;
  private closed = false;
  private overflowDropped = 0;

  constructor(options: UdpDatagramSourceOptions) {
    this.host = options.host;
    this.boundPort = options.port;
    this.maxQueued = options.maxQueued ?? 10_000;
  }

  /** The bound port once `bind()` resolved (differs from the requested one for port 0). */
  get port(): number {
    return this.boundPort;
  }

  get droppedDatagrams(): number {
    return this.overflowDropped;
  }

  async bind(): Promise<void> {
    const socket = createSocket(this.host.includes(':') ? 'udp6' : 'udp4');

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        socket.close();
        reject(new BindError(this.host, this.boundPort, { cause: err }));
      };
      socket.once('error', onError);
      socket.bind(this.boundPort, this.host, () => {
        socket.off('error', onError);
        resolve();
      });
    });

    socket.on('message', (payload, rinfo) => {
      this.push({
        payload,
        receivedAt: new Date(),
        remoteAddress: rinfo.address,
        remotePort: rinfo.port,
      });
    });
    socket.on('error', (err) => {
      log.error('socket error', { error: describeError(err) });
    });

    if (this.closed) {
      // close() ran while the bind was pending.
      await new Promise<void>((resolve) => socket.close(() => resolve()));
      return;
    }
    this.socket = socket;
    this.boundPort = socket.address().port;
    log.info(`listening on ${this.host}:${this.boundPort}`);
  }

  receive(signal: AbortSignal): Promise<Datagram | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.closed || signal.aborted) return Promise.resolve(null);

    return new Promise<Datagram | null>((resolve) => {
      const onAbort = () => {
        this.waiter = null;
        resolve(null);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiter = (datagram) => {
        signal.removeEventListener('abort', onAbort);
        this.waiter = null;
        resolve(datagram);
      };
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.waiter?.(null);
    this.queue.length = 0;

    const socket = this.socket;
    this.socket = null;
    if (socket) {
      await new Promise<void>((resolve) => socket.close(() => resolve()));
      log.info('socket closed');
    }
  }

  private push(datagram: Datagram): void {
    if (this.closed) return;
    if (this.waiter) {
      this.waiter(datagram);
      return;
    }
    this.queue.push(datagram);
    if (this.queue.length > this.maxQueued) {
      this.queue.shift();
      this.overflowDropped++;
      if (this.overflowDropped % 1000 === 1) {
        log.warn('receive queue full, dropping oldest datagrams', { dropped: this.overflowDropped });
      }
    }
  }
}
