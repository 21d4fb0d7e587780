import type { Document } from 'bson';

import { CLOSE } from '../constants';
import {
  DriverError,
  DriverNetworkError,
  DriverNetworkTimeoutError,
  DriverServerError
} from '../error';
import { raceWithTimeout } from '../timeout';
import { TypedEventEmitter } from '../types';
import { calculateDurationInMs, type HostAddress, now, promiseWithResolvers } from '../utils';

/**
 * A single open channel to a server. Wire encoding, TLS and authentication live behind it.
 * @public
 */
export interface Transport {
  /** Sends one command and resolves with the reply. A network failure rejects. */
  command(document: Document, options: { timeoutMS: number }): Promise<Document>;
  /** Closes the channel. Commands in flight are abandoned. */
  destroy(): void;
  readonly closed: boolean;
}

/**
 * Opens transports to servers.
 * @public
 */
export interface TransportFactory {
  connect(address: HostAddress, options: { connectTimeoutMS: number }): Promise<Transport>;
}

/** @public */
export interface CommandOptions {
  /** Overrides the connection's socket timeout for one command, 0 waits forever */
  timeoutMS?: number;
}

/** @public */
export interface ConnectionOptions {
  // Internal creation info
  id: number | '<monitor>';
  generation: number;
  hostAddress: HostAddress;
  socketTimeoutMS?: number;
}

/** @public */
export type ConnectionEvents = {
  close(): void;
};

/** @internal */
export class Connection extends TypedEventEmitter<ConnectionEvents> {
  public readonly id: number | '<monitor>';
  public readonly address: string;
  public readonly generation: number;
  /** The reply to the handshake hello */
  public hello: Document | null = null;
  /**
   * Represents if the connection has been established, handshake included.
   */
  public established = false;
  /** Indicates that the connection (including the underlying transport) has been closed. */
  public closed = false;

  private lastUseTime: number;
  private error: Error | null = null;
  private readonly socketTimeoutMS: number;
  private readonly transport: Transport;
  private readonly inFlight = new Set<(error: Error) => void>();

  /** @event */
  static readonly CLOSE = CLOSE;

  constructor(transport: Transport, options: ConnectionOptions) {
    super();

    this.transport = transport;
    this.id = options.id;
    this.address = options.hostAddress.toString();
    this.socketTimeoutMS = options.socketTimeoutMS ?? 0;
    this.generation = options.generation;
    this.lastUseTime = now();
  }

  public get idleTime(): number {
    return calculateDurationInMs(this.lastUseTime);
  }

  public markAvailable(): void {
    this.lastUseTime = now();
  }

  /**
   * Sends a command over this connection.
   *
   * An `ok: 0` reply rejects with a `DriverServerError` and leaves the connection open. A
   * transport failure or a timeout closes the connection and rejects with a network error.
   */
  async command(cmd: Document, options: CommandOptions = {}): Promise<Document> {
    if (this.closed) {
      throw this.error ?? new DriverNetworkError(`connection ${this.id} to ${this.address} closed`);
    }

    const timeoutMS = options.timeoutMS ?? this.socketTimeoutMS;
    const { promise: interrupted, reject } = promiseWithResolvers<never>();
    this.inFlight.add(reject);

    let reply: Document;
    try {
      reply = await raceWithTimeout(
        Promise.race([this.transport.command(cmd, { timeoutMS }), interrupted]),
        timeoutMS,
        timeoutError =>
          new DriverNetworkTimeoutError(`connection ${this.id} to ${this.address} timed out`, {
            beforeHandshake: this.hello == null,
            cause: timeoutError
          })
      );
    } catch (error) {
      const networkError = this.asNetworkError(error);
      this.cleanup(networkError);
      throw networkError;
    } finally {
      this.inFlight.delete(reject);
    }

    this.markAvailable();
    if (reply.ok === 0 || reply.ok === false) {
      throw new DriverServerError(reply);
    }
    return reply;
  }

  /**
   * Closes the connection. Commands in flight reject with `error`, or with a network error
   * naming this connection when none is given. Does nothing once closed.
   */
  public destroy(error?: Error): void {
    if (this.closed) {
      return;
    }

    this.cleanup(
      error ?? new DriverNetworkError(`connection ${this.id} to ${this.address} closed`)
    );
  }

  private asNetworkError(error: unknown): DriverError {
    if (error instanceof DriverError) {
      return error;
    }

    return new DriverNetworkError(
      error instanceof Error ? error.message : `connection ${this.id} to ${this.address} failed`,
      { beforeHandshake: this.hello == null, cause: error }
    );
  }

  /**
   * Destroys the transport and fails every command in flight with the given error.
   *
   * This method does nothing if the connection is already closed.
   */
  private cleanup(error: Error): void {
    if (this.closed) {
      return;
    }

    this.transport.destroy();
    this.error = error;
    this.closed = true;
    for (const reject of this.inFlight) {
      reject(error);
    }
    this.inFlight.clear();
    this.emit(Connection.CLOSE);
  }
}
