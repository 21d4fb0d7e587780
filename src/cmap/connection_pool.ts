import { clearTimeout, setTimeout } from 'timers';

import {
  CONNECTION_CHECK_OUT_FAILED,
  CONNECTION_CHECK_OUT_STARTED,
  CONNECTION_CHECKED_IN,
  CONNECTION_CHECKED_OUT,
  CONNECTION_CLOSED,
  CONNECTION_CREATED,
  CONNECTION_POOL_CLEARED,
  CONNECTION_POOL_CLOSED,
  CONNECTION_POOL_CREATED,
  CONNECTION_POOL_READY,
  CONNECTION_READY
} from '../constants';
import { type AnyError, DriverConfigurationError, DriverError } from '../error';
import { type DriverLogger, LoggableComponent } from '../logger';
import { Timeout, TimeoutError } from '../timeout';
import { TypedEventEmitter } from '../types';
import { type HostAddress, List, makeCounter, noop, now, promiseWithResolvers } from '../utils';
import { connect } from './connect';
import type { Connection, TransportFactory } from './connection';
import {
  type ConnectionCheckOutFailedReason,
  type ConnectionClosedReason,
  ConnectionCheckedInEvent,
  ConnectionCheckedOutEvent,
  ConnectionCheckOutFailedEvent,
  ConnectionCheckOutStartedEvent,
  ConnectionClosedEvent,
  ConnectionCreatedEvent,
  ConnectionPoolClearedEvent,
  ConnectionPoolClosedEvent,
  ConnectionPoolCreatedEvent,
  ConnectionPoolReadyEvent,
  ConnectionReadyEvent
} from './connection_pool_events';
import {
  PoolClearedError,
  PoolClearedOnNetworkError,
  PoolClosedError,
  WaitQueueTimeoutError
} from './errors';

/** @public */
export interface ConnectionPoolOptions {
  hostAddress: HostAddress;
  transportFactory: TransportFactory;
  /** Limit on establishing a connection, handshake included. 0 waits forever. */
  connectTimeoutMS?: number;
  /** Limit on waiting for a command reply. 0 waits forever. */
  socketTimeoutMS?: number;
  /** Cap on idle, pending and checked out connections together. 0 lifts the cap. */
  maxPoolSize?: number;
  /** Connections kept open in the background while the pool is ready. */
  minPoolSize?: number;
  /** Cap on connections being established at once. */
  maxConnecting?: number;
  /** Idle connections older than this are closed instead of handed out. 0 keeps them. */
  maxIdleTimeMS?: number;
  /** Default limit on a checkout. 0 leaves the limit to the caller. */
  waitQueueTimeoutMS?: number;
  /** @internal */
  minPoolSizeCheckFrequencyMS?: number;
  /** @internal */
  logger?: DriverLogger;
}

/** @internal */
export type PoolState = 'paused' | 'ready' | 'closed';

/** @public */
export type ConnectionPoolEvents = {
  connectionPoolCreated(event: ConnectionPoolCreatedEvent): void;
  connectionPoolReady(event: ConnectionPoolReadyEvent): void;
  connectionPoolClosed(event: ConnectionPoolClosedEvent): void;
  connectionPoolCleared(event: ConnectionPoolClearedEvent): void;
  connectionCreated(event: ConnectionCreatedEvent): void;
  connectionReady(event: ConnectionReadyEvent): void;
  connectionClosed(event: ConnectionClosedEvent): void;
  connectionCheckOutStarted(event: ConnectionCheckOutStartedEvent): void;
  connectionCheckOutFailed(event: ConnectionCheckOutFailedEvent): void;
  connectionCheckedOut(event: ConnectionCheckedOutEvent): void;
  connectionCheckedIn(event: ConnectionCheckedInEvent): void;
  /** @internal Establishing a connection failed; the owner decides whether the server is down */
  connectionCreationFailed(error: AnyError, generation: number): void;
};

/** A caller parked until a connection can be handed to it */
interface PendingCheckout {
  startedAt: number;
  abandoned: boolean;
  fulfil(connection: Connection): void;
  fail(error: Error): void;
}

type ResolvedPoolOptions = Readonly<
  Required<Omit<ConnectionPoolOptions, 'logger'>> & Pick<ConnectionPoolOptions, 'logger'>
>;

const POOL_DEFAULTS = {
  connectTimeoutMS: 30000,
  socketTimeoutMS: 0,
  maxPoolSize: 100,
  minPoolSize: 0,
  maxConnecting: 2,
  maxIdleTimeMS: 0,
  waitQueueTimeoutMS: 0,
  minPoolSizeCheckFrequencyMS: 100
} as const;

/**
 * Connections to a single endpoint. Callers queue in FIFO order; each one is served from the
 * idle connections first and otherwise by a new connection, within `maxPoolSize` and
 * `maxConnecting`. Clearing bumps the generation so older connections are retired.
 * @internal
 */
export class ConnectionPool extends TypedEventEmitter<ConnectionPoolEvents> {
  readonly options: ResolvedPoolOptions;
  /** Bumped by every clear; connections of an older generation are stale */
  generation = 0;
  /** What caused the last clear, reported to callers turned away while paused */
  serverError: AnyError | null = null;

  private status: PoolState = 'paused';
  /** Idle connections, most recently used first */
  private idle = new List<Connection>();
  private inUse = new Set<Connection>();
  private connecting = 0;
  private queue = new List<PendingCheckout>();
  private draining = false;
  private ids: Generator<number> = makeCounter(1);
  private fillTimer: NodeJS.Timeout | null = null;

  /** @internal */
  static readonly CONNECTION_CREATION_FAILED = 'connectionCreationFailed' as const;

  constructor(options: ConnectionPoolOptions) {
    super();
    this.on('error', noop);

    this.options = Object.freeze(withDefaults(options));

    const { minPoolSize, maxPoolSize } = this.options;
    if (maxPoolSize > 0 && minPoolSize > maxPoolSize) {
      throw new DriverConfigurationError(
        'Connection pool minimum size must not be greater than maximum pool size'
      );
    }

    this.logger = options.logger;
    this.component = LoggableComponent.CONNECTION;

    process.nextTick(() =>
      this.emitAndLog(CONNECTION_POOL_CREATED, new ConnectionPoolCreatedEvent(this))
    );
  }

  get address(): string {
    return this.options.hostAddress.toString();
  }

  get state(): PoolState {
    return this.status;
  }

  get closed(): boolean {
    return this.status === 'closed';
  }

  get availableConnectionCount(): number {
    return this.idle.length;
  }

  get pendingConnectionCount(): number {
    return this.connecting;
  }

  get currentCheckedOutCount(): number {
    return this.inUse.size;
  }

  get totalConnectionCount(): number {
    return this.idle.length + this.connecting + this.inUse.size;
  }

  get waitQueueSize(): number {
    return this.queue.length;
  }

  /** Moves a paused pool to ready and starts filling it up to `minPoolSize` */
  ready(): void {
    if (this.status !== 'paused') return;

    this.status = 'ready';
    this.emitAndLog(CONNECTION_POOL_READY, new ConnectionPoolReadyEvent(this));
    this.fill();
  }

  /**
   * Hands out a connection, queuing the caller behind earlier ones. The caller owns the
   * connection until it is passed back to `checkIn`.
   *
   * @param options - `waitQueueTimeoutMS` overrides the pool default for this caller
   */
  async checkOut(options: { waitQueueTimeoutMS?: number } = {}): Promise<Connection> {
    const startedAt = now();
    this.emitAndLog(CONNECTION_CHECK_OUT_STARTED, new ConnectionCheckOutStartedEvent(this));

    const { promise, resolve, reject } = promiseWithResolvers<Connection>();
    const request: PendingCheckout = {
      startedAt,
      abandoned: false,
      fulfil: resolve,
      fail: reject
    };
    this.queue.push(request);
    process.nextTick(() => this.drain());

    const limit = options.waitQueueTimeoutMS ?? this.options.waitQueueTimeoutMS;
    if (limit <= 0) {
      return await promise;
    }

    const deadline = Timeout.expires(limit);
    try {
      return await Promise.race([promise, deadline]);
    } catch (error) {
      if (!TimeoutError.is(error)) throw error;

      request.abandoned = true;
      this.queue.prune(member => member === request);
      this.reportCheckOutFailure(request, 'timeout');
      throw new WaitQueueTimeoutError(
        'Timed out while checking out a connection from connection pool',
        this.address
      );
    } finally {
      deadline.clear();
    }
  }

  /** Takes back a connection handed out by `checkOut`; anything else is ignored. */
  checkIn(connection: Connection): void {
    if (!this.inUse.delete(connection)) return;

    const closeReason = this.closeReasonOnReturn(connection);
    if (closeReason == null) {
      connection.markAvailable();
      this.idle.unshift(connection);
    }
    this.emitAndLog(CONNECTION_CHECKED_IN, new ConnectionCheckedInEvent(this, connection));
    if (closeReason != null) {
      this.retire(connection, closeReason);
    }

    process.nextTick(() => this.drain());
  }

  /**
   * Pauses the pool and starts a new generation. Idle connections of the old generation are
   * closed at once; checked out ones when they come back, or right away with
   * `interruptInUseConnections`.
   */
  clear(options: { error?: AnyError; interruptInUseConnections?: boolean } = {}): void {
    if (this.closed) return;

    if (options.error != null) {
      this.serverError = options.error;
    }

    const retiredGeneration = this.generation;
    this.generation += 1;
    const wasReady = this.status === 'ready';
    this.status = 'paused';
    this.stopFilling();

    if (wasReady) {
      const interruptInUseConnections = options.interruptInUseConnections ?? false;
      this.emitAndLog(
        CONNECTION_POOL_CLEARED,
        new ConnectionPoolClearedEvent(this, { interruptInUseConnections })
      );
    }
    this.idle.prune(connection => this.retireIfUnusable(connection));

    if (options.interruptInUseConnections) {
      process.nextTick(() => this.interrupt(retiredGeneration));
    }

    this.drain();
  }

  /** Closes the pool and its idle connections. Checked out connections close on check in. */
  close(): void {
    if (this.closed) return;

    this.ids.return(undefined);
    this.status = 'closed';
    this.stopFilling();
    this.drain();

    for (let connection = this.idle.shift(); connection != null; connection = this.idle.shift()) {
      this.retire(connection, 'poolClosed');
    }
    this.emitAndLog(CONNECTION_POOL_CLOSED, new ConnectionPoolClosedEvent(this));
  }

  private interrupt(upToGeneration: number): void {
    for (const connection of this.inUse) {
      if (connection.generation > upToGeneration) continue;

      connection.destroy(new PoolClearedOnNetworkError(this));
      this.inUse.delete(connection);
      this.emitAndLog(CONNECTION_CHECKED_IN, new ConnectionCheckedInEvent(this, connection));
      this.retire(connection, 'dropped');
    }
    process.nextTick(() => this.drain());
  }

  private closeReasonOnReturn(connection: Connection): ConnectionClosedReason | null {
    if (connection.closed) return 'error';
    if (this.closed) return 'poolClosed';
    if (connection.generation !== this.generation) return 'stale';
    return null;
  }

  /** Closes the connection if it is closed, stale or idle too long, and says whether it did */
  private retireIfUnusable(connection: Connection): boolean {
    const { maxIdleTimeMS } = this.options;
    let reason: ConnectionClosedReason | null = null;
    if (connection.closed) {
      reason = 'error';
    } else if (connection.generation !== this.generation) {
      reason = 'stale';
    } else if (maxIdleTimeMS > 0 && connection.idleTime > maxIdleTimeMS) {
      reason = 'idle';
    }

    if (reason == null) return false;
    this.retire(connection, reason);
    return true;
  }

  private retire(connection: Connection, reason: ConnectionClosedReason): void {
    this.emitAndLog(CONNECTION_CLOSED, new ConnectionClosedEvent(this, connection, reason));
    connection.destroy();
  }

  private reportCheckOutFailure(
    request: PendingCheckout,
    reason: ConnectionCheckOutFailedReason,
    error?: AnyError
  ): void {
    this.emitAndLog(
      CONNECTION_CHECK_OUT_FAILED,
      new ConnectionCheckOutFailedEvent(this, reason, request.startedAt, error)
    );
  }

  private handOut(connection: Connection, request: PendingCheckout): void {
    this.inUse.add(connection);
    this.emitAndLog(
      CONNECTION_CHECKED_OUT,
      new ConnectionCheckedOutEvent(this, connection, request.startedAt)
    );
    request.fulfil(connection);
  }

  private async establish(): Promise<Connection> {
    const { value: id } = this.ids.next();
    if (typeof id !== 'number') {
      throw new PoolClosedError(this);
    }

    const generation = this.generation;
    const createdAt = now();
    this.connecting += 1;
    this.emitAndLog(CONNECTION_CREATED, new ConnectionCreatedEvent(this, { id }));

    let connection: Connection;
    try {
      connection = await connect({
        id,
        generation,
        hostAddress: this.options.hostAddress,
        transportFactory: this.options.transportFactory,
        connectTimeoutMS: this.options.connectTimeoutMS,
        socketTimeoutMS: this.options.socketTimeoutMS
      });
    } catch (cause) {
      const error = cause instanceof Error ? cause : new DriverError('Connection creation failed');
      this.emitAndLog(CONNECTION_CLOSED, new ConnectionClosedEvent(this, { id }, 'error', error));
      this.emit(ConnectionPool.CONNECTION_CREATION_FAILED, error, generation);
      throw error;
    } finally {
      this.connecting -= 1;
    }

    if (this.status !== 'ready') {
      connection.destroy();
      throw this.closed ? new PoolClosedError(this) : new PoolClearedError(this);
    }

    connection.markAvailable();
    this.emitAndLog(CONNECTION_READY, new ConnectionReadyEvent(this, connection, createdAt));
    return connection;
  }

  private stopFilling(): void {
    if (this.fillTimer != null) {
      clearTimeout(this.fillTimer);
      this.fillTimer = null;
    }
  }

  private scheduleFill(): void {
    this.stopFilling();
    if (this.status !== 'ready') return;
    this.fillTimer = setTimeout(() => this.fill(), this.options.minPoolSizeCheckFrequencyMS);
  }

  /** Opens at most one background connection per pass while below `minPoolSize` */
  private fill(): void {
    this.stopFilling();
    const { minPoolSize, maxConnecting } = this.options;
    if (this.status !== 'ready' || minPoolSize === 0) return;

    this.idle.prune(connection => this.retireIfUnusable(connection));

    if (this.totalConnectionCount >= minPoolSize || this.connecting >= maxConnecting) {
      this.scheduleFill();
      return;
    }

    this.establish().then(
      connection => {
        this.idle.push(connection);
        process.nextTick(() => this.drain());
        this.scheduleFill();
      },
      // already published as connectionClosed and connectionCreationFailed
      () => this.scheduleFill()
    );
  }

  private canOpenConnection(): boolean {
    const { maxPoolSize, maxConnecting } = this.options;
    return (
      this.connecting < maxConnecting &&
      (maxPoolSize === 0 || this.totalConnectionCount < maxPoolSize)
    );
  }

  /** Serves queued callers in order: failures while not ready, idle connections, then new ones */
  private drain(): void {
    if (this.draining) return;
    this.draining = true;

    for (let request = this.queue.first(); request != null; request = this.queue.first()) {
      if (request.abandoned) {
        this.queue.shift();
        continue;
      }

      if (this.status !== 'ready') {
        const error = this.closed ? new PoolClosedError(this) : new PoolClearedError(this);
        this.reportCheckOutFailure(request, this.closed ? 'poolClosed' : 'connectionError', error);
        this.queue.shift();
        request.fail(error);
        continue;
      }

      const connection = this.idle.shift();
      if (connection == null) break;
      if (this.retireIfUnusable(connection)) continue;

      this.queue.shift();
      this.handOut(connection, request);
    }

    while (this.queue.length > 0 && this.canOpenConnection()) {
      const request = this.queue.shift();
      if (request == null || request.abandoned) continue;
      this.establishFor(request);
    }

    this.draining = false;
  }

  private establishFor(request: PendingCheckout): void {
    this.establish().then(
      connection => {
        if (request.abandoned) {
          this.idle.push(connection);
        } else {
          this.handOut(connection, request);
        }
        process.nextTick(() => this.drain());
      },
      (error: Error) => {
        if (!request.abandoned) {
          this.reportCheckOutFailure(request, 'connectionError', error);
          request.fail(error);
        }
        process.nextTick(() => this.drain());
      }
    );
  }
}

function withDefaults(options: ConnectionPoolOptions): ResolvedPoolOptions {
  const d = POOL_DEFAULTS;
  return {
    ...options,
    connectTimeoutMS: options.connectTimeoutMS ?? d.connectTimeoutMS,
    socketTimeoutMS: options.socketTimeoutMS ?? d.socketTimeoutMS,
    maxPoolSize: options.maxPoolSize ?? d.maxPoolSize,
    minPoolSize: options.minPoolSize ?? d.minPoolSize,
    maxConnecting: options.maxConnecting ?? d.maxConnecting,
    maxIdleTimeMS: options.maxIdleTimeMS ?? d.maxIdleTimeMS,
    waitQueueTimeoutMS: options.waitQueueTimeoutMS ?? d.waitQueueTimeoutMS,
    minPoolSizeCheckFrequencyMS:
      options.minPoolSizeCheckFrequencyMS ?? d.minPoolSizeCheckFrequencyMS
  };
}
