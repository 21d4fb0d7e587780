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
import type { AnyError } from '../error';
import { calculateDurationInMs } from '../utils';
import type { ConnectionPoolOptions } from './connection_pool';

/** @internal */
export type PoolRef = { readonly address: string };
/** @internal */
export type ConnectionRef = { readonly id: number | '<monitor>' };

/**
 * Common shape of every event a connection pool publishes.
 * @public
 * @category Event
 */
export abstract class ConnectionPoolMonitoringEvent {
  time: Date = new Date();
  /** host:port of the pool */
  address: string;

  /** @internal */
  abstract name:
    | typeof CONNECTION_CHECK_OUT_FAILED
    | typeof CONNECTION_CHECK_OUT_STARTED
    | typeof CONNECTION_CHECKED_IN
    | typeof CONNECTION_CHECKED_OUT
    | typeof CONNECTION_CLOSED
    | typeof CONNECTION_CREATED
    | typeof CONNECTION_POOL_CLEARED
    | typeof CONNECTION_POOL_CLOSED
    | typeof CONNECTION_POOL_CREATED
    | typeof CONNECTION_POOL_READY
    | typeof CONNECTION_READY;

  /** @internal */
  constructor(pool: PoolRef) {
    this.address = pool.address;
  }
}

/**
 * Events about one connection of the pool.
 * @public
 */
export abstract class PooledConnectionEvent extends ConnectionPoolMonitoringEvent {
  connectionId: number | '<monitor>';

  /** @internal */
  constructor(pool: PoolRef, connection: ConnectionRef) {
    super(pool);
    this.connectionId = connection.id;
  }
}

/** The pool options reported when a pool is created */
export type ConnectionPoolEventOptions = Pick<
  ConnectionPoolOptions,
  'maxPoolSize' | 'minPoolSize' | 'maxConnecting' | 'maxIdleTimeMS' | 'waitQueueTimeoutMS'
>;

/** @public @category Event */
export class ConnectionPoolCreatedEvent extends ConnectionPoolMonitoringEvent {
  /** @internal */
  name = CONNECTION_POOL_CREATED;
  options: ConnectionPoolEventOptions;

  /** @internal */
  constructor(pool: PoolRef & { options: Required<ConnectionPoolEventOptions> }) {
    super(pool);
    const { maxPoolSize, minPoolSize, maxConnecting, maxIdleTimeMS, waitQueueTimeoutMS } =
      pool.options;
    this.options = { maxPoolSize, minPoolSize, maxConnecting, maxIdleTimeMS, waitQueueTimeoutMS };
  }
}

/** @public @category Event */
export class ConnectionPoolReadyEvent extends ConnectionPoolMonitoringEvent {
  /** @internal */
  name = CONNECTION_POOL_READY;
}

/** @public @category Event */
export class ConnectionPoolClosedEvent extends ConnectionPoolMonitoringEvent {
  /** @internal */
  name = CONNECTION_POOL_CLOSED;
}

/**
 * The pool moved to a new generation and paused.
 * @public
 * @category Event
 */
export class ConnectionPoolClearedEvent extends ConnectionPoolMonitoringEvent {
  /** @internal */
  name = CONNECTION_POOL_CLEARED;
  /** Set only when checked out connections were closed too */
  interruptInUseConnections?: boolean;

  /** @internal */
  constructor(pool: PoolRef, options: { interruptInUseConnections?: boolean } = {}) {
    super(pool);
    if (options.interruptInUseConnections === true) {
      this.interruptInUseConnections = true;
    }
  }
}

/** @public @category Event */
export class ConnectionCreatedEvent extends PooledConnectionEvent {
  /** @internal */
  name = CONNECTION_CREATED;
}

/**
 * A connection finished its handshake.
 * @public
 * @category Event
 */
export class ConnectionReadyEvent extends PooledConnectionEvent {
  /** @internal */
  name = CONNECTION_READY;
  durationMS: number;

  /** @internal */
  constructor(pool: PoolRef, connection: ConnectionRef, createdAt: number) {
    super(pool, connection);
    this.durationMS = calculateDurationInMs(createdAt);
  }
}

/** @public */
export type ConnectionClosedReason = 'stale' | 'idle' | 'error' | 'dropped' | 'poolClosed';

/** @public @category Event */
export class ConnectionClosedEvent extends PooledConnectionEvent {
  /** @internal */
  name = CONNECTION_CLOSED;
  reason: ConnectionClosedReason;
  /** Set for the `error` reason when the failure is known */
  error: AnyError | null;

  /** @internal */
  constructor(
    pool: PoolRef,
    connection: ConnectionRef,
    reason: ConnectionClosedReason,
    error?: AnyError
  ) {
    super(pool, connection);
    this.reason = reason;
    this.error = error ?? null;
  }
}

/** @public @category Event */
export class ConnectionCheckOutStartedEvent extends ConnectionPoolMonitoringEvent {
  /** @internal */
  name = CONNECTION_CHECK_OUT_STARTED;
}

/** @public */
export type ConnectionCheckOutFailedReason = 'poolClosed' | 'timeout' | 'connectionError';

/** @public @category Event */
export class ConnectionCheckOutFailedEvent extends ConnectionPoolMonitoringEvent {
  /** @internal */
  name = CONNECTION_CHECK_OUT_FAILED;
  reason: ConnectionCheckOutFailedReason;
  /** @internal */
  error?: AnyError;
  /** Time the caller spent waiting */
  durationMS: number;

  /** @internal */
  constructor(
    pool: PoolRef,
    reason: ConnectionCheckOutFailedReason,
    startedAt: number,
    error?: AnyError
  ) {
    super(pool);
    this.reason = reason;
    this.error = error;
    this.durationMS = calculateDurationInMs(startedAt);
  }
}

/** @public @category Event */
export class ConnectionCheckedOutEvent extends PooledConnectionEvent {
  /** @internal */
  name = CONNECTION_CHECKED_OUT;
  /** Time the caller spent waiting */
  durationMS: number;

  /** @internal */
  constructor(pool: PoolRef, connection: ConnectionRef, startedAt: number) {
    super(pool, connection);
    this.durationMS = calculateDurationInMs(startedAt);
  }
}

/** @public @category Event */
export class ConnectionCheckedInEvent extends PooledConnectionEvent {
  /** @internal */
  name = CONNECTION_CHECKED_IN;
}
