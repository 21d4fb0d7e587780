import type { Connection, TransportFactory } from '../cmap/connection';
import {
  ConnectionPool,
  type ConnectionPoolEvents,
  type ConnectionPoolOptions
} from '../cmap/connection_pool';
import {
  CLOSED,
  CMAP_EVENTS,
  CONNECT,
  DESCRIPTION_RECEIVED,
  HEARTBEAT_EVENTS,
  SERVER_HEARTBEAT_FAILED,
  SERVER_HEARTBEAT_STARTED,
  SERVER_HEARTBEAT_SUCCEEDED
} from '../constants';
import {
  type AnyError,
  DriverError,
  DriverErrorLabel,
  DriverNetworkError,
  DriverNetworkTimeoutError,
  type DriverServerError,
  isNetworkErrorBeforeHandshake,
  isNodeShuttingDownError,
  isStateChangeError
} from '../error';
import type { DriverLogger } from '../logger';
import { TypedEventEmitter } from '../types';
import { type EventEmitterWithState, makeStateMachine, noop } from '../utils';
import { STATE_CLOSED, STATE_CLOSING, STATE_CONNECTED, STATE_CONNECTING } from './common';
import type {
  ServerHeartbeatFailedEvent,
  ServerHeartbeatStartedEvent,
  ServerHeartbeatSucceededEvent
} from './events';
import { Monitor, type ServerMonitoringMode } from './monitor';
import {
  compareTopologyVersion,
  readTopologyVersion,
  ServerDescription
} from './server_description';

type ServerState =
  | typeof STATE_CLOSED
  | typeof STATE_CONNECTING
  | typeof STATE_CONNECTED
  | typeof STATE_CLOSING;

const stateTransition = makeStateMachine<ServerState>({
  [STATE_CLOSED]: [STATE_CLOSED, STATE_CONNECTING],
  [STATE_CONNECTING]: [STATE_CONNECTING, STATE_CLOSING, STATE_CONNECTED, STATE_CLOSED],
  [STATE_CONNECTED]: [STATE_CONNECTED, STATE_CLOSING, STATE_CLOSED],
  [STATE_CLOSING]: [STATE_CLOSING, STATE_CLOSED]
});

/** Wire version of the last server release whose pools were cleared on every state change */
const MAX_WIRE_VERSION_CLEARING_ON_STATE_CHANGE = 7;

/** @internal */
export interface ServerOptions
  extends Omit<ConnectionPoolOptions, 'hostAddress' | 'logger' | 'transportFactory'> {
  topologyId: number;
  transportFactory: TransportFactory;
  connectTimeoutMS: number;
  heartbeatFrequencyMS: number;
  minHeartbeatFrequencyMS: number;
  serverMonitoringMode: ServerMonitoringMode;
  /** Load balancers are never monitored */
  loadBalanced: boolean;
  logger?: DriverLogger;
}

/** @internal */
export interface ServerPrivate {
  /** The server description for this server */
  description: ServerDescription;
  /** A copy of the options used to construct this instance */
  options: ServerOptions;
  /** The current state of the Server */
  state: ServerState;
}

/**
 * How an operation ended on a checked out connection.
 * @public
 */
export type CheckInOutcome = { kind: 'healthy' } | { kind: 'error'; error: AnyError };

/** @public */
export type ServerEvents = {
  serverHeartbeatStarted(event: ServerHeartbeatStartedEvent): void;
  serverHeartbeatSucceeded(event: ServerHeartbeatSucceededEvent): void;
  serverHeartbeatFailed(event: ServerHeartbeatFailedEvent): void;
  /** @internal */
  connect(server: Server): void;
  descriptionReceived(description: ServerDescription): void;
  closed(): void;
} & Omit<ConnectionPoolEvents, 'connectionCreationFailed'> &
  EventEmitterWithState;

/**
 * One node of the topology: its connection pool and, outside load-balanced mode, its monitor.
 * Every description the server learns about is published as `descriptionReceived`; the
 * topology decides whether to apply it.
 * @internal
 */
export class Server extends TypedEventEmitter<ServerEvents> {
  /** @internal */
  s: ServerPrivate;
  /** @internal */
  pool: ConnectionPool;
  monitor: Monitor | null;

  /** @event */
  static readonly SERVER_HEARTBEAT_STARTED = SERVER_HEARTBEAT_STARTED;
  /** @event */
  static readonly SERVER_HEARTBEAT_SUCCEEDED = SERVER_HEARTBEAT_SUCCEEDED;
  /** @event */
  static readonly SERVER_HEARTBEAT_FAILED = SERVER_HEARTBEAT_FAILED;
  /** @event */
  static readonly CONNECT = CONNECT;
  /** @event */
  static readonly DESCRIPTION_RECEIVED = DESCRIPTION_RECEIVED;
  /** @event */
  static readonly CLOSED = CLOSED;

  constructor(description: ServerDescription, options: ServerOptions) {
    super();
    this.on('error', noop);

    this.pool = new ConnectionPool({
      hostAddress: description.hostAddress,
      transportFactory: options.transportFactory,
      connectTimeoutMS: options.connectTimeoutMS,
      socketTimeoutMS: options.socketTimeoutMS,
      maxPoolSize: options.maxPoolSize,
      minPoolSize: options.minPoolSize,
      maxConnecting: options.maxConnecting,
      maxIdleTimeMS: options.maxIdleTimeMS,
      waitQueueTimeoutMS: options.waitQueueTimeoutMS,
      minPoolSizeCheckFrequencyMS: options.minPoolSizeCheckFrequencyMS,
      logger: options.logger
    });

    this.s = {
      description,
      options,
      state: STATE_CLOSED
    };

    for (const event of CMAP_EVENTS) {
      this.pool.on(event, (e: any) => this.emit(event, e));
    }

    this.pool.on(ConnectionPool.CONNECTION_CREATION_FAILED, (error, generation) =>
      this.handleError(error, generation)
    );

    if (options.loadBalanced) {
      this.monitor = null;
      // monitoring is disabled in load balancing mode
      return;
    }

    this.monitor = new Monitor({
      hostAddress: description.hostAddress,
      topologyId: options.topologyId,
      transportFactory: options.transportFactory,
      connectTimeoutMS: options.connectTimeoutMS,
      heartbeatFrequencyMS: options.heartbeatFrequencyMS,
      minHeartbeatFrequencyMS: options.minHeartbeatFrequencyMS,
      serverMonitoringMode: options.serverMonitoringMode,
      logger: options.logger
    });

    for (const event of HEARTBEAT_EVENTS) {
      this.monitor.on(event, (e: any) => this.emit(event, e));
    }

    this.monitor.on(Monitor.RESET_SERVER, error => markServerUnknown(this, error));
    this.monitor.on(Server.SERVER_HEARTBEAT_SUCCEEDED, (event: ServerHeartbeatSucceededEvent) => {
      this.emit(
        Server.DESCRIPTION_RECEIVED,
        new ServerDescription(this.description.hostAddress, event.reply, {
          roundTripTime: this.monitor?.roundTripTime
        })
      );

      if (this.s.state === STATE_CONNECTING) {
        stateTransition(this, STATE_CONNECTED);
        this.emit(Server.CONNECT, this);
      }
    });
  }

  get description(): ServerDescription {
    return this.s.description;
  }

  get name(): string {
    return this.s.description.address;
  }

  get loadBalanced(): boolean {
    return this.s.options.loadBalanced;
  }

  /**
   * Initiate server connect
   */
  connect(): void {
    if (this.s.state !== STATE_CLOSED) {
      return;
    }

    stateTransition(this, STATE_CONNECTING);

    // A load balancer never leaves its initial description and has no monitor.
    if (!this.loadBalanced) {
      this.monitor?.connect();
    } else {
      stateTransition(this, STATE_CONNECTED);
      this.emit(Server.CONNECT, this);
    }
  }

  /** Stops monitoring and closes the pool. Checked out connections are left to their owners. */
  close(): void {
    if (this.s.state === STATE_CLOSED) {
      return;
    }

    stateTransition(this, STATE_CLOSING);

    this.monitor?.close();
    this.pool.close();

    stateTransition(this, STATE_CLOSED);
    this.emit(Server.CLOSED);
  }

  /**
   * Immediately schedule monitoring of this server. If there already an attempt being made
   * this will be a no-op.
   */
  requestCheck(): void {
    this.monitor?.requestCheck();
  }

  async checkOut(options?: { waitQueueTimeoutMS?: number }): Promise<Connection> {
    return await this.pool.checkOut(options);
  }

  /**
   * Returns a connection to the pool. An error outcome is first run through the error rules,
   * so a connection whose failure clears the pool is destroyed rather than reused.
   */
  checkIn(connection: Connection, outcome: CheckInOutcome): void {
    if (outcome.kind === 'error') {
      this.handleError(outcome.error, connection.generation);
    }

    this.pool.checkIn(connection);
  }

  /**
   * Applies the error rules to a failure seen on a connection of the given generation. Errors
   * from connections created before the last pool clear are ignored.
   * @internal
   */
  handleError(error: AnyError, connectionGeneration?: number): void {
    if (!(error instanceof DriverError)) {
      return;
    }

    if (connectionGeneration != null && connectionGeneration < this.pool.generation) {
      return;
    }

    const isNetworkNonTimeoutError =
      error instanceof DriverNetworkError && !(error instanceof DriverNetworkTimeoutError);
    const isNetworkTimeoutBeforeHandshakeError =
      error instanceof DriverNetworkError && isNetworkErrorBeforeHandshake(error);

    if (isNetworkNonTimeoutError || isNetworkTimeoutBeforeHandshakeError) {
      if (this.loadBalanced) {
        this.pool.clear({ error });
        return;
      }

      error.addErrorLabel(DriverErrorLabel.ResetPool);
      markServerUnknown(this, error);
      process.nextTick(() => this.requestCheck());
      return;
    }

    if (isStateChangeError(error) && shouldHandleStateChangeError(this, error)) {
      const shouldClearPool =
        this.description.maxWireVersion <= MAX_WIRE_VERSION_CLEARING_ON_STATE_CHANGE ||
        isNodeShuttingDownError(error);

      if (this.loadBalanced) {
        if (shouldClearPool) this.pool.clear({ error });
        return;
      }

      if (shouldClearPool) {
        error.addErrorLabel(DriverErrorLabel.ResetPool);
      }
      markServerUnknown(this, error);
      process.nextTick(() => this.requestCheck());
    }
  }
}

function markServerUnknown(server: Server, error: DriverError) {
  // Load balancer servers can never be marked unknown.
  if (server.loadBalanced) {
    return;
  }

  if (error instanceof DriverNetworkError && !(error instanceof DriverNetworkTimeoutError)) {
    server.monitor?.reset();
  }

  server.emit(
    Server.DESCRIPTION_RECEIVED,
    new ServerDescription(server.description.hostAddress, undefined, { error })
  );
}

function shouldHandleStateChangeError(server: Server, err: DriverServerError) {
  const stv = server.description.topologyVersion;
  const etv = readTopologyVersion(err.topologyVersion);
  return compareTopologyVersion(stv, etv) < 0;
}
