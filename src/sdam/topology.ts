import type { Connection, TransportFactory } from '../cmap/connection';
import type { ConnectionPoolEvents } from '../cmap/connection_pool';
import {
  CLOSE,
  CMAP_EVENTS,
  CONNECT,
  HEARTBEAT_EVENTS,
  SERVER_CLOSED,
  SERVER_DESCRIPTION_CHANGED,
  SERVER_OPENING,
  SERVER_SELECTION_FAILED,
  SERVER_SELECTION_STARTED,
  SERVER_SELECTION_SUCCEEDED,
  TOPOLOGY_CLOSED,
  TOPOLOGY_DESCRIPTION_CHANGED,
  TOPOLOGY_OPENING,
  WAITING_FOR_SUITABLE_SERVER
} from '../constants';
import {
  type AnyError,
  DriverCompatibilityError,
  DriverError,
  DriverErrorLabel,
  DriverServerSelectionError,
  DriverStalePrimaryError,
  DriverTopologyClosedError
} from '../error';
import { DriverLogger, LoggableComponent, type LoggerClientOptions } from '../logger';
import { ReadPreference } from '../read_preference';
import { Timeout, TimeoutError } from '../timeout';
import { TypedEventEmitter } from '../types';
import {
  type EventEmitterWithState,
  type HostAddress,
  List,
  makeStateMachine,
  now,
  promiseWithResolvers,
  shuffle
} from '../utils';
import {
  ServerType,
  STATE_CLOSED,
  STATE_CLOSING,
  STATE_CONNECTED,
  STATE_CONNECTING,
  TopologyType
} from './common';
import {
  ServerClosedEvent,
  ServerDescriptionChangedEvent,
  ServerOpeningEvent,
  TopologyClosedEvent,
  TopologyDescriptionChangedEvent,
  TopologyOpeningEvent
} from './events';
import type { ServerMonitoringMode } from './monitor';
import { type CheckInOutcome, Server, type ServerEvents, type ServerOptions } from './server';
import { compareTopologyVersion, ServerDescription } from './server_description';
import { readPreferenceServerSelector, type ServerSelector } from './server_selection';
import {
  type ServerSelectionCriteria,
  ServerSelectionFailedEvent,
  ServerSelectionStartedEvent,
  ServerSelectionSucceededEvent,
  WaitingForSuitableServerEvent
} from './server_selection_events';
import { TopologyDescription } from './topology_description';

let nextTopologyId = 0;

type TopologyState =
  | typeof STATE_CLOSED
  | typeof STATE_CONNECTING
  | typeof STATE_CONNECTED
  | typeof STATE_CLOSING;

const stateTransition = makeStateMachine<TopologyState>({
  [STATE_CLOSED]: [STATE_CLOSED, STATE_CONNECTING],
  [STATE_CONNECTING]: [STATE_CONNECTING, STATE_CLOSING, STATE_CONNECTED, STATE_CLOSED],
  [STATE_CONNECTED]: [STATE_CONNECTED, STATE_CLOSING, STATE_CLOSED],
  [STATE_CLOSING]: [STATE_CLOSING, STATE_CLOSED]
});

/** A `selectServer` call parked until some server matches or its deadline passes */
export interface ServerSelectionRequest {
  criteria: ServerSelectionCriteria;
  selector: ServerSelector;
  operationName: string | undefined;
  startedAt: number;
  timeoutMS: number;
  /** Set once the caller has stopped waiting */
  settled: boolean;
  /** Set once `waitingForSuitableServer` was published for this request */
  announcedWaiting: boolean;
  resolve(server: Server): void;
  reject(error: AnyError): void;
}

/**
 * Configuration of a topology after `resolveOptions` applied defaults and validation.
 * @public
 */
export interface TopologyOptions extends LoggerClientOptions {
  hosts: HostAddress[];
  transportFactory: TransportFactory;
  /** Expected replica set name; members of any other set are dropped */
  replicaSet?: string;
  /** Talk to the one seed only, never discovering other members */
  directConnection: boolean;
  loadBalanced: boolean;
  heartbeatFrequencyMS: number;
  minHeartbeatFrequencyMS: number;
  connectTimeoutMS: number;
  socketTimeoutMS: number;
  /** Default limit on `selectServer`; also bounds checkouts when `waitQueueTimeoutMS` is 0 */
  serverSelectionTimeoutMS: number;
  localThresholdMS: number;
  serverMonitoringMode: ServerMonitoringMode;
  maxPoolSize: number;
  minPoolSize: number;
  maxConnecting: number;
  maxIdleTimeMS: number;
  waitQueueTimeoutMS: number;
  /** @internal */
  minPoolSizeCheckFrequencyMS?: number;
  /** What `connect` waits for when called without one */
  readPreference: ReadPreference;
}

/** @internal */
export interface TopologyPrivate {
  id: number;
  options: Readonly<TopologyOptions>;
  state: TopologyState;
  /** Set by `close`; there is no reconnecting afterwards */
  closed: boolean;
  description: TopologyDescription;
  /** One server per address of the current description */
  servers: Map<string, Server>;
  /** The server each leased connection belongs to */
  leases: WeakMap<Connection, Server>;
}

/** @public */
export interface ConnectOptions {
  readPreference?: ReadPreference;
}

/** @public */
export interface SelectServerOptions {
  /** Overrides the topology's `serverSelectionTimeoutMS`; 0 waits forever */
  serverSelectionTimeoutMS?: number;
  /** Name reported in the selection events */
  operationName?: string;
}

/** @public */
export type TopologyEvents = {
  /** @internal */
  connect(topology: Topology): void;
  serverOpening(event: ServerOpeningEvent): void;
  serverClosed(event: ServerClosedEvent): void;
  serverDescriptionChanged(event: ServerDescriptionChangedEvent): void;
  topologyClosed(event: TopologyClosedEvent): void;
  topologyOpening(event: TopologyOpeningEvent): void;
  topologyDescriptionChanged(event: TopologyDescriptionChangedEvent): void;
  serverSelectionStarted(event: ServerSelectionStartedEvent): void;
  serverSelectionFailed(event: ServerSelectionFailedEvent): void;
  serverSelectionSucceeded(event: ServerSelectionSucceededEvent): void;
  waitingForSuitableServer(event: WaitingForSuitableServerEvent): void;
  /** @internal */
  close(): void;
} & Pick<
  ServerEvents,
  'serverHeartbeatStarted' | 'serverHeartbeatSucceeded' | 'serverHeartbeatFailed'
> &
  Omit<ConnectionPoolEvents, 'connectionCreationFailed'> &
  EventEmitterWithState;

/**
 * Tracks a deployment: owns one `Server` per known address, applies every description the
 * servers report, and hands out servers that match a selection criterion.
 * @public
 */
export class Topology extends TypedEventEmitter<TopologyEvents> {
  /** @internal */
  s: TopologyPrivate;
  /** Pending `selectServer` calls in arrival order */
  waitQueue = new List<ServerSelectionRequest>();

  private connecting?: Promise<Topology>;

  /** @event */
  static readonly SERVER_OPENING = SERVER_OPENING;
  /** @event */
  static readonly SERVER_CLOSED = SERVER_CLOSED;
  /** @event */
  static readonly SERVER_DESCRIPTION_CHANGED = SERVER_DESCRIPTION_CHANGED;
  /** @event */
  static readonly TOPOLOGY_OPENING = TOPOLOGY_OPENING;
  /** @event */
  static readonly TOPOLOGY_CLOSED = TOPOLOGY_CLOSED;
  /** @event */
  static readonly TOPOLOGY_DESCRIPTION_CHANGED = TOPOLOGY_DESCRIPTION_CHANGED;
  /** @event */
  static readonly SERVER_SELECTION_STARTED = SERVER_SELECTION_STARTED;
  /** @event */
  static readonly SERVER_SELECTION_FAILED = SERVER_SELECTION_FAILED;
  /** @event */
  static readonly SERVER_SELECTION_SUCCEEDED = SERVER_SELECTION_SUCCEEDED;
  /** @event */
  static readonly WAITING_FOR_SUITABLE_SERVER = WAITING_FOR_SUITABLE_SERVER;
  /** @event */
  static readonly CONNECT = CONNECT;
  /** @event */
  static readonly CLOSE = CLOSE;

  constructor(options: Readonly<TopologyOptions>) {
    super();

    const seeds = new Map(
      options.hosts.map(host => [host.toString(), new ServerDescription(host)] as const)
    );

    this.s = {
      id: nextTopologyId++,
      options,
      state: STATE_CLOSED,
      closed: false,
      description: new TopologyDescription(
        initialTopologyType(options),
        seeds,
        options.replicaSet,
        undefined,
        undefined,
        undefined,
        options
      ),
      servers: new Map(),
      leases: new WeakMap()
    };

    this.logger = new DriverLogger(DriverLogger.resolveOptions(process.env, options));
    this.component = LoggableComponent.TOPOLOGY;
  }

  get description(): TopologyDescription {
    return this.s.description;
  }

  get loadBalanced(): boolean {
    return this.s.options.loadBalanced;
  }

  isConnected(): boolean {
    return this.s.state === STATE_CONNECTED;
  }

  isDestroyed(): boolean {
    return this.s.closed;
  }

  /**
   * Starts monitoring the seeds and waits until a server matching `readPreference` (the
   * configured one by default) can be selected. Concurrent calls share one attempt. A failed
   * attempt closes the topology.
   */
  async connect(options?: ConnectOptions): Promise<Topology> {
    if (this.s.closed) {
      throw new DriverTopologyClosedError();
    }

    this.connecting ??= this.openAndWait(options?.readPreference);
    try {
      return await this.connecting;
    } finally {
      this.connecting = undefined;
    }
  }

  private async openAndWait(readPreference?: ReadPreference): Promise<Topology> {
    if (this.s.state === STATE_CONNECTED) {
      return this;
    }

    if (this.s.state === STATE_CLOSED) {
      this.open();
    }

    try {
      await this.selectServer(readPreference ?? this.s.options.readPreference, {
        operationName: 'connect'
      });
    } catch (error) {
      this.close();
      throw error;
    }

    if (this.s.state === STATE_CONNECTING) {
      stateTransition(this, STATE_CONNECTED);
      this.emit(Topology.CONNECT, this);
    }
    return this;
  }

  private open(): void {
    stateTransition(this, STATE_CONNECTING);

    this.emitAndLog(Topology.TOPOLOGY_OPENING, new TopologyOpeningEvent(this.s.id));
    this.emitAndLog(
      Topology.TOPOLOGY_DESCRIPTION_CHANGED,
      new TopologyDescriptionChangedEvent(
        this.s.id,
        new TopologyDescription(TopologyType.Unknown),
        this.s.description
      )
    );

    const seeds = Array.from(this.s.description.servers.values());
    for (const seed of seeds) {
      this.s.servers.set(seed.address, this.startServer(seed));
    }

    // nothing monitors a load balancer, so its only description is issued here
    if (this.s.options.loadBalanced) {
      for (const seed of seeds) {
        this.serverUpdateHandler(
          new ServerDescription(seed.hostAddress, undefined, { loadBalanced: true })
        );
      }
    }
  }

  /**
   * Closes every server and fails pending selections with `DriverTopologyClosedError`.
   * Connections already checked out stay usable until their owners return them.
   */
  close(): void {
    if (this.s.closed) return;
    this.s.closed = true;

    if (this.s.state !== STATE_CLOSED) {
      stateTransition(this, STATE_CLOSING);

      for (const server of this.s.servers.values()) {
        this.stopServer(server);
      }
      this.s.servers.clear();
      this.rejectAllWaiting(new DriverTopologyClosedError());

      stateTransition(this, STATE_CLOSED);
      this.emitAndLog(Topology.TOPOLOGY_CLOSED, new TopologyClosedEvent(this.s.id));
    }

    this.emit(Topology.CLOSE);
  }

  /**
   * Waits for a server that matches `criteria` and picks one of the matches at random.
   *
   * @param criteria - a read preference, the name of a read preference mode, or a selector
   */
  async selectServer(
    criteria: ServerSelectionCriteria,
    options: SelectServerOptions = {}
  ): Promise<Server> {
    const timeoutMS = options.serverSelectionTimeoutMS ?? this.s.options.serverSelectionTimeoutMS;
    const started = new ServerSelectionStartedEvent(
      criteria,
      options.operationName,
      this.description
    );
    this.emit(Topology.SERVER_SELECTION_STARTED, started);
    this.logger?.debug(LoggableComponent.SERVER_SELECTION, started);

    const { promise, resolve, reject } = promiseWithResolvers<Server>();
    const request: ServerSelectionRequest = {
      criteria,
      selector: toSelector(criteria),
      operationName: options.operationName,
      startedAt: now(),
      timeoutMS,
      settled: false,
      announcedWaiting: false,
      resolve,
      reject
    };
    this.waitQueue.push(request);

    const deadline = Timeout.expires(timeoutMS);
    this.serveWaitQueue();
    try {
      return await Promise.race([promise, deadline]);
    } catch (error) {
      if (!TimeoutError.is(error)) throw error;

      request.settled = true;
      this.waitQueue.prune(member => member === request);
      const timedOut = new DriverServerSelectionError(
        `Server selection timed out after ${timeoutMS} ms (selector: ${started.selector})`,
        this.description
      );
      this.publishSelectionFailure(request, timedOut);
      throw timedOut;
    } finally {
      deadline.clear();
    }
  }

  /**
   * Leases a connection from the server's pool; hand it back with `checkInConnection`. The
   * wait is bounded by `waitQueueTimeoutMS`, or by `serverSelectionTimeoutMS` when that is 0.
   */
  async checkOutConnection(server: Server): Promise<Connection> {
    const { waitQueueTimeoutMS, serverSelectionTimeoutMS } = this.s.options;
    const connection = await server.checkOut({
      waitQueueTimeoutMS: waitQueueTimeoutMS > 0 ? waitQueueTimeoutMS : serverSelectionTimeoutMS
    });
    this.s.leases.set(connection, server);
    return connection;
  }

  /**
   * Returns a leased connection with the outcome of the operation that used it. An error
   * outcome may mark the server Unknown and clear its pool. A connection whose server has left
   * the topology is destroyed.
   */
  checkInConnection(connection: Connection, outcome: CheckInOutcome): void {
    const server = this.s.leases.get(connection);
    this.s.leases.delete(connection);

    if (server != null && this.s.servers.get(server.name) === server) {
      server.checkIn(connection, outcome);
    } else {
      connection.destroy();
    }
  }

  /**
   * Yields every published description change after the call, and finishes when the topology
   * closes.
   */
  async *watch(): AsyncGenerator<TopologyDescriptionChangedEvent, void, undefined> {
    const pending = new List<TopologyDescriptionChangedEvent>();
    let done = this.s.closed;
    let notify: (() => void) | null = null;

    const onChange = (event: TopologyDescriptionChangedEvent) => {
      pending.push(event);
      notify?.();
    };
    const onClose = () => {
      done = true;
      notify?.();
    };

    this.on(Topology.TOPOLOGY_DESCRIPTION_CHANGED, onChange);
    this.on(Topology.CLOSE, onClose);
    try {
      for (;;) {
        const next = pending.shift();
        if (next != null) {
          yield next;
        } else if (done) {
          return;
        } else {
          const { promise, resolve } = promiseWithResolvers<void>();
          notify = resolve;
          await promise;
          notify = null;
        }
      }
    } finally {
      this.off(Topology.TOPOLOGY_DESCRIPTION_CHANGED, onChange);
      this.off(Topology.CLOSE, onClose);
    }
  }

  /**
   * Applies a description reported for one of the servers. Descriptions whose topology version
   * is older than the stored one, or equal to it with different content, are dropped. An
   * unchanged description still refreshes the stored round trip time but publishes nothing.
   */
  serverUpdateHandler(incoming: ServerDescription): void {
    const previous = this.s.description.servers.get(incoming.address);
    if (previous == null) return;

    const unchanged = previous.equals(incoming);
    const order = compareTopologyVersion(previous.topologyVersion, incoming.topologyVersion);
    if (order > 0 || (order === 0 && !unchanged)) {
      this.logger?.debug(
        LoggableComponent.TOPOLOGY,
        `Ignoring out-of-order description of ${incoming.address}: ` +
          `topologyVersion ${formatTopologyVersion(incoming)} is not newer than ` +
          formatTopologyVersion(previous)
      );
      return;
    }

    const before = this.s.description;
    this.s.description = before.update(incoming);
    const stored = this.s.description.servers.get(incoming.address);

    const storedError = stored?.error;
    if (incoming.type === ServerType.RSPrimary && storedError instanceof DriverStalePrimaryError) {
      this.logger?.debug(LoggableComponent.TOPOLOGY, storedError.message);
    }

    if (!unchanged && stored != null) {
      this.emitAndLog(
        Topology.SERVER_DESCRIPTION_CHANGED,
        new ServerDescriptionChangedEvent(this.s.id, incoming.address, previous, stored)
      );
    }

    this.reconcileServers(incoming);

    if (this.waitQueue.length > 0) {
      this.serveWaitQueue();
    }

    if (!unchanged) {
      this.emitAndLog(
        Topology.TOPOLOGY_DESCRIPTION_CHANGED,
        new TopologyDescriptionChangedEvent(this.s.id, before, this.s.description)
      );
    }
  }

  private startServer(description: ServerDescription): Server {
    const opening = new ServerOpeningEvent(this.s.id, description.address);
    this.emitAndLog(Topology.SERVER_OPENING, opening);

    const server = new Server(description, this.serverOptions());
    for (const event of [...HEARTBEAT_EVENTS, ...CMAP_EVENTS]) {
      server.on(event, (e: any) => this.emit(event, e));
    }
    server.on(Server.DESCRIPTION_RECEIVED, reported => this.serverUpdateHandler(reported));

    server.connect();
    return server;
  }

  private stopServer(server: Server): void {
    server.removeAllListeners();
    server.close();
    this.emitAndLog(Topology.SERVER_CLOSED, new ServerClosedEvent(this.s.id, server.name));
  }

  private serverOptions(): ServerOptions {
    const options = this.s.options;
    return {
      topologyId: this.s.id,
      transportFactory: options.transportFactory,
      connectTimeoutMS: options.connectTimeoutMS,
      socketTimeoutMS: options.socketTimeoutMS,
      heartbeatFrequencyMS: options.heartbeatFrequencyMS,
      minHeartbeatFrequencyMS: options.minHeartbeatFrequencyMS,
      serverMonitoringMode: options.serverMonitoringMode,
      loadBalanced: options.loadBalanced,
      maxPoolSize: options.maxPoolSize,
      minPoolSize: options.minPoolSize,
      maxConnecting: options.maxConnecting,
      maxIdleTimeMS: options.maxIdleTimeMS,
      waitQueueTimeoutMS: options.waitQueueTimeoutMS,
      minPoolSizeCheckFrequencyMS: options.minPoolSizeCheckFrequencyMS,
      logger: this.logger
    };
  }

  /**
   * Brings the servers in line with the description just applied: updates the reporting
   * server's pool, starts servers for new addresses and stops servers for removed ones.
   */
  private reconcileServers(incoming: ServerDescription): void {
    const reporting = this.s.servers.get(incoming.address);
    const stored = this.description.servers.get(incoming.address);
    if (reporting != null && stored != null) {
      reporting.s.description = stored;
      this.updatePool(reporting, incoming, stored);
    }

    for (const description of this.description.servers.values()) {
      if (!this.s.servers.has(description.address)) {
        this.s.servers.set(description.address, this.startServer(description));
      }
    }

    for (const [address, server] of Array.from(this.s.servers)) {
      if (!this.description.hasServer(address)) {
        this.s.servers.delete(address);
        this.stopServer(server);
      }
    }
  }

  /** Clears the pool for a failure labelled ResetPool, or marks it ready once usable */
  private updatePool(server: Server, incoming: ServerDescription, stored: ServerDescription) {
    const error = incoming.error;
    if (error instanceof DriverError && error.hasErrorLabel(DriverErrorLabel.ResetPool)) {
      server.pool.clear({
        error,
        interruptInUseConnections: error.hasErrorLabel(DriverErrorLabel.InterruptInUseConnections)
      });
      return;
    }

    if (stored.error != null) return;
    const usable =
      stored.isDataBearing ||
      (stored.type !== ServerType.Unknown && this.description.type === TopologyType.Single);
    if (usable) {
      server.pool.ready();
    }
  }

  private publishSelectionFailure(request: ServerSelectionRequest, failure: AnyError): void {
    const event = new ServerSelectionFailedEvent(
      request.criteria,
      request.operationName,
      this.description,
      failure
    );
    this.emit(Topology.SERVER_SELECTION_FAILED, event);
    this.logger?.debug(LoggableComponent.SERVER_SELECTION, event);
  }

  private failRequest(request: ServerSelectionRequest, error: AnyError): void {
    request.settled = true;
    this.publishSelectionFailure(request, error);
    request.reject(error);
  }

  private rejectAllWaiting(error: DriverError): void {
    let request = this.waitQueue.shift();
    while (request != null) {
      if (!request.settled) {
        this.failRequest(request, error);
      }
      request = this.waitQueue.shift();
    }
  }

  /**
   * Runs every queued request against the current description once. Requests with no match
   * go back on the queue, and every monitor is asked for an early check.
   */
  private serveWaitQueue(): void {
    if (this.s.closed) {
      this.rejectAllWaiting(new DriverTopologyClosedError());
      return;
    }

    const description = this.description;
    if (description.compatibilityError != null) {
      this.rejectAllWaiting(new DriverCompatibilityError(description.compatibilityError));
      return;
    }

    const candidates = Array.from(description.servers.values());
    for (let remaining = this.waitQueue.length; remaining > 0; remaining--) {
      const request = this.waitQueue.shift();
      if (request == null || request.settled) continue;

      let matches: ServerDescription[];
      try {
        matches = request.selector(description, candidates);
      } catch (cause) {
        this.failRequest(request, cause instanceof Error ? cause : new Error(String(cause)));
        continue;
      }

      if (matches.length === 0) {
        this.announceWaiting(request, description);
        this.waitQueue.push(request);
        continue;
      }

      const [chosen] = shuffle(matches, 1);
      const server = this.s.servers.get(chosen.address);
      if (server == null) {
        this.failRequest(
          request,
          new DriverServerSelectionError(
            `Selected server ${chosen.address} is not part of the topology`,
            description
          )
        );
        continue;
      }

      request.settled = true;
      const event = new ServerSelectionSucceededEvent(
        request.criteria,
        request.operationName,
        description,
        server.description.host,
        server.description.port
      );
      this.emit(Topology.SERVER_SELECTION_SUCCEEDED, event);
      this.logger?.debug(LoggableComponent.SERVER_SELECTION, event);
      request.resolve(server);
    }

    if (this.waitQueue.length > 0) {
      for (const server of this.s.servers.values()) {
        process.nextTick(() => server.requestCheck());
      }
    }
  }

  private announceWaiting(request: ServerSelectionRequest, description: TopologyDescription) {
    if (request.announcedWaiting) return;
    request.announcedWaiting = true;

    const remainingTimeMS =
      request.timeoutMS === 0 ? -1 : request.timeoutMS - (now() - request.startedAt);
    const event = new WaitingForSuitableServerEvent(
      request.criteria,
      request.operationName,
      description,
      remainingTimeMS
    );
    this.emit(Topology.WAITING_FOR_SUITABLE_SERVER, event);
    this.logger?.info(LoggableComponent.SERVER_SELECTION, event);
  }
}

function toSelector(criteria: ServerSelectionCriteria): ServerSelector {
  if (typeof criteria === 'function') return criteria;
  const readPreference =
    typeof criteria === 'string' ? ReadPreference.fromString(criteria) : criteria;
  return readPreferenceServerSelector(readPreference);
}

function formatTopologyVersion(description: ServerDescription): string {
  const version = description.topologyVersion;
  return version == null
    ? 'none'
    : `${version.processId.toHexString()}:${version.counter.toString()}`;
}

function initialTopologyType(options: Readonly<TopologyOptions>): TopologyType {
  if (options.directConnection) return TopologyType.Single;
  if (options.loadBalanced) return TopologyType.LoadBalanced;
  if (options.replicaSet) return TopologyType.ReplicaSetNoPrimary;
  return TopologyType.Unknown;
}
