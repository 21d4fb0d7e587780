import { type Document } from 'bson';
import { clearTimeout, setTimeout } from 'timers';

import { connect, type MakeConnectionOptions } from '../cmap/connect';
import type { Connection, TransportFactory } from '../cmap/connection';
import {
  LEGACY_HELLO_COMMAND,
  RESET_SERVER,
  SERVER_HEARTBEAT_FAILED,
  SERVER_HEARTBEAT_STARTED,
  SERVER_HEARTBEAT_SUCCEEDED
} from '../constants';
import { DriverError, DriverErrorLabel, DriverNetworkTimeoutError } from '../error';
import { type DriverLogger, LoggableComponent } from '../logger';
import { TypedEventEmitter } from '../types';
import {
  calculateDurationInMs,
  type EventEmitterWithState,
  getFAASPlatform,
  type HostAddress,
  makeStateMachine,
  now
} from '../utils';
import { STATE_CLOSED, STATE_CLOSING } from './common';
import {
  ServerHeartbeatFailedEvent,
  ServerHeartbeatStartedEvent,
  ServerHeartbeatSucceededEvent
} from './events';
import { readTopologyVersion, type TopologyVersion } from './server_description';

const STATE_IDLE = 'idle';
const STATE_MONITORING = 'monitoring';
type MonitorState =
  | typeof STATE_IDLE
  | typeof STATE_MONITORING
  | typeof STATE_CLOSING
  | typeof STATE_CLOSED;

const stateTransition = makeStateMachine<MonitorState>({
  [STATE_CLOSING]: [STATE_CLOSING, STATE_IDLE, STATE_CLOSED],
  [STATE_CLOSED]: [STATE_CLOSED, STATE_MONITORING],
  [STATE_IDLE]: [STATE_IDLE, STATE_MONITORING, STATE_CLOSING],
  [STATE_MONITORING]: [STATE_MONITORING, STATE_IDLE, STATE_CLOSING]
});

/** @public */
export const ServerMonitoringMode = Object.freeze({
  auto: 'auto',
  poll: 'poll',
  stream: 'stream'
} as const);

/** @public */
export type ServerMonitoringMode = (typeof ServerMonitoringMode)[keyof typeof ServerMonitoringMode];

/** @internal */
export interface MonitorPrivate {
  state: MonitorState;
}

/** @public */
export interface MonitorOptions {
  hostAddress: HostAddress;
  /** Stamped on every heartbeat event */
  topologyId: number;
  transportFactory: TransportFactory;
  connectTimeoutMS: number;
  heartbeatFrequencyMS: number;
  minHeartbeatFrequencyMS: number;
  serverMonitoringMode: ServerMonitoringMode;
  /** @internal */
  logger?: DriverLogger;
}

/** @public */
export type MonitorEvents = {
  serverHeartbeatStarted(event: ServerHeartbeatStartedEvent): void;
  serverHeartbeatSucceeded(event: ServerHeartbeatSucceededEvent): void;
  serverHeartbeatFailed(event: ServerHeartbeatFailedEvent): void;
  resetServer(error: DriverError): void;
  close(): void;
} & EventEmitterWithState;

type MonitorTimings = Pick<
  MonitorOptions,
  'connectTimeoutMS' | 'heartbeatFrequencyMS' | 'minHeartbeatFrequencyMS' | 'serverMonitoringMode'
>;

/**
 * Checks one server with `hello` on a dedicated connection. Against a server that reports a
 * topology version, the monitor streams: each awaitable hello is answered when the server's
 * state changes or `heartbeatFrequencyMS` passes, and is reissued at once.
 * @internal
 */
export class Monitor extends TypedEventEmitter<MonitorEvents> {
  /** @internal */
  s: MonitorPrivate = { state: STATE_CLOSED };
  readonly address: string;
  readonly topologyId: number;
  readonly options: Readonly<MonitorTimings>;
  readonly connectOptions: Readonly<MakeConnectionOptions>;
  connection: Connection | null = null;
  /** From the last successful check; null until one succeeds and after a failure */
  topologyVersion: TopologyVersion | null = null;
  /** Whether the last check succeeded */
  knownServer = false;
  /** @internal In-flight work started under an older epoch is discarded */
  epoch = 0;
  /** @internal */
  interval?: MonitorInterval;
  rttPinger?: RTTPinger;
  private readonly inFaas: boolean;
  private readonly rttSampler = new RTTSampler();

  /** @event */
  static readonly SERVER_HEARTBEAT_STARTED = SERVER_HEARTBEAT_STARTED;
  /** @event */
  static readonly SERVER_HEARTBEAT_SUCCEEDED = SERVER_HEARTBEAT_SUCCEEDED;
  /** @event */
  static readonly SERVER_HEARTBEAT_FAILED = SERVER_HEARTBEAT_FAILED;
  /** @event */
  static readonly RESET_SERVER = RESET_SERVER;

  constructor(options: MonitorOptions) {
    super();
    const { hostAddress, transportFactory, connectTimeoutMS } = options;

    this.address = hostAddress.toString();
    this.topologyId = options.topologyId;
    this.options = Object.freeze({
      connectTimeoutMS,
      heartbeatFrequencyMS: options.heartbeatFrequencyMS,
      minHeartbeatFrequencyMS: options.minHeartbeatFrequencyMS,
      serverMonitoringMode: options.serverMonitoringMode
    });
    // monitoring connections are never pooled, so they stay at generation 0
    this.connectOptions = Object.freeze({
      id: '<monitor>' as const,
      generation: 0,
      hostAddress,
      transportFactory,
      connectTimeoutMS,
      socketTimeoutMS: connectTimeoutMS
    });
    this.inFaas = getFAASPlatform() != null;
    this.logger = options.logger;
    this.component = LoggableComponent.TOPOLOGY;
  }

  get roundTripTime(): number {
    return this.rttSampler.average();
  }

  get latestRtt(): number | null {
    return this.rttSampler.last;
  }

  private get closing(): boolean {
    return this.s.state === STATE_CLOSED || this.s.state === STATE_CLOSING;
  }

  connect(): void {
    if (this.s.state !== STATE_CLOSED) return;
    this.interval = this.schedule(true);
  }

  /** Checks as soon as `minHeartbeatFrequencyMS` allows; a no-op while a check runs. */
  requestCheck(): void {
    if (this.closing || this.s.state === STATE_MONITORING) return;
    this.interval?.wake();
  }

  /**
   * Drops the monitoring connection and waits a full heartbeat before checking again. Only a
   * monitor that was streaming is reset, since its awaited check may hang on a dead socket.
   */
  reset(): void {
    if (this.closing || this.topologyVersion == null) return;

    stateTransition(this, STATE_CLOSING);
    this.teardown();
    stateTransition(this, STATE_IDLE);
    this.interval = this.schedule(false);
  }

  close(): void {
    if (this.closing) return;

    stateTransition(this, STATE_CLOSING);
    this.teardown();
    this.emit('close');
    stateTransition(this, STATE_CLOSED);
  }

  addRttSample(rtt: number): void {
    this.rttSampler.addSample(rtt);
  }

  clearRttSamples(): void {
    this.rttSampler.clear();
  }

  private schedule(immediate: boolean): MonitorInterval {
    return new MonitorInterval(() => this.run(), {
      heartbeatFrequencyMS: this.options.heartbeatFrequencyMS,
      minHeartbeatFrequencyMS: this.options.minHeartbeatFrequencyMS,
      immediate,
      onError: error => {
        const reason = error instanceof Error ? error.message : String(error);
        const message = `Monitor for ${this.address} failed: ${reason}`;
        this.logger?.error(LoggableComponent.TOPOLOGY, message);
      }
    });
  }

  private teardown(): void {
    this.epoch += 1;
    this.interval?.stop();
    this.interval = undefined;
    this.stopPinger();
    this.connection?.destroy();
    this.connection = null;
    this.clearRttSamples();
  }

  private stopPinger(): void {
    this.rttPinger?.close();
    this.rttPinger = undefined;
  }

  private abandoned(epoch: number): boolean {
    return this.epoch !== epoch || this.closing;
  }

  private streaming(): boolean {
    // no topology version means the server cannot answer awaitable hellos
    if (this.topologyVersion == null) return false;
    const mode = this.options.serverMonitoringMode;
    if (mode === ServerMonitoringMode.poll) return false;
    if (mode === ServerMonitoringMode.stream) return true;
    return !this.inFaas;
  }

  /** One tick of the interval: a check, then awaited checks back to back while streaming */
  private async run(): Promise<void> {
    if (this.s.state === STATE_MONITORING) return;

    const epoch = this.epoch;
    stateTransition(this, STATE_MONITORING);
    try {
      let reply = await this.check(epoch);
      while (reply != null && !this.abandoned(epoch) && this.streaming()) {
        reply = await this.check(epoch);
      }
    } finally {
      if (!this.abandoned(epoch)) {
        stateTransition(this, STATE_IDLE);
      }
    }
  }

  /**
   * Runs one check and reports its outcome. When a streamed check of a known server fails,
   * the failure is reported first and a polled check over a new connection follows at once.
   *
   * @returns the hello reply, or null when the check failed or was abandoned
   */
  private async check(epoch: number): Promise<Document | null> {
    const awaited = this.connection != null && !this.connection.closed && this.streaming();
    const wasKnown = this.knownServer;

    try {
      return await this.heartbeat(epoch, awaited);
    } catch (error) {
      if (this.abandoned(epoch)) return null;
      this.reportFailure(error);
      if (!(awaited && wasKnown)) return null;
    }

    try {
      return await this.heartbeat(epoch, false);
    } catch (error) {
      if (!this.abandoned(epoch)) {
        this.reportFailure(error);
      }
      return null;
    }
  }

  private async heartbeat(epoch: number, awaited: boolean): Promise<Document | null> {
    this.emitAndLog(
      Monitor.SERVER_HEARTBEAT_STARTED,
      new ServerHeartbeatStartedEvent(this.topologyId, this.address, awaited)
    );
    if (awaited) {
      this.rttPinger ??= new RTTPinger(this);
    }

    const startedAt = now();
    let reply: Document;
    try {
      reply = await this.hello(epoch, awaited ? this.topologyVersion : null);
    } catch (error) {
      this.connection?.destroy();
      this.connection = null;
      if (!this.abandoned(epoch)) {
        const failed = new ServerHeartbeatFailedEvent(
          this.topologyId,
          this.address,
          calculateDurationInMs(startedAt),
          toError(error),
          awaited
        );
        this.emitAndLog(Monitor.SERVER_HEARTBEAT_FAILED, failed);
      }
      throw error;
    }

    if (this.abandoned(epoch)) return null;

    const duration = calculateDurationInMs(startedAt);
    if (!awaited) {
      // an awaited reply is held open by the server, so only polled checks measure latency
      this.addRttSample(duration);
      this.stopPinger();
    }

    this.topologyVersion = readTopologyVersion(reply.topologyVersion);
    this.knownServer = true;
    this.emitAndLog(
      Monitor.SERVER_HEARTBEAT_SUCCEEDED,
      new ServerHeartbeatSucceededEvent(this.topologyId, this.address, duration, reply, awaited)
    );
    return reply;
  }

  /** Sends `hello` on the monitoring connection, or opens one, whose handshake is the check */
  private async hello(epoch: number, topologyVersion: TopologyVersion | null): Promise<Document> {
    const existing = this.connection;
    if (existing == null || existing.closed) {
      const opened = await connect(this.connectOptions);
      if (this.abandoned(epoch)) {
        opened.destroy();
      } else {
        this.connection = opened;
      }
      return opened.hello ?? {};
    }

    const { connectTimeoutMS, heartbeatFrequencyMS: maxAwaitTimeMS } = this.options;
    let reply: Document;
    if (topologyVersion == null) {
      reply = await existing.command({ hello: 1 }, { timeoutMS: connectTimeoutMS });
    } else {
      const { processId, counter } = topologyVersion;
      reply = await existing.command(
        { hello: 1, maxAwaitTimeMS, topologyVersion: { processId, counter } },
        { timeoutMS: connectTimeoutMS > 0 ? connectTimeoutMS + maxAwaitTimeMS : 0 }
      );
    }

    if (!('isWritablePrimary' in reply)) {
      reply.isWritablePrimary = reply[LEGACY_HELLO_COMMAND];
    }
    return reply;
  }

  /** Forgets what the last check learned and asks the owner to reset the server */
  private reportFailure(cause: unknown): void {
    this.clearRttSamples();
    this.stopPinger();
    this.topologyVersion = null;
    this.knownServer = false;

    const error =
      cause instanceof DriverError ? cause : new DriverError(toError(cause).message, { cause });
    error.addErrorLabel(DriverErrorLabel.ResetPool);
    if (error instanceof DriverNetworkTimeoutError) {
      error.addErrorLabel(DriverErrorLabel.InterruptInUseConnections);
    }
    this.emit(Monitor.RESET_SERVER, error);
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new DriverError(String(error));
}

/**
 * Samples round trip time on its own connection every `heartbeatFrequencyMS` while the monitor
 * streams, because an awaited hello says nothing about latency.
 * @internal
 */
export class RTTPinger {
  connection?: Connection;
  closed = false;
  private timer: NodeJS.Timeout;

  constructor(private readonly monitor: Monitor) {
    this.timer = this.scheduleSample();
  }

  get roundTripTime(): number {
    return this.monitor.roundTripTime;
  }

  close(): void {
    this.closed = true;
    clearTimeout(this.timer);
    this.connection?.destroy();
    this.connection = undefined;
  }

  private scheduleSample(): NodeJS.Timeout {
    return setTimeout(() => this.sample(), this.monitor.options.heartbeatFrequencyMS);
  }

  private record(startedAt: number, opened?: Connection): void {
    if (this.closed) {
      opened?.destroy();
      return;
    }
    this.connection ??= opened;
    this.monitor.addRttSample(calculateDurationInMs(startedAt));
    this.timer = this.scheduleSample();
  }

  private sample(): void {
    if (this.closed) return;
    const startedAt = now();

    const connection = this.connection;
    if (connection == null) {
      connect(this.monitor.connectOptions).then(
        opened => this.record(startedAt, opened),
        () => {
          this.connection = undefined;
        }
      );
      return;
    }

    const timeoutMS = this.monitor.options.connectTimeoutMS;
    connection.command({ hello: 1 }, { timeoutMS }).then(
      () => this.record(startedAt),
      () => {
        // left for the next awaited heartbeat to report
        this.connection?.destroy();
        this.connection = undefined;
      }
    );
  }
}

/** @internal */
export interface MonitorIntervalOptions {
  /** Regular period between runs */
  heartbeatFrequencyMS: number;
  /** Least time between the end of one run and the start of the next */
  minHeartbeatFrequencyMS: number;
  /** Run once right away instead of after the first period */
  immediate: boolean;
  /** Receives a rejection of the task */
  onError: (error: unknown) => void;
}

/**
 * Runs a task every `heartbeatFrequencyMS`. `wake` runs it early, but never sooner than
 * `minHeartbeatFrequencyMS` after the previous run ended; wake-ups during a run are dropped.
 * @internal
 */
export class MonitorInterval {
  /** When the last run finished; -Infinity before the first */
  lastExecutionEnded = -Infinity;
  private timer: NodeJS.Timeout | undefined;
  private expedited = false;
  private running = false;
  private stopped = false;
  private readonly heartbeatFrequencyMS: number;
  private readonly minHeartbeatFrequencyMS: number;
  private readonly onError: (error: unknown) => void;

  constructor(
    private readonly task: () => Promise<void>,
    options: Partial<MonitorIntervalOptions> = {}
  ) {
    this.heartbeatFrequencyMS = options.heartbeatFrequencyMS ?? 1000;
    this.minHeartbeatFrequencyMS = options.minHeartbeatFrequencyMS ?? 500;
    this.onError = options.onError ?? (error => process.emitWarning(toError(error)));

    if (options.immediate) {
      this.runNow();
    } else {
      this.runIn(this.heartbeatFrequencyMS);
    }
  }

  wake(): void {
    if (this.running) return;

    const sinceLastRun = now() - this.lastExecutionEnded;
    // a negative gap means the clock went backwards
    if (sinceLastRun < 0 || sinceLastRun >= this.minHeartbeatFrequencyMS) {
      this.runNow();
      return;
    }

    if (!this.expedited) {
      this.expedited = true;
      this.runIn(this.minHeartbeatFrequencyMS - sinceLastRun);
    }
  }

  stop(): void {
    this.stopped = true;
    this.cancelTimer();
    this.lastExecutionEnded = -Infinity;
    this.expedited = false;
  }

  private cancelTimer(): void {
    if (this.timer != null) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private runIn(ms: number): void {
    if (this.stopped) return;
    this.cancelTimer();
    this.timer = setTimeout(() => this.runNow(), ms);
  }

  private runNow(): void {
    if (this.stopped) return;
    this.cancelTimer();
    this.expedited = false;
    this.running = true;

    const finished = () => {
      this.lastExecutionEnded = now();
      this.running = false;
      this.runIn(this.heartbeatFrequencyMS);
    };
    this.task().then(finished, error => {
      finished();
      this.onError(error);
    });
  }
}

/**
 * Smooths round trip time samples with an exponentially weighted moving average. The first
 * sample is taken as is.
 * @internal
 */
export class RTTSampler {
  private static readonly ALPHA = 0.2;
  private averageRtt: number | null = null;
  private lastRtt: number | null = null;

  addSample(sample: number): void {
    this.lastRtt = sample;
    this.averageRtt =
      this.averageRtt == null
        ? sample
        : RTTSampler.ALPHA * sample + (1 - RTTSampler.ALPHA) * this.averageRtt;
  }

  /** The smoothed round trip time, 0 before any sample */
  average(): number {
    return this.averageRtt ?? 0;
  }

  /** The most recent sample, null before any sample */
  get last(): number | null {
    return this.lastRtt;
  }

  clear(): void {
    this.averageRtt = null;
    this.lastRtt = null;
  }
}
