import { EJSON } from 'bson';
import type { Writable } from 'stream';
import { inspect } from 'util';

import type {
  ConnectionCheckedInEvent,
  ConnectionCheckedOutEvent,
  ConnectionCheckOutFailedEvent,
  ConnectionCheckOutFailedReason,
  ConnectionCheckOutStartedEvent,
  ConnectionClosedEvent,
  ConnectionClosedReason,
  ConnectionCreatedEvent,
  ConnectionPoolClearedEvent,
  ConnectionPoolClosedEvent,
  ConnectionPoolCreatedEvent,
  ConnectionPoolReadyEvent,
  ConnectionReadyEvent
} from './cmap/connection_pool_events';
import {
  CMAP_EVENTS,
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
  CONNECTION_READY,
  HEARTBEAT_EVENTS,
  SERVER_CLOSED,
  SERVER_DESCRIPTION_CHANGED,
  SERVER_HEARTBEAT_FAILED,
  SERVER_HEARTBEAT_STARTED,
  SERVER_HEARTBEAT_SUCCEEDED,
  SERVER_OPENING,
  SERVER_SELECTION_EVENTS,
  SERVER_SELECTION_FAILED,
  SERVER_SELECTION_STARTED,
  SERVER_SELECTION_SUCCEEDED,
  TOPOLOGY_CLOSED,
  TOPOLOGY_DESCRIPTION_CHANGED,
  TOPOLOGY_OPENING,
  WAITING_FOR_SUITABLE_SERVER
} from './constants';
import type {
  ServerClosedEvent,
  ServerDescriptionChangedEvent,
  ServerHeartbeatFailedEvent,
  ServerHeartbeatStartedEvent,
  ServerHeartbeatSucceededEvent,
  ServerOpeningEvent,
  TopologyClosedEvent,
  TopologyDescriptionChangedEvent,
  TopologyOpeningEvent
} from './sdam/events';
import type {
  ServerSelectionFailedEvent,
  ServerSelectionStartedEvent,
  ServerSelectionSucceededEvent,
  WaitingForSuitableServerEvent
} from './sdam/server_selection_events';
import { HostAddress, parseUnsignedInteger } from './utils';

/** @public */
export const SeverityLevel = Object.freeze({
  EMERGENCY: 'emergency',
  ALERT: 'alert',
  CRITICAL: 'critical',
  ERROR: 'error',
  WARNING: 'warn',
  NOTICE: 'notice',
  INFORMATIONAL: 'info',
  DEBUG: 'debug',
  TRACE: 'trace',
  OFF: 'off'
} as const);

/** @public */
export type SeverityLevel = (typeof SeverityLevel)[keyof typeof SeverityLevel];

/** Lower ranks are more severe; `off` ranks below everything so nothing passes it */
const SEVERITY_RANK: Readonly<Record<SeverityLevel, number>> = Object.freeze({
  off: -Infinity,
  emergency: 0,
  alert: 1,
  critical: 2,
  error: 3,
  warn: 4,
  notice: 5,
  info: 6,
  debug: 7,
  trace: 8
});

/** @public */
export const LoggableComponent = Object.freeze({
  TOPOLOGY: 'topology',
  SERVER_SELECTION: 'serverSelection',
  CONNECTION: 'connection'
} as const);

/** @public */
export type LoggableComponent = (typeof LoggableComponent)[keyof typeof LoggableComponent];

/** @public */
export const DEFAULT_MAX_DOCUMENT_LENGTH = 1000;

/**
 * Logging settings read from the environment. Client options win over these.
 * @public
 */
export interface LoggerEnvOptions {
  DOCSTORE_LOG_TOPOLOGY?: string;
  DOCSTORE_LOG_SERVER_SELECTION?: string;
  DOCSTORE_LOG_CONNECTION?: string;
  /** Severity of every component not set on its own */
  DOCSTORE_LOG_ALL?: string;
  /** Characters kept of each embedded document, 0 for no limit */
  DOCSTORE_LOG_MAX_DOCUMENT_LENGTH?: string;
  /** `stdout` or `stderr`; anything else means stderr */
  DOCSTORE_LOG_PATH?: string;
}

/** @public */
export interface LoggerClientOptions {
  /** Severities per component, `default` applying to any component left unset */
  logComponentSeverities?: Partial<Record<LoggableComponent | 'default', SeverityLevel>>;
  /** Characters kept of each embedded document, 0 for no limit */
  logMaxDocumentLength?: number;
  logDestination?: 'stdout' | 'stderr' | LogWritable | Writable;
}

/** @public */
export interface LoggerOptions {
  componentSeverities: Record<LoggableComponent | 'default', SeverityLevel>;
  maxDocumentLength: number;
  logDestination: LogWritable;
}

/** @public */
export interface Log extends Record<string, unknown> {
  t: Date;
  c: LoggableComponent;
  s: SeverityLevel;
  message?: string;
}

/** @public */
export interface LogWritable {
  write(log: Log): unknown;
}

/** @internal */
export type LoggableEvent =
  | ConnectionPoolCreatedEvent
  | ConnectionPoolReadyEvent
  | ConnectionPoolClosedEvent
  | ConnectionPoolClearedEvent
  | ConnectionCreatedEvent
  | ConnectionReadyEvent
  | ConnectionClosedEvent
  | ConnectionCheckedInEvent
  | ConnectionCheckedOutEvent
  | ConnectionCheckOutStartedEvent
  | ConnectionCheckOutFailedEvent
  | TopologyOpeningEvent
  | TopologyClosedEvent
  | TopologyDescriptionChangedEvent
  | ServerOpeningEvent
  | ServerClosedEvent
  | ServerDescriptionChangedEvent
  | ServerHeartbeatStartedEvent
  | ServerHeartbeatSucceededEvent
  | ServerHeartbeatFailedEvent
  | ServerSelectionStartedEvent
  | ServerSelectionSucceededEvent
  | ServerSelectionFailedEvent
  | WaitingForSuitableServerEvent;

/** Anything that knows how to turn itself into log fields */
export interface LogConvertible {
  toLog(): Record<string, unknown>;
}

/** @internal */
export type Loggable = LoggableEvent | LogConvertible;

type LogFields = Omit<Log, 's' | 't' | 'c'>;

const LOGGABLE_EVENT_NAMES: ReadonlySet<string> = new Set<string>([
  ...CMAP_EVENTS,
  ...HEARTBEAT_EVENTS,
  ...SERVER_SELECTION_EVENTS,
  TOPOLOGY_OPENING,
  TOPOLOGY_CLOSED,
  TOPOLOGY_DESCRIPTION_CHANGED,
  SERVER_OPENING,
  SERVER_CLOSED,
  SERVER_DESCRIPTION_CHANGED
]);

/** @internal */
export function isLoggableEvent(value: unknown): value is LoggableEvent {
  if (value == null || typeof value !== 'object' || !('name' in value)) return false;
  return typeof value.name === 'string' && LOGGABLE_EVENT_NAMES.has(value.name);
}

function isLogConvertible(value: Loggable): value is LogConvertible {
  return 'toLog' in value && typeof value.toLog === 'function';
}

function isLogWritable(value: unknown): value is LogWritable {
  if (value == null || typeof value !== 'object' || !('write' in value)) return false;
  return typeof value.write === 'function';
}

function parseSeverity(value?: string): SeverityLevel | null {
  const lowered = value?.toLowerCase();
  return Object.values(SeverityLevel).find(level => level === lowered) ?? null;
}

/**
 * Writes each log as one line of `util.inspect` output.
 * @internal
 */
export function createStdioLogger(stream: {
  write(chunk: string, encoding: 'utf-8'): unknown;
}): LogWritable {
  return {
    write(log: Log): void {
      stream.write(`${inspect(log, { compact: true, breakLength: Infinity })}\n`, 'utf-8');
    }
  };
}

/** `logDestination` wins; `stdout` and `stderr` are matched without regard to case */
function resolveLogDestination(
  { DOCSTORE_LOG_PATH }: LoggerEnvOptions,
  { logDestination }: LoggerClientOptions
): LogWritable {
  if (isLogWritable(logDestination)) return logDestination;

  const named = typeof logDestination === 'string' ? logDestination : DOCSTORE_LOG_PATH ?? '';
  const stream = named.toLowerCase() === 'stdout' ? process.stdout : process.stderr;
  return createStdioLogger(stream);
}

/**
 * EJSON-stringifies a value and cuts it to `maxDocumentLength` characters, followed by `...`.
 * Lengths count UTF-16 code units and a surrogate pair is never split.
 * @internal
 */
export function stringifyWithMaxLen(value: unknown, maxDocumentLength: number): string {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else if (typeof value === 'function') {
    text = value.name;
  } else {
    try {
      text = EJSON.stringify(value, { relaxed: true });
    } catch (error) {
      text = `Extended JSON serialization failed with: ${String(error)}`;
    }
  }

  if (maxDocumentLength === 0 || text.length <= maxDocumentLength) return text;

  const lastKept = text.charCodeAt(maxDocumentLength - 1);
  const isHighSurrogate = lastKept >= 0xd800 && lastKept <= 0xdbff;
  return `${text.slice(0, isHighSurrogate ? maxDocumentLength - 1 : maxDocumentLength)}...`;
}

const CLOSED_REASONS: Readonly<Record<ConnectionClosedReason, string>> = {
  stale: 'Connection became stale because the pool was cleared',
  idle: 'Connection has been available but unused for longer than the configured max idle time',
  error: 'An error occurred while using the connection',
  dropped: 'Connection was dropped during an operation',
  poolClosed: 'Connection pool was closed'
};

const CHECK_OUT_FAILED_REASONS: Readonly<Record<ConnectionCheckOutFailedReason, string>> = {
  poolClosed: 'Connection pool was closed',
  timeout: 'Wait queue timeout elapsed without a connection becoming available',
  connectionError: 'An error occurred while trying to establish a new connection'
};

function serverFields(address: string): { serverHost: string; serverPort: number | undefined } {
  const { host, port } = HostAddress.fromString(address).toHostPort();
  return { serverHost: host, serverPort: port };
}

/** Turns a monitoring event into the fields of a structured log */
function describeEvent(event: LoggableEvent, maxDocumentLength: number): LogFields {
  const embed = (value: unknown) => stringifyWithMaxLen(value, maxDocumentLength);

  switch (event.name) {
    case CONNECTION_POOL_CREATED:
      return {
        message: 'Connection pool created',
        ...serverFields(event.address),
        ...event.options
      };
    case CONNECTION_POOL_READY:
      return { message: 'Connection pool ready', ...serverFields(event.address) };
    case CONNECTION_POOL_CLEARED:
      return {
        message: 'Connection pool cleared',
        ...serverFields(event.address),
        ...(event.interruptInUseConnections ? { interruptInUseConnections: true } : {})
      };
    case CONNECTION_POOL_CLOSED:
      return { message: 'Connection pool closed', ...serverFields(event.address) };
    case CONNECTION_CREATED:
      return {
        message: 'Connection created',
        ...serverFields(event.address),
        driverConnectionId: event.connectionId
      };
    case CONNECTION_READY:
      return {
        message: 'Connection ready',
        ...serverFields(event.address),
        driverConnectionId: event.connectionId,
        durationMS: event.durationMS
      };
    case CONNECTION_CLOSED:
      return {
        message: 'Connection closed',
        ...serverFields(event.address),
        driverConnectionId: event.connectionId,
        reason: CLOSED_REASONS[event.reason],
        ...(event.reason === 'error' && event.error != null ? { error: event.error } : {})
      };
    case CONNECTION_CHECK_OUT_STARTED:
      return { message: 'Connection checkout started', ...serverFields(event.address) };
    case CONNECTION_CHECK_OUT_FAILED:
      return {
        message: 'Connection checkout failed',
        ...serverFields(event.address),
        reason: CHECK_OUT_FAILED_REASONS[event.reason],
        ...(event.reason === 'connectionError' && event.error != null
          ? { error: event.error }
          : {}),
        durationMS: event.durationMS
      };
    case CONNECTION_CHECKED_OUT:
      return {
        message: 'Connection checked out',
        ...serverFields(event.address),
        driverConnectionId: event.connectionId,
        durationMS: event.durationMS
      };
    case CONNECTION_CHECKED_IN:
      return {
        message: 'Connection checked in',
        ...serverFields(event.address),
        driverConnectionId: event.connectionId
      };
    case TOPOLOGY_OPENING:
      return { message: 'Starting topology monitoring', topologyId: event.topologyId };
    case TOPOLOGY_CLOSED:
      return { message: 'Stopped topology monitoring', topologyId: event.topologyId };
    case TOPOLOGY_DESCRIPTION_CHANGED:
      return {
        message: 'Topology description changed',
        topologyId: event.topologyId,
        previousDescription: embed(event.previousDescription.toJSON()),
        newDescription: embed(event.newDescription.toJSON())
      };
    case SERVER_OPENING:
      return {
        message: 'Starting server monitoring',
        topologyId: event.topologyId,
        ...serverFields(event.address)
      };
    case SERVER_CLOSED:
      return {
        message: 'Stopped server monitoring',
        topologyId: event.topologyId,
        ...serverFields(event.address)
      };
    case SERVER_DESCRIPTION_CHANGED:
      return {
        message: 'Server description changed',
        topologyId: event.topologyId,
        ...serverFields(event.address),
        previousDescription: embed(event.previousDescription.toJSON()),
        newDescription: embed(event.newDescription.toJSON())
      };
    case SERVER_HEARTBEAT_STARTED:
      return {
        message: 'Server heartbeat started',
        topologyId: event.topologyId,
        ...serverFields(event.connectionId),
        awaited: event.awaited
      };
    case SERVER_HEARTBEAT_SUCCEEDED:
      return {
        message: 'Server heartbeat succeeded',
        topologyId: event.topologyId,
        ...serverFields(event.connectionId),
        awaited: event.awaited,
        durationMS: event.duration,
        reply: embed(event.reply)
      };
    case SERVER_HEARTBEAT_FAILED:
      return {
        message: 'Server heartbeat failed',
        topologyId: event.topologyId,
        ...serverFields(event.connectionId),
        awaited: event.awaited,
        durationMS: event.duration,
        failure: event.failure.message
      };
    case SERVER_SELECTION_STARTED:
    case SERVER_SELECTION_SUCCEEDED:
    case SERVER_SELECTION_FAILED:
    case WAITING_FOR_SUITABLE_SERVER: {
      const fields: LogFields = {
        message: event.message,
        selector: event.selector,
        operation: event.operation,
        topologyDescription: embed(event.topologyDescription.toJSON())
      };
      if (event.name === SERVER_SELECTION_SUCCEEDED) {
        return { ...fields, serverHost: event.serverHost, serverPort: event.serverPort };
      }
      if (event.name === SERVER_SELECTION_FAILED) {
        return { ...fields, failure: event.failure.message };
      }
      if (event.name === WAITING_FOR_SUITABLE_SERVER) {
        return { ...fields, remainingTimeMS: event.remainingTimeMS };
      }
      return fields;
    }
  }
}

/**
 * Structured logger with a severity per component. Events are turned into fields with
 * `describeEvent`, objects with a `toLog()` method convert themselves. A destination that throws
 * is replaced by stderr, and the failure is reported there once.
 * @public
 */
export class DriverLogger {
  componentSeverities: Record<LoggableComponent | 'default', SeverityLevel>;
  maxDocumentLength: number;
  logDestination: LogWritable;
  /** Set once a write to the configured destination has failed */
  destinationFailed = false;

  constructor(options: LoggerOptions) {
    this.componentSeverities = options.componentSeverities;
    this.maxDocumentLength = options.maxDocumentLength;
    this.logDestination = options.logDestination;
  }

  emergency = this.log.bind(this, SeverityLevel.EMERGENCY);
  alert = this.log.bind(this, SeverityLevel.ALERT);
  critical = this.log.bind(this, SeverityLevel.CRITICAL);
  error = this.log.bind(this, SeverityLevel.ERROR);
  warn = this.log.bind(this, SeverityLevel.WARNING);
  notice = this.log.bind(this, SeverityLevel.NOTICE);
  info = this.log.bind(this, SeverityLevel.INFORMATIONAL);
  debug = this.log.bind(this, SeverityLevel.DEBUG);
  trace = this.log.bind(this, SeverityLevel.TRACE);

  willLog(component: LoggableComponent, severity: SeverityLevel): boolean {
    if (severity === SeverityLevel.OFF) return false;
    return SEVERITY_RANK[severity] <= SEVERITY_RANK[this.componentSeverities[component]];
  }

  private log(
    severity: SeverityLevel,
    component: LoggableComponent,
    message: Loggable | string
  ): void {
    if (!this.willLog(component, severity)) return;

    let fields: LogFields;
    if (typeof message === 'string') {
      fields = { message };
    } else if (isLogConvertible(message)) {
      fields = message.toLog();
    } else {
      fields = describeEvent(message, this.maxDocumentLength);
    }

    const entry: Log = { t: new Date(), c: component, s: severity, ...fields };
    try {
      this.logDestination.write(entry);
    } catch (error) {
      this.fallBackToStderr(error, component);
    }
  }

  private fallBackToStderr(error: unknown, component: LoggableComponent): void {
    if (this.destinationFailed) return;
    this.destinationFailed = true;
    this.logDestination = createStdioLogger(process.stderr);

    const reason = stringifyWithMaxLen(
      error instanceof Error ? error.message : error,
      this.maxDocumentLength
    );
    this.logDestination.write({
      t: new Date(),
      c: component,
      s: SeverityLevel.ERROR,
      message: `User input for logDestination failed with: ${reason}`
    });
  }

  /**
   * Combines environment and client settings, client settings first. A severity that does not
   * parse counts as unset; whatever stays unset takes the default severity, which is `off`
   * unless given.
   */
  static resolveOptions(env: LoggerEnvOptions, client: LoggerClientOptions = {}): LoggerOptions {
    const given = client.logComponentSeverities ?? {};
    const fallback = given.default ?? parseSeverity(env.DOCSTORE_LOG_ALL) ?? SeverityLevel.OFF;
    const severityOf = (component: LoggableComponent, fromEnv?: string) =>
      given[component] ?? parseSeverity(fromEnv) ?? fallback;

    return {
      componentSeverities: {
        topology: severityOf('topology', env.DOCSTORE_LOG_TOPOLOGY),
        serverSelection: severityOf('serverSelection', env.DOCSTORE_LOG_SERVER_SELECTION),
        connection: severityOf('connection', env.DOCSTORE_LOG_CONNECTION),
        default: fallback
      },
      maxDocumentLength:
        client.logMaxDocumentLength ??
        parseUnsignedInteger(env.DOCSTORE_LOG_MAX_DOCUMENT_LENGTH) ??
        DEFAULT_MAX_DOCUMENT_LENGTH,
      logDestination: resolveLogDestination(env, client)
    };
  }
}
