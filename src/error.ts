import type { Document } from 'bson';

import type { TopologyVersion } from './sdam/server_description';
import type { TopologyDescription } from './sdam/topology_description';

/** @public */
export type AnyError = DriverError | Error;

/** @internal Server error codes the topology reacts to */
export const SERVER_ERROR_CODES = Object.freeze({
  HostUnreachable: 6,
  HostNotFound: 7,
  NetworkTimeout: 89,
  ShutdownInProgress: 91,
  PrimarySteppedDown: 189,
  ExceededTimeLimit: 262,
  SocketException: 9001,
  NotWritablePrimary: 10107,
  InterruptedAtShutdown: 11600,
  InterruptedDueToReplStateChange: 11602,
  NotPrimaryNoSecondaryOk: 13435,
  NotPrimaryOrSecondary: 13436,
  LegacyNotPrimary: 10058
} as const);

/**
 * Labels attached to errors to steer how the topology reacts to them.
 * @public
 */
export const DriverErrorLabel = Object.freeze({
  ResetPool: 'ResetPool',
  InterruptInUseConnections: 'InterruptInUseConnections',
  PoolRequestedRetry: 'PoolRequestedRetry'
} as const);

/** @public */
export type DriverErrorLabel = (typeof DriverErrorLabel)[keyof typeof DriverErrorLabel];

/** @public */
export interface DriverErrorOptions {
  cause?: unknown;
}

/**
 * @public
 * @category Error
 */
export class DriverError extends Error {
  private readonly labels = new Set<string>();

  constructor(message: string, options?: DriverErrorOptions) {
    super(message, options);
    this.name = 'DriverError';
  }

  /**
   * Checks the error to see if it has an error label
   *
   * @param label - The error label to check for
   * @returns returns true if the error has the provided error label
   */
  hasErrorLabel(label: string): boolean {
    return this.labels.has(label);
  }

  addErrorLabel(label: string): void {
    this.labels.add(label);
  }

  get errorLabels(): string[] {
    return Array.from(this.labels);
  }
}

/**
 * An error coming from the server in reply to a command (`ok: 0`).
 * @public
 * @category Error
 */
export class DriverServerError extends DriverError {
  code?: number;
  codeName?: string;
  topologyVersion?: TopologyVersion;
  /** The raw reply */
  reply: Document;

  constructor(reply: Document) {
    const message: unknown = reply.errmsg ?? reply.$err ?? reply.message;
    super(typeof message === 'string' ? message : 'n/a');
    this.name = 'DriverServerError';
    this.reply = reply;

    if (typeof reply.code === 'number') this.code = reply.code;
    if (typeof reply.codeName === 'string') this.codeName = reply.codeName;
    if (reply.topologyVersion != null) this.topologyVersion = reply.topologyVersion;
    if (Array.isArray(reply.errorLabels)) {
      for (const label of reply.errorLabels) {
        if (typeof label === 'string') this.addErrorLabel(label);
      }
    }
  }
}

/** @public */
export interface DriverNetworkErrorOptions extends DriverErrorOptions {
  /** Indicates the error happened before a connection handshake completed */
  beforeHandshake?: boolean;
}

/** @internal */
export function isNetworkErrorBeforeHandshake(err: DriverNetworkError): boolean {
  return err.beforeHandshake;
}

/**
 * An error indicating an issue with the network, including TCP errors and timeouts.
 * @public
 * @category Error
 */
export class DriverNetworkError extends DriverError {
  /** @internal */
  readonly beforeHandshake: boolean;

  constructor(message: string, options?: DriverNetworkErrorOptions) {
    super(message, options);
    this.name = 'DriverNetworkError';
    this.beforeHandshake = options?.beforeHandshake === true;
  }
}

/**
 * An error indicating a network timeout occurred
 * @public
 * @category Error
 */
export class DriverNetworkTimeoutError extends DriverNetworkError {
  constructor(message: string, options?: DriverNetworkErrorOptions) {
    super(message, options);
    this.name = 'DriverNetworkTimeoutError';
  }
}

/**
 * An error signifying a general unexpected condition inside the driver.
 * @public
 * @category Error
 */
export class DriverRuntimeError extends DriverError {
  constructor(message: string, options?: DriverErrorOptions) {
    super(message, options);
    this.name = 'DriverRuntimeError';
  }
}

/**
 * An error raised when the driver API is used incorrectly.
 * @public
 * @category Error
 */
export class DriverAPIError extends DriverError {
  constructor(message: string, options?: DriverErrorOptions) {
    super(message, options);
    this.name = 'DriverAPIError';
  }
}

/**
 * An error raised when an argument does not have the expected shape or value.
 * @public
 * @category Error
 */
export class DriverInvalidArgumentError extends DriverAPIError {
  constructor(message: string, options?: DriverErrorOptions) {
    super(message, options);
    this.name = 'DriverInvalidArgumentError';
  }
}

/**
 * An error raised when the seed list and topology options contradict each other.
 * A topology is never started with such a configuration.
 * @public
 * @category Error
 */
export class DriverConfigurationError extends DriverInvalidArgumentError {
  constructor(message: string, options?: DriverErrorOptions) {
    super(message, options);
    this.name = 'DriverConfigurationError';
  }
}

/**
 * An error raised when a server's wire version range does not overlap the driver's.
 * @public
 * @category Error
 */
export class DriverCompatibilityError extends DriverAPIError {
  constructor(message: string) {
    super(message);
    this.name = 'DriverCompatibilityError';
  }
}

/**
 * An error attached to a primary's description when its election id and set version
 * are older than what the topology has already observed.
 * @public
 * @category Error
 */
export class DriverStalePrimaryError extends DriverError {
  constructor(message: string) {
    super(message);
    this.name = 'DriverStalePrimaryError';
  }
}

/**
 * An error raised when an operation runs against a closed topology.
 * @public
 * @category Error
 */
export class DriverTopologyClosedError extends DriverAPIError {
  constructor(message = 'Topology is closed') {
    super(message);
    this.name = 'DriverTopologyClosedError';
  }
}

/**
 * An error signifying a client-side timeout event
 * @public
 * @category Error
 */
export class DriverTimeoutError extends DriverError {
  constructor(message: string, options?: DriverErrorOptions) {
    super(message, options);
    this.name = 'DriverTimeoutError';
  }
}

/**
 * An error signifying that no server matched the selection criteria in time.
 * The topology description at the moment of failure is kept as `reason`.
 * @public
 * @category Error
 */
export class DriverServerSelectionError extends DriverTimeoutError {
  readonly reason: TopologyDescription;

  constructor(message: string, reason: TopologyDescription) {
    super(message, { cause: reason.error ?? undefined });
    this.name = 'DriverServerSelectionError';
    this.reason = reason;
  }

  get topologyDescription(): TopologyDescription {
    return this.reason;
  }
}

const SDAM_RECOVERING_CODES = new Set<number>([
  SERVER_ERROR_CODES.ShutdownInProgress,
  SERVER_ERROR_CODES.PrimarySteppedDown,
  SERVER_ERROR_CODES.InterruptedAtShutdown,
  SERVER_ERROR_CODES.InterruptedDueToReplStateChange,
  SERVER_ERROR_CODES.NotPrimaryOrSecondary
]);

const SDAM_NOT_PRIMARY_CODES = new Set<number>([
  SERVER_ERROR_CODES.NotWritablePrimary,
  SERVER_ERROR_CODES.NotPrimaryNoSecondaryOk,
  SERVER_ERROR_CODES.LegacyNotPrimary
]);

const SDAM_NODE_SHUTTING_DOWN_ERROR_CODES = new Set<number>([
  SERVER_ERROR_CODES.InterruptedAtShutdown,
  SERVER_ERROR_CODES.ShutdownInProgress
]);

function isRecoveringError(err: DriverServerError): boolean {
  if (typeof err.code !== 'undefined') {
    // If any error code exists, we ignore the error.message
    return SDAM_RECOVERING_CODES.has(err.code);
  }

  return /not master or secondary/.test(err.message) || /node is recovering/.test(err.message);
}

function isNotWritablePrimaryError(err: DriverServerError): boolean {
  if (typeof err.code !== 'undefined') {
    // If any error code exists, we ignore the error.message
    return SDAM_NOT_PRIMARY_CODES.has(err.code);
  }

  if (isRecoveringError(err)) {
    return false;
  }

  return /not master/.test(err.message) || /not primary/.test(err.message);
}

/** @internal */
export function isNodeShuttingDownError(err: DriverServerError): boolean {
  return err.code != null && SDAM_NODE_SHUTTING_DOWN_ERROR_CODES.has(err.code);
}

/**
 * Determines whether a server error means the server changed its replication state
 * ("not writable primary" or "node is recovering"). Such errors invalidate the
 * client's view of that server.
 * @internal
 */
export function isStateChangeError(error: DriverError): error is DriverServerError {
  if (!(error instanceof DriverServerError)) {
    return false;
  }

  return isRecoveringError(error) || isNotWritablePrimaryError(error);
}
