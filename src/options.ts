import type { TransportFactory } from './cmap/connection';
import { DriverConfigurationError, DriverInvalidArgumentError } from './error';
import type { LoggerClientOptions } from './logger';
import { ReadPreference, type ReadPreferenceFromOptions } from './read_preference';
import { ServerMonitoringMode } from './sdam/monitor';
import type { TopologyOptions } from './sdam/topology';
import { HostAddress, isRecord } from './utils';

const LB_SINGLE_HOST_ERROR = 'loadBalanced option only supported with a single host';
const LB_REPLICA_SET_ERROR = 'loadBalanced option not supported with a replicaSet option';
const LB_DIRECT_CONNECTION_ERROR =
  'loadBalanced option not supported when directConnection is provided';

/**
 * Options accepted by `resolveOptions`. Every option but the transport factory has a default.
 * @public
 */
export interface TopologyUserOptions extends LoggerClientOptions, ReadPreferenceFromOptions {
  transportFactory: TransportFactory;
  /** The name of the replica set to connect to */
  replicaSet?: string;
  /** Connect to the single seed without discovering the rest of the deployment */
  directConnection?: boolean;
  loadBalanced?: boolean;
  heartbeatFrequencyMS?: number;
  minHeartbeatFrequencyMS?: number;
  connectTimeoutMS?: number;
  socketTimeoutMS?: number;
  serverSelectionTimeoutMS?: number;
  localThresholdMS?: number;
  serverMonitoringMode?: ServerMonitoringMode;
  maxPoolSize?: number;
  minPoolSize?: number;
  maxConnecting?: number;
  maxIdleTimeMS?: number;
  waitQueueTimeoutMS?: number;
  /** @internal */
  minPoolSizeCheckFrequencyMS?: number;
}

type OptionType = 'boolean' | 'uint' | 'string' | 'record';

interface OptionDescriptor {
  type: OptionType;
  /** Restricts a string option to these values */
  values?: readonly string[];
  /** A uint option must be at least this */
  min?: number;
}

/** @internal */
export const OPTIONS = {
  replicaSet: { type: 'string' },
  directConnection: { type: 'boolean' },
  loadBalanced: { type: 'boolean' },
  heartbeatFrequencyMS: { type: 'uint' },
  minHeartbeatFrequencyMS: { type: 'uint' },
  connectTimeoutMS: { type: 'uint' },
  socketTimeoutMS: { type: 'uint' },
  serverSelectionTimeoutMS: { type: 'uint' },
  localThresholdMS: { type: 'uint' },
  serverMonitoringMode: { type: 'string', values: Object.values(ServerMonitoringMode) },
  maxPoolSize: { type: 'uint' },
  minPoolSize: { type: 'uint' },
  maxConnecting: { type: 'uint', min: 1 },
  maxIdleTimeMS: { type: 'uint' },
  waitQueueTimeoutMS: { type: 'uint' },
  minPoolSizeCheckFrequencyMS: { type: 'uint', min: 1 },
  maxStalenessSeconds: { type: 'uint' },
  logComponentSeverities: { type: 'record' },
  logMaxDocumentLength: { type: 'uint' }
} as const satisfies Record<string, OptionDescriptor>;

/** @public */
export const DEFAULT_OPTIONS = Object.freeze({
  directConnection: false,
  loadBalanced: false,
  heartbeatFrequencyMS: 10000,
  minHeartbeatFrequencyMS: 500,
  connectTimeoutMS: 30000,
  socketTimeoutMS: 0,
  serverSelectionTimeoutMS: 30000,
  localThresholdMS: 15,
  serverMonitoringMode: ServerMonitoringMode.auto,
  maxPoolSize: 100,
  minPoolSize: 0,
  maxConnecting: 2,
  maxIdleTimeMS: 0,
  waitQueueTimeoutMS: 0
} as const);

function validateOption(name: string, descriptor: OptionDescriptor, value: unknown): void {
  switch (descriptor.type) {
    case 'boolean':
      if (typeof value !== 'boolean') {
        throw new DriverInvalidArgumentError(`Option "${name}" must be a boolean`);
      }
      return;
    case 'uint':
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw new DriverInvalidArgumentError(
          `Option "${name}" must be a non-negative integer, got ${String(value)}`
        );
      }
      if (descriptor.min != null && value < descriptor.min) {
        throw new DriverInvalidArgumentError(
          `Option "${name}" must be at least ${descriptor.min}, got ${value}`
        );
      }
      return;
    case 'string':
      if (typeof value !== 'string' || value === '') {
        throw new DriverInvalidArgumentError(`Option "${name}" must be a non-empty string`);
      }
      if (descriptor.values != null && !descriptor.values.includes(value)) {
        throw new DriverInvalidArgumentError(
          `Option "${name}" must be one of ${descriptor.values.map(v => `"${v}"`).join(', ')}, got "${value}"`
        );
      }
      return;
    case 'record':
      if (!isRecord(value)) {
        throw new DriverInvalidArgumentError(`Option "${name}" must be an object`);
      }
      return;
  }
}

function parseSeeds(seeds: string | HostAddress | ReadonlyArray<string | HostAddress>) {
  const list = typeof seeds === 'string' || seeds instanceof HostAddress ? [seeds] : seeds;
  const hosts = new Map<string, HostAddress>();
  for (const seed of list) {
    const hostAddress = typeof seed === 'string' ? HostAddress.fromString(seed) : seed;
    hosts.set(hostAddress.toString(), hostAddress);
  }
  return Array.from(hosts.values());
}

/**
 * Validates the seed list and options and fills in defaults. Options that contradict each other
 * are rejected with a `DriverConfigurationError`, so a topology never starts with them.
 * @public
 */
export function resolveOptions(
  seeds: string | HostAddress | ReadonlyArray<string | HostAddress>,
  options: TopologyUserOptions
): Readonly<TopologyOptions> {
  const values: Record<string, unknown> = { ...options };
  for (const [name, descriptor] of Object.entries(OPTIONS)) {
    if (values[name] != null) {
      validateOption(name, descriptor, values[name]);
    }
  }

  if (
    !isRecord(options.transportFactory) ||
    typeof options.transportFactory.connect !== 'function'
  ) {
    throw new DriverInvalidArgumentError('Option "transportFactory" must provide a connect method');
  }

  const hosts = parseSeeds(seeds);
  const resolved: TopologyOptions = {
    ...DEFAULT_OPTIONS,
    ...definedEntries(options),
    hosts,
    transportFactory: options.transportFactory,
    readPreference: ReadPreference.fromOptions(options) ?? ReadPreference.primary
  };

  if (hosts.length === 0) {
    throw new DriverConfigurationError('At least one seed host is required');
  }

  if (resolved.directConnection && hosts.length > 1) {
    throw new DriverConfigurationError('directConnection option requires exactly one host');
  }

  if (resolved.loadBalanced) {
    if (hosts.length > 1) {
      throw new DriverConfigurationError(LB_SINGLE_HOST_ERROR);
    }
    if (resolved.replicaSet != null) {
      throw new DriverConfigurationError(LB_REPLICA_SET_ERROR);
    }
    if (options.directConnection != null) {
      throw new DriverConfigurationError(LB_DIRECT_CONNECTION_ERROR);
    }
  }

  if (resolved.maxPoolSize > 0 && resolved.minPoolSize > resolved.maxPoolSize) {
    throw new DriverConfigurationError(
      `minPoolSize (${resolved.minPoolSize}) must not be greater than maxPoolSize (${resolved.maxPoolSize})`
    );
  }

  if (resolved.heartbeatFrequencyMS < resolved.minHeartbeatFrequencyMS) {
    throw new DriverConfigurationError(
      `heartbeatFrequencyMS (${resolved.heartbeatFrequencyMS}) must be at least minHeartbeatFrequencyMS (${resolved.minHeartbeatFrequencyMS})`
    );
  }

  return Object.freeze(resolved);
}

/** Drops keys whose value is undefined, so they do not shadow defaults when spread. */
function definedEntries<T extends object>(options: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(options)) {
    if (isKeyOf(options, key) && options[key] !== undefined) {
      result[key] = options[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(object: T, key: PropertyKey): key is keyof T {
  return key in object;
}
