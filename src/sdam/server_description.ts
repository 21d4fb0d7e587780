import { type Document, Long, ObjectId } from 'bson';

import { type AnyError, DriverRuntimeError } from '../error';
import {
  arrayStrictEqual,
  compareObjectId,
  errorStrictEqual,
  HostAddress,
  isRecord,
  now
} from '../utils';
import { ServerType } from './common';

const WRITABLE_SERVER_TYPES = new Set<ServerType>([
  ServerType.RSPrimary,
  ServerType.Standalone,
  ServerType.Mongos,
  ServerType.LoadBalancer
]);

const DATA_BEARING_SERVER_TYPES = new Set<ServerType>([
  ServerType.RSPrimary,
  ServerType.RSSecondary,
  ServerType.Mongos,
  ServerType.Standalone,
  ServerType.LoadBalancer
]);

/** @public */
export interface TopologyVersion {
  processId: ObjectId;
  counter: Long;
}

/** @public */
export type TagSet = { [key: string]: string };

/** @internal */
export interface ServerDescriptionOptions {
  /** The failure of the last check, for an Unknown description */
  error?: AnyError;

  /** The smoothed round trip time to this server (in ms) */
  roundTripTime?: number;

  /** If the client is in load balancing mode. */
  loadBalanced?: boolean;
}

function readString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function readNumber(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (Long.isLong(value)) return value.toNumber();
  return null;
}

function readHosts(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((host): host is string => typeof host === 'string').map(normalizeHost);
}

function normalizeHost(host: string): string {
  try {
    return HostAddress.fromString(host).toString();
  } catch {
    return host.toLowerCase();
  }
}

function readTags(value: unknown): TagSet {
  const tags: TagSet = {};
  if (!isRecord(value)) return tags;
  for (const [key, tag] of Object.entries(value)) {
    if (typeof tag === 'string') tags[key] = tag;
  }
  return tags;
}

function readDate(value: unknown): number {
  if (value instanceof Date) return value.getTime();
  return readNumber(value) ?? 0;
}

/**
 * Reads a `{ processId, counter }` pair off a reply or an error.
 * @internal
 */
export function readTopologyVersion(value: unknown): TopologyVersion | null {
  if (!isRecord(value)) return null;
  const { processId, counter } = value;
  if (!(processId instanceof ObjectId)) return null;
  if (Long.isLong(counter)) return { processId, counter };
  if (typeof counter === 'number') return { processId, counter: Long.fromNumber(counter) };
  return null;
}

/**
 * The client's view of a single server, based on the most recent hello outcome.
 * Descriptions are never mutated: every check produces a new one.
 * @public
 */
export class ServerDescription {
  readonly address: string;
  readonly type: ServerType;
  readonly hosts: string[];
  readonly passives: string[];
  readonly arbiters: string[];
  readonly tags: TagSet;
  readonly error: AnyError | null;
  readonly topologyVersion: TopologyVersion | null;
  readonly minWireVersion: number;
  readonly maxWireVersion: number;
  /** Smoothed round trip time in ms, -1 when never measured */
  readonly roundTripTime: number;
  readonly lastUpdateTime: number;
  readonly lastWriteDate: number;
  readonly me: string | null;
  readonly primary: string | null;
  readonly setName: string | null;
  readonly setVersion: number | null;
  readonly electionId: ObjectId | null;
  readonly logicalSessionTimeoutMinutes: number | null;

  /**
   * Create a ServerDescription
   * @internal
   *
   * @param address - The address of the server
   * @param hello - An optional hello response for this server
   */
  constructor(
    address: HostAddress | string,
    hello?: Document | null,
    options: ServerDescriptionOptions = {}
  ) {
    if (address == null || address === '') {
      throw new DriverRuntimeError('ServerDescription must be provided with a non-empty address');
    }

    this.address =
      typeof address === 'string'
        ? HostAddress.fromString(address).toString() // Use HostAddress to normalize
        : address.toString();
    this.type = parseServerType(hello, options);
    this.hosts = readHosts(hello?.hosts);
    this.passives = readHosts(hello?.passives);
    this.arbiters = readHosts(hello?.arbiters);
    this.tags = readTags(hello?.tags);
    this.minWireVersion = readNumber(hello?.minWireVersion) ?? 0;
    this.maxWireVersion = readNumber(hello?.maxWireVersion) ?? 0;
    this.roundTripTime = options.roundTripTime ?? -1;
    this.lastUpdateTime = now();
    this.lastWriteDate = isRecord(hello?.lastWrite) ? readDate(hello?.lastWrite.lastWriteDate) : 0;
    this.error = options.error ?? null;

    const errorTopologyVersion =
      this.error != null && 'topologyVersion' in this.error
        ? readTopologyVersion(this.error.topologyVersion)
        : null;
    this.topologyVersion = errorTopologyVersion ?? readTopologyVersion(hello?.topologyVersion);
    this.setName = readString(hello?.setName);
    this.setVersion = readNumber(hello?.setVersion);
    this.electionId = hello?.electionId instanceof ObjectId ? hello.electionId : null;
    this.logicalSessionTimeoutMinutes = readNumber(hello?.logicalSessionTimeoutMinutes);
    const primary = readString(hello?.primary);
    this.primary = primary != null ? normalizeHost(primary) : null;
    const me = readString(hello?.me);
    this.me = me != null ? normalizeHost(me) : null;
  }

  get hostAddress(): HostAddress {
    return HostAddress.fromString(this.address);
  }

  get allHosts(): string[] {
    return this.hosts.concat(this.arbiters).concat(this.passives);
  }

  /** Is this server available for reads*/
  get isReadable(): boolean {
    return this.type === ServerType.RSSecondary || this.isWritable;
  }

  /** Is this server data bearing */
  get isDataBearing(): boolean {
    return DATA_BEARING_SERVER_TYPES.has(this.type);
  }

  /** Is this server available for writes */
  get isWritable(): boolean {
    return WRITABLE_SERVER_TYPES.has(this.type);
  }

  get host(): string {
    return this.hostAddress.host;
  }

  get port(): number {
    return this.hostAddress.port;
  }

  /**
   * Determines if another `ServerDescription` carries the same server state as this one.
   * Round trip time and update time are not compared.
   */
  equals(other?: ServerDescription | null): boolean {
    // a missing topologyVersion compares as "older" elsewhere, here only identity counts
    const topologyVersionsEqual =
      this.topologyVersion === other?.topologyVersion ||
      compareTopologyVersion(this.topologyVersion, other?.topologyVersion) === 0;

    const electionIdsEqual =
      this.electionId != null && other?.electionId != null
        ? compareObjectId(this.electionId, other.electionId) === 0
        : this.electionId === other?.electionId;

    return (
      other != null &&
      errorStrictEqual(this.error, other.error) &&
      this.type === other.type &&
      this.minWireVersion === other.minWireVersion &&
      this.maxWireVersion === other.maxWireVersion &&
      arrayStrictEqual(this.hosts, other.hosts) &&
      arrayStrictEqual(this.passives, other.passives) &&
      arrayStrictEqual(this.arbiters, other.arbiters) &&
      tagsStrictEqual(this.tags, other.tags) &&
      this.setName === other.setName &&
      this.setVersion === other.setVersion &&
      electionIdsEqual &&
      this.primary === other.primary &&
      this.me === other.me &&
      this.logicalSessionTimeoutMinutes === other.logicalSessionTimeoutMinutes &&
      topologyVersionsEqual
    );
  }

  toJSON(): Document {
    return {
      address: this.address,
      type: this.type,
      hosts: this.hosts,
      passives: this.passives,
      arbiters: this.arbiters,
      tags: this.tags,
      error: this.error == null ? null : { name: this.error.name, message: this.error.message },
      topologyVersion: this.topologyVersion,
      minWireVersion: this.minWireVersion,
      maxWireVersion: this.maxWireVersion,
      roundTripTime: this.roundTripTime,
      lastUpdateTime: this.lastUpdateTime,
      lastWriteDate: this.lastWriteDate,
      me: this.me,
      primary: this.primary,
      setName: this.setName,
      setVersion: this.setVersion,
      electionId: this.electionId,
      logicalSessionTimeoutMinutes: this.logicalSessionTimeoutMinutes
    };
  }
}

// Parses a `hello` message and determines the server type
export function parseServerType(
  hello?: Document | null,
  options?: ServerDescriptionOptions
): ServerType {
  if (options?.loadBalanced) {
    return ServerType.LoadBalancer;
  }

  if (!hello || !hello.ok) {
    return ServerType.Unknown;
  }

  if (hello.isreplicaset) {
    return ServerType.RSGhost;
  }

  if (hello.msg && hello.msg === 'isdbgrid') {
    return ServerType.Mongos;
  }

  if (hello.setName) {
    if (hello.hidden) {
      return ServerType.RSOther;
    } else if (hello.isWritablePrimary || hello.ismaster) {
      return ServerType.RSPrimary;
    } else if (hello.secondary) {
      return ServerType.RSSecondary;
    } else if (hello.arbiterOnly) {
      return ServerType.RSArbiter;
    } else {
      return ServerType.RSOther;
    }
  }

  return ServerType.Standalone;
}

function tagsStrictEqual(tags: TagSet, tags2: TagSet): boolean {
  const tagsKeys = Object.keys(tags);
  const tags2Keys = Object.keys(tags2);

  return (
    tagsKeys.length === tags2Keys.length &&
    tagsKeys.every((key: string) => tags2[key] === tags[key])
  );
}

/**
 * Compares two topology versions.
 *
 * 1. If either version is missing, the new one is assumed to be more recent.
 * 1. If the processIds differ, the new one is assumed to be more recent.
 * 1. Otherwise the counters decide.
 *
 * ```ts
 * currentTv <   newTv === -1
 * currentTv === newTv === 0
 * currentTv >   newTv === 1
 * ```
 */
export function compareTopologyVersion(
  currentTv?: TopologyVersion | null,
  newTv?: TopologyVersion | null
): 0 | -1 | 1 {
  if (currentTv == null || newTv == null) {
    return -1;
  }

  if (!currentTv.processId.equals(newTv.processId)) {
    return -1;
  }

  const comparison = currentTv.counter.compare(newTv.counter);
  return comparison < 0 ? -1 : comparison > 0 ? 1 : 0;
}
