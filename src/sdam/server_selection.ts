import { DriverInvalidArgumentError, DriverRuntimeError } from '../error';
import type { ReadPreference } from '../read_preference';
import { ServerType, TopologyType } from './common';
import type { ServerDescription, TagSet } from './server_description';
import type { TopologyDescription } from './topology_description';

/** How long a primary may go without writing before it writes a no-op */
const IDLE_WRITE_PERIOD_MS = 10000;
const MIN_MAX_STALENESS_SECONDS = 90;

/**
 * Narrows the servers of a topology description to the ones an operation may run on.
 * Selectors have no side effects.
 * @public
 */
export type ServerSelector = (
  topologyDescription: TopologyDescription,
  servers: ServerDescription[]
) => ServerDescription[];

const isType =
  (...types: ServerType[]) =>
  (server: ServerDescription): boolean =>
    types.includes(server.type);

const isPrimary = isType(ServerType.RSPrimary);
const isSecondary = isType(ServerType.RSSecondary);
const isDataBearingMember = isType(ServerType.RSPrimary, ServerType.RSSecondary);
const isRouter = isType(ServerType.Mongos);
const isLoadBalancer = isType(ServerType.LoadBalancer);
const isKnown = (server: ServerDescription): boolean => server.type !== ServerType.Unknown;

/**
 * Keeps the servers whose round trip time is below the fastest one's plus `localThresholdMS`.
 */
export function latencyWindowReducer(
  topologyDescription: TopologyDescription,
  servers: ServerDescription[]
): ServerDescription[] {
  if (servers.length === 0) return [];

  const fastest = Math.min(...servers.map(server => server.roundTripTime));
  const limit = fastest + topologyDescription.localThresholdMS;
  return servers.filter(server => server.roundTripTime < limit);
}

/** Selects the servers that accept writes and fall within the latency window */
export function writableServerSelector(): ServerSelector {
  return (topologyDescription, servers) =>
    latencyWindowReducer(topologyDescription, servers.filter(server => server.isWritable));
}

function checkMaxStaleness(maxStalenessSeconds: number, heartbeatFrequencyMS: number): void {
  const floors = [(heartbeatFrequencyMS + IDLE_WRITE_PERIOD_MS) / 1000, MIN_MAX_STALENESS_SECONDS];
  for (const floor of floors) {
    if (maxStalenessSeconds < floor) {
      throw new DriverInvalidArgumentError(
        `Option "maxStalenessSeconds" must be at least ${floor} seconds`
      );
    }
  }
}

/** Estimates how far behind a candidate is, or returns null when there is nothing to compare to */
function stalenessEstimator(
  description: TopologyDescription,
  candidates: ServerDescription[]
): ((server: ServerDescription) => number) | null {
  const { heartbeatFrequencyMS } = description;

  if (description.type === TopologyType.ReplicaSetWithPrimary) {
    const primary = Array.from(description.servers.values()).find(isPrimary);
    if (primary == null) return null;
    const primaryLag = primary.lastUpdateTime - primary.lastWriteDate;
    return server =>
      server.lastUpdateTime - server.lastWriteDate - primaryLag + heartbeatFrequencyMS;
  }

  if (description.type === TopologyType.ReplicaSetNoPrimary && candidates.length > 0) {
    const latestWrite = Math.max(...candidates.map(server => server.lastWriteDate));
    return server => latestWrite - server.lastWriteDate + heartbeatFrequencyMS;
  }

  return null;
}

/**
 * Drops the candidates estimated to lag more than `maxStalenessSeconds` behind the primary, or
 * behind the most recently written candidate when there is no primary.
 */
function withinMaxStaleness(
  { maxStalenessSeconds }: ReadPreference,
  description: TopologyDescription,
  candidates: ServerDescription[]
): ServerDescription[] {
  if (maxStalenessSeconds == null || maxStalenessSeconds < 0) return candidates;
  checkMaxStaleness(maxStalenessSeconds, description.heartbeatFrequencyMS);

  const staleness = stalenessEstimator(description, candidates);
  if (staleness == null) return candidates;
  return candidates.filter(server => staleness(server) / 1000 <= maxStalenessSeconds);
}

/** A server matches a tag set when it carries every tag of the set with the same value */
function hasTags(server: ServerDescription, tagSet: TagSet): boolean {
  return Object.keys(tagSet).every(key => server.tags[key] === tagSet[key]);
}

/** Keeps the candidates matching the first tag set any candidate matches */
function matchingTagSet(
  { tags }: ReadPreference,
  candidates: ServerDescription[]
): ServerDescription[] {
  if (tags == null || tags.length === 0) return candidates;

  for (const tagSet of tags) {
    const matched = candidates.filter(server => hasTags(server, tagSet));
    if (matched.length > 0) return matched;
  }
  return [];
}

function selectFromReplicaSet(
  readPreference: ReadPreference,
  description: TopologyDescription,
  servers: ServerDescription[]
): ServerDescription[] {
  const eligible = (filter: (server: ServerDescription) => boolean) =>
    matchingTagSet(
      readPreference,
      withinMaxStaleness(readPreference, description, servers.filter(filter))
    );
  const primaries = () => servers.filter(isPrimary);

  const mode = readPreference.mode;
  switch (mode) {
    case 'primary':
      return primaries();
    case 'primaryPreferred': {
      const primary = primaries();
      return primary.length > 0
        ? primary
        : latencyWindowReducer(description, eligible(isSecondary));
    }
    case 'secondary':
    case 'secondaryPreferred': {
      const secondaries = eligible(isSecondary);
      if (secondaries.length > 0) return latencyWindowReducer(description, secondaries);
      return mode === 'secondaryPreferred' ? primaries() : [];
    }
    case 'nearest':
      return latencyWindowReducer(description, eligible(isDataBearingMember));
    default: {
      const unexpected: never = mode;
      throw new DriverRuntimeError(`unexpected readPreference=${String(unexpected)}`);
    }
  }
}

/**
 * Selects servers for `readPreference`. The mode and its tag sets apply only in a replica set;
 * elsewhere the topology type decides.
 *
 * @throws DriverInvalidArgumentError when the read preference is invalid
 */
export function readPreferenceServerSelector(readPreference: ReadPreference): ServerSelector {
  if (!readPreference.isValid()) {
    throw new DriverInvalidArgumentError('Invalid read preference specified');
  }

  return (description, servers) => {
    const type = description.type;
    switch (type) {
      case TopologyType.Unknown:
        return [];
      case TopologyType.Single:
        return latencyWindowReducer(description, servers.filter(isKnown));
      case TopologyType.Sharded:
        return latencyWindowReducer(description, servers.filter(isRouter));
      case TopologyType.LoadBalanced:
        return servers.filter(isLoadBalancer);
      case TopologyType.ReplicaSetNoPrimary:
      case TopologyType.ReplicaSetWithPrimary:
        return selectFromReplicaSet(readPreference, description, servers);
      default: {
        const unexpected: never = type;
        throw new DriverRuntimeError(`unexpected topology type: ${String(unexpected)}`);
      }
    }
  };
}
