import { type Document, EJSON, type ObjectId } from 'bson';

import {
  MAX_SUPPORTED_SERVER_VERSION,
  MAX_SUPPORTED_WIRE_VERSION,
  MIN_SUPPORTED_SERVER_VERSION,
  MIN_SUPPORTED_WIRE_VERSION
} from '../constants';
import { type AnyError, DriverRuntimeError, DriverStalePrimaryError } from '../error';
import { compareObjectId } from '../utils';
import { ServerType, TopologyType } from './common';
import { ServerDescription } from './server_description';

const MONGOS_OR_UNKNOWN = new Set<ServerType>([ServerType.Mongos, ServerType.Unknown]);
const MONGOS_OR_STANDALONE = new Set<ServerType>([ServerType.Mongos, ServerType.Standalone]);
const NON_PRIMARY_RS_MEMBERS = new Set<ServerType>([
  ServerType.RSSecondary,
  ServerType.RSArbiter,
  ServerType.RSOther
]);

/** @public */
export interface TopologyDescriptionOptions {
  heartbeatFrequencyMS?: number;
  localThresholdMS?: number;
}

/**
 * Representation of a deployment of servers. Every update returns a new description.
 * @public
 */
export class TopologyDescription {
  readonly type: TopologyType;
  readonly setName: string | null;
  readonly maxSetVersion: number | null;
  readonly maxElectionId: ObjectId | null;
  readonly servers: ReadonlyMap<string, ServerDescription>;
  readonly compatible: boolean;
  readonly compatibilityError?: string;
  readonly logicalSessionTimeoutMinutes: number | null;
  readonly heartbeatFrequencyMS: number;
  readonly localThresholdMS: number;
  readonly commonWireVersion: number | null;

  /**
   * Create a TopologyDescription
   */
  constructor(
    topologyType: TopologyType,
    serverDescriptions?: ReadonlyMap<string, ServerDescription> | null,
    setName?: string | null,
    maxSetVersion?: number | null,
    maxElectionId?: ObjectId | null,
    commonWireVersion?: number | null,
    options?: TopologyDescriptionOptions
  ) {
    options = options ?? {};

    this.type = topologyType ?? TopologyType.Unknown;
    this.servers = serverDescriptions ?? new Map();
    this.heartbeatFrequencyMS = options.heartbeatFrequencyMS ?? 0;
    this.localThresholdMS = options.localThresholdMS ?? 0;
    this.setName = setName ?? null;
    this.maxSetVersion = maxSetVersion ?? null;
    this.maxElectionId = maxElectionId ?? null;
    this.commonWireVersion = commonWireVersion ?? null;

    // determine server compatibility
    let compatible = true;
    for (const serverDescription of this.servers.values()) {
      // Load balancer mode is always compatible.
      if (
        serverDescription.type === ServerType.Unknown ||
        serverDescription.type === ServerType.LoadBalancer
      ) {
        continue;
      }

      if (serverDescription.minWireVersion > MAX_SUPPORTED_WIRE_VERSION) {
        compatible = false;
        this.compatibilityError = `Server at ${serverDescription.address} requires wire version ${serverDescription.minWireVersion}, but this version of the driver only supports up to ${MAX_SUPPORTED_WIRE_VERSION} (server ${MAX_SUPPORTED_SERVER_VERSION})`;
      }

      if (serverDescription.maxWireVersion < MIN_SUPPORTED_WIRE_VERSION) {
        compatible = false;
        this.compatibilityError = `Server at ${serverDescription.address} reports wire version ${serverDescription.maxWireVersion}, but this version of the driver requires at least ${MIN_SUPPORTED_WIRE_VERSION} (server ${MIN_SUPPORTED_SERVER_VERSION}).`;
        break;
      }
    }
    this.compatible = compatible;

    // smallest value among data-bearing servers, null as soon as one of them reports none
    let logicalSessionTimeoutMinutes: number | null = null;
    for (const server of this.servers.values()) {
      if (!server.isDataBearing) continue;

      if (server.logicalSessionTimeoutMinutes == null) {
        logicalSessionTimeoutMinutes = null;
        break;
      }

      logicalSessionTimeoutMinutes =
        logicalSessionTimeoutMinutes == null
          ? server.logicalSessionTimeoutMinutes
          : Math.min(logicalSessionTimeoutMinutes, server.logicalSessionTimeoutMinutes);
    }
    this.logicalSessionTimeoutMinutes = logicalSessionTimeoutMinutes;
  }

  /**
   * Returns a copy of this description updated with a given ServerDescription
   * @internal
   */
  update(serverDescription: ServerDescription): TopologyDescription {
    const address = serverDescription.address;

    // potentially mutated values
    let { type: topologyType, setName, maxSetVersion, maxElectionId, commonWireVersion } = this;

    if (
      topologyType === TopologyType.Single &&
      serverDescription.setName != null &&
      setName != null &&
      serverDescription.setName !== setName
    ) {
      serverDescription = new ServerDescription(address, undefined, {
        roundTripTime: serverDescription.roundTripTime
      });
    }

    const serverType = serverDescription.type;
    const serverDescriptions = new Map(this.servers);

    // update common wire version
    if (serverDescription.maxWireVersion !== 0) {
      if (commonWireVersion == null) {
        commonWireVersion = serverDescription.maxWireVersion;
      } else {
        commonWireVersion = Math.min(commonWireVersion, serverDescription.maxWireVersion);
      }
    }

    // update the actual server description
    serverDescriptions.set(address, serverDescription);

    const options = {
      heartbeatFrequencyMS: this.heartbeatFrequencyMS,
      localThresholdMS: this.localThresholdMS
    };

    if (topologyType === TopologyType.Single || topologyType === TopologyType.LoadBalanced) {
      // both are fixed at construction
      return new TopologyDescription(
        topologyType,
        serverDescriptions,
        setName,
        maxSetVersion,
        maxElectionId,
        commonWireVersion,
        options
      );
    }

    if (topologyType === TopologyType.Unknown) {
      if (serverType === ServerType.Standalone && this.servers.size !== 1) {
        serverDescriptions.delete(address);
      } else {
        topologyType = topologyTypeForServerType(serverType);
      }
    }

    if (topologyType === TopologyType.Sharded) {
      if (!MONGOS_OR_UNKNOWN.has(serverType)) {
        serverDescriptions.delete(address);
      }
    }

    if (topologyType === TopologyType.ReplicaSetNoPrimary) {
      if (MONGOS_OR_STANDALONE.has(serverType)) {
        serverDescriptions.delete(address);
      }

      if (serverType === ServerType.RSPrimary) {
        ({ topologyType, setName, maxSetVersion, maxElectionId } = updateRsFromPrimary(
          serverDescriptions,
          serverDescription,
          setName,
          maxSetVersion,
          maxElectionId
        ));
      } else if (NON_PRIMARY_RS_MEMBERS.has(serverType)) {
        ({ topologyType, setName } = updateRsNoPrimaryFromMember(
          serverDescriptions,
          serverDescription,
          setName
        ));
      }
    } else if (topologyType === TopologyType.ReplicaSetWithPrimary) {
      if (MONGOS_OR_STANDALONE.has(serverType)) {
        serverDescriptions.delete(address);
        topologyType = checkHasPrimary(serverDescriptions);
      } else if (serverType === ServerType.RSPrimary) {
        ({ topologyType, setName, maxSetVersion, maxElectionId } = updateRsFromPrimary(
          serverDescriptions,
          serverDescription,
          setName,
          maxSetVersion,
          maxElectionId
        ));
      } else if (NON_PRIMARY_RS_MEMBERS.has(serverType)) {
        topologyType = updateRsWithPrimaryFromMember(
          serverDescriptions,
          serverDescription,
          setName
        );
      } else {
        topologyType = checkHasPrimary(serverDescriptions);
      }
    }

    return new TopologyDescription(
      topologyType,
      serverDescriptions,
      setName,
      maxSetVersion,
      maxElectionId,
      commonWireVersion,
      options
    );
  }

  /** The error of the first server whose last check failed */
  get error(): AnyError | null {
    for (const description of this.servers.values()) {
      if (description.error != null) return description.error;
    }
    return null;
  }

  /**
   * Determines if the topology description has any known servers
   */
  get hasKnownServers(): boolean {
    return Array.from(this.servers.values()).some(
      (sd: ServerDescription) => sd.type !== ServerType.Unknown
    );
  }

  /**
   * Determines if this topology description has a data-bearing server available.
   */
  get hasDataBearingServers(): boolean {
    return Array.from(this.servers.values()).some((sd: ServerDescription) => sd.isDataBearing);
  }

  /**
   * Determines if the topology has a definition for the provided address
   * @internal
   */
  hasServer(address: string): boolean {
    return this.servers.has(address);
  }

  toJSON(): Document {
    const servers: Document = {};
    for (const [address, description] of this.servers) {
      servers[address] = description.toJSON();
    }

    return {
      type: this.type,
      setName: this.setName,
      maxSetVersion: this.maxSetVersion,
      maxElectionId: this.maxElectionId,
      servers,
      compatible: this.compatible,
      compatibilityError: this.compatibilityError ?? null,
      logicalSessionTimeoutMinutes: this.logicalSessionTimeoutMinutes,
      heartbeatFrequencyMS: this.heartbeatFrequencyMS,
      localThresholdMS: this.localThresholdMS,
      commonWireVersion: this.commonWireVersion
    };
  }

  toString(): string {
    return EJSON.stringify(this.toJSON(), { relaxed: true });
  }
}

function topologyTypeForServerType(serverType: ServerType): TopologyType {
  switch (serverType) {
    case ServerType.Standalone:
      return TopologyType.Single;
    case ServerType.Mongos:
      return TopologyType.Sharded;
    case ServerType.RSPrimary:
      return TopologyType.ReplicaSetWithPrimary;
    case ServerType.RSOther:
    case ServerType.RSSecondary:
    case ServerType.RSArbiter:
      return TopologyType.ReplicaSetNoPrimary;
    default:
      return TopologyType.Unknown;
  }
}

/**
 * Orders a primary's `(electionId, setVersion)` against the largest pair seen so far.
 * The election id decides first; when either side has none, the set version alone decides.
 */
function compareElectionState(
  electionId: ObjectId | null,
  setVersion: number | null,
  maxElectionId: ObjectId | null,
  maxSetVersion: number | null
): number {
  if (electionId != null && maxElectionId != null) {
    const electionComparison = compareObjectId(electionId, maxElectionId);
    if (electionComparison !== 0) return electionComparison;
  }

  if (setVersion != null && maxSetVersion != null) {
    return setVersion - maxSetVersion;
  }

  return 0;
}

interface PrimaryUpdate {
  topologyType: TopologyType;
  setName: string | null;
  maxSetVersion: number | null;
  maxElectionId: ObjectId | null;
}

function updateRsFromPrimary(
  serverDescriptions: Map<string, ServerDescription>,
  serverDescription: ServerDescription,
  setName: string | null,
  maxSetVersion: number | null,
  maxElectionId: ObjectId | null
): PrimaryUpdate {
  const address = serverDescription.address;
  setName = setName ?? serverDescription.setName;
  if (setName !== serverDescription.setName) {
    serverDescriptions.delete(address);
    return {
      topologyType: checkHasPrimary(serverDescriptions),
      setName,
      maxSetVersion,
      maxElectionId
    };
  }

  const { electionId, setVersion } = serverDescription;
  if (compareElectionState(electionId, setVersion, maxElectionId, maxSetVersion) < 0) {
    // this primary is stale, it is kept as Unknown
    const error = new DriverStalePrimaryError(
      `primary marked stale due to electionId/setVersion mismatch: ${describeElectionState(
        electionId,
        setVersion
      )} is older than ${describeElectionState(maxElectionId, maxSetVersion)}`
    );
    serverDescriptions.set(address, new ServerDescription(address, undefined, { error }));

    return {
      topologyType: checkHasPrimary(serverDescriptions),
      setName,
      maxSetVersion,
      maxElectionId
    };
  }

  if (
    electionId != null &&
    (maxElectionId == null || compareObjectId(electionId, maxElectionId) > 0)
  ) {
    maxElectionId = electionId;
    maxSetVersion = setVersion ?? maxSetVersion;
  } else if (setVersion != null && (maxSetVersion == null || setVersion > maxSetVersion)) {
    maxSetVersion = setVersion;
  }

  // every other primary is demoted
  for (const [otherAddress, server] of serverDescriptions) {
    if (server.type === ServerType.RSPrimary && otherAddress !== address) {
      serverDescriptions.set(otherAddress, new ServerDescription(otherAddress));
    }
  }

  // Discover new hosts from this primary's response.
  const responseAddresses = serverDescription.allHosts;
  for (const host of responseAddresses) {
    if (!serverDescriptions.has(host)) {
      serverDescriptions.set(host, new ServerDescription(host));
    }
  }

  // Remove hosts not in the response.
  for (const known of Array.from(serverDescriptions.keys())) {
    if (!responseAddresses.includes(known)) {
      serverDescriptions.delete(known);
    }
  }

  if (serverDescription.me != null && serverDescription.me !== address) {
    serverDescriptions.delete(address);
  }

  return {
    topologyType: checkHasPrimary(serverDescriptions),
    setName,
    maxSetVersion,
    maxElectionId
  };
}

function describeElectionState(electionId: ObjectId | null, setVersion: number | null): string {
  return `{ electionId: ${electionId?.toHexString() ?? 'null'}, setVersion: ${setVersion ?? 'null'} }`;
}

function updateRsWithPrimaryFromMember(
  serverDescriptions: Map<string, ServerDescription>,
  serverDescription: ServerDescription,
  setName: string | null
): TopologyType {
  if (setName == null) {
    throw new DriverRuntimeError('Argument "setName" is required if connected to a replica set');
  }

  if (
    setName !== serverDescription.setName ||
    (serverDescription.me != null && serverDescription.address !== serverDescription.me)
  ) {
    serverDescriptions.delete(serverDescription.address);
  }

  return checkHasPrimary(serverDescriptions);
}

function updateRsNoPrimaryFromMember(
  serverDescriptions: Map<string, ServerDescription>,
  serverDescription: ServerDescription,
  setName: string | null
): { topologyType: TopologyType; setName: string | null } {
  const topologyType = TopologyType.ReplicaSetNoPrimary;
  setName = setName ?? serverDescription.setName;
  if (setName !== serverDescription.setName) {
    serverDescriptions.delete(serverDescription.address);
    return { topologyType, setName };
  }

  for (const address of serverDescription.allHosts) {
    if (!serverDescriptions.has(address)) {
      serverDescriptions.set(address, new ServerDescription(address));
    }
  }

  if (serverDescription.me != null && serverDescription.address !== serverDescription.me) {
    serverDescriptions.delete(serverDescription.address);
  }

  return { topologyType, setName };
}

function checkHasPrimary(serverDescriptions: Map<string, ServerDescription>): TopologyType {
  for (const serverDescription of serverDescriptions.values()) {
    if (serverDescription.type === ServerType.RSPrimary) {
      return TopologyType.ReplicaSetWithPrimary;
    }
  }

  return TopologyType.ReplicaSetNoPrimary;
}
