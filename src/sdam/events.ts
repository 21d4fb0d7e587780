import type { Document } from 'bson';

import {
  SERVER_CLOSED,
  SERVER_DESCRIPTION_CHANGED,
  SERVER_HEARTBEAT_FAILED,
  SERVER_HEARTBEAT_STARTED,
  SERVER_HEARTBEAT_SUCCEEDED,
  SERVER_OPENING,
  TOPOLOGY_CLOSED,
  TOPOLOGY_DESCRIPTION_CHANGED,
  TOPOLOGY_OPENING
} from '../constants';
import type { ServerDescription } from './server_description';
import type { TopologyDescription } from './topology_description';

/**
 * Common shape of discovery and monitoring events; `topologyId` tells topologies apart.
 * @public
 * @category Event
 */
export abstract class ServerDiscoveryAndMonitoringEvent {
  /** @internal */
  abstract name:
    | typeof TOPOLOGY_CLOSED
    | typeof TOPOLOGY_DESCRIPTION_CHANGED
    | typeof TOPOLOGY_OPENING
    | typeof SERVER_OPENING
    | typeof SERVER_CLOSED
    | typeof SERVER_DESCRIPTION_CHANGED
    | typeof SERVER_HEARTBEAT_FAILED
    | typeof SERVER_HEARTBEAT_STARTED
    | typeof SERVER_HEARTBEAT_SUCCEEDED;

  /** @internal */
  constructor(public topologyId: number) {}
}

/**
 * Events about one member of the topology, identified by its host:port.
 * @public
 */
export abstract class ServerLifecycleEvent extends ServerDiscoveryAndMonitoringEvent {
  /** @internal */
  constructor(
    topologyId: number,
    public address: string
  ) {
    super(topologyId);
  }
}

/** @public @category Event */
export class ServerOpeningEvent extends ServerLifecycleEvent {
  /** @internal */
  name = SERVER_OPENING;
}

/** @public @category Event */
export class ServerClosedEvent extends ServerLifecycleEvent {
  /** @internal */
  name = SERVER_CLOSED;
}

/**
 * A member's description changed in something other than its round trip time.
 * @public
 * @category Event
 */
export class ServerDescriptionChangedEvent extends ServerLifecycleEvent {
  /** @internal */
  name = SERVER_DESCRIPTION_CHANGED;

  /** @internal */
  constructor(
    topologyId: number,
    address: string,
    public previousDescription: ServerDescription,
    public newDescription: ServerDescription
  ) {
    super(topologyId, address);
  }
}

/** @public @category Event */
export class TopologyOpeningEvent extends ServerDiscoveryAndMonitoringEvent {
  /** @internal */
  name = TOPOLOGY_OPENING;
}

/** @public @category Event */
export class TopologyClosedEvent extends ServerDiscoveryAndMonitoringEvent {
  /** @internal */
  name = TOPOLOGY_CLOSED;
}

/** @public @category Event */
export class TopologyDescriptionChangedEvent extends ServerDiscoveryAndMonitoringEvent {
  /** @internal */
  name = TOPOLOGY_DESCRIPTION_CHANGED;

  /** @internal */
  constructor(
    topologyId: number,
    public previousDescription: TopologyDescription,
    public newDescription: TopologyDescription
  ) {
    super(topologyId);
  }
}

/**
 * Events of a monitor's check. `connectionId` is the monitored host:port and `awaited` is
 * true for streamed replies.
 * @public
 */
export abstract class ServerHeartbeatEvent extends ServerDiscoveryAndMonitoringEvent {
  /** @internal */
  constructor(
    topologyId: number,
    public connectionId: string,
    public awaited: boolean
  ) {
    super(topologyId);
  }
}

/** @public @category Event */
export class ServerHeartbeatStartedEvent extends ServerHeartbeatEvent {
  /** @internal */
  name = SERVER_HEARTBEAT_STARTED;
}

/** @public @category Event */
export class ServerHeartbeatSucceededEvent extends ServerHeartbeatEvent {
  /** @internal */
  name = SERVER_HEARTBEAT_SUCCEEDED;
  reply: Document;

  /** @internal */
  constructor(
    topologyId: number,
    connectionId: string,
    /** Milliseconds the check took */
    public duration: number,
    reply: Document | null,
    awaited: boolean
  ) {
    super(topologyId, connectionId, awaited);
    this.reply = reply ?? {};
  }
}

/**
 * The check failed, on the network or with an `ok: 0` reply.
 * @public
 * @category Event
 */
export class ServerHeartbeatFailedEvent extends ServerHeartbeatEvent {
  /** @internal */
  name = SERVER_HEARTBEAT_FAILED;

  /** @internal */
  constructor(
    topologyId: number,
    connectionId: string,
    public duration: number,
    public failure: Error,
    awaited: boolean
  ) {
    super(topologyId, connectionId, awaited);
  }
}
