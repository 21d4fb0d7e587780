export { EJSON, Long, ObjectId } from 'bson';

/** @public */
export { PoolClearedError, PoolClosedError, WaitQueueTimeoutError } from './cmap/errors';
export {
  DriverAPIError,
  DriverCompatibilityError,
  DriverConfigurationError,
  DriverError,
  DriverErrorLabel,
  DriverInvalidArgumentError,
  DriverNetworkError,
  DriverNetworkTimeoutError,
  DriverRuntimeError,
  DriverServerError,
  DriverServerSelectionError,
  DriverStalePrimaryError,
  DriverTimeoutError,
  DriverTopologyClosedError,
  isNetworkErrorBeforeHandshake,
  isNodeShuttingDownError,
  isStateChangeError
} from './error';
export { LoggableComponent, SeverityLevel } from './logger';
export { DEFAULT_OPTIONS, resolveOptions } from './options';
export { ReadPreference, ReadPreferenceMode } from './read_preference';
export { ServerType, TopologyType } from './sdam/common';
export { ServerMonitoringMode } from './sdam/monitor';
export { ServerDescription } from './sdam/server_description';
export {
  latencyWindowReducer,
  readPreferenceServerSelector,
  writableServerSelector
} from './sdam/server_selection';
export { Topology } from './sdam/topology';
export { TopologyDescription } from './sdam/topology_description';
export { HostAddress } from './utils';

export {
  ConnectionCheckedInEvent,
  ConnectionCheckedOutEvent,
  ConnectionCheckOutFailedEvent,
  ConnectionCheckOutStartedEvent,
  ConnectionClosedEvent,
  ConnectionCreatedEvent,
  ConnectionPoolClearedEvent,
  ConnectionPoolClosedEvent,
  ConnectionPoolCreatedEvent,
  ConnectionPoolMonitoringEvent,
  ConnectionPoolReadyEvent,
  ConnectionReadyEvent
} from './cmap/connection_pool_events';
export {
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
export {
  ServerSelectionEvent,
  ServerSelectionFailedEvent,
  ServerSelectionStartedEvent,
  ServerSelectionSucceededEvent,
  WaitingForSuitableServerEvent
} from './sdam/server_selection_events';

export type { Document } from 'bson';
export type {
  CommandOptions,
  Connection,
  ConnectionEvents,
  Transport,
  TransportFactory
} from './cmap/connection';
export type { ConnectionPoolEvents } from './cmap/connection_pool';
export type {
  ConnectionCheckOutFailedReason,
  ConnectionClosedReason
} from './cmap/connection_pool_events';
export type { AnyError, DriverErrorOptions, DriverNetworkErrorOptions } from './error';
export type {
  Log,
  LoggerClientOptions,
  LoggerEnvOptions,
  LogWritable
} from './logger';
export type { TopologyUserOptions } from './options';
export type {
  ReadPreferenceFromOptions,
  ReadPreferenceLike,
  ReadPreferenceOptions
} from './read_preference';
export type { CheckInOutcome, Server, ServerEvents } from './sdam/server';
export type { TagSet, TopologyVersion } from './sdam/server_description';
export type { ServerSelector } from './sdam/server_selection';
export type { ServerSelectionCriteria } from './sdam/server_selection_events';
export type {
  ConnectOptions,
  SelectServerOptions,
  TopologyEvents,
  TopologyOptions
} from './sdam/topology';
export type { TopologyDescriptionOptions } from './sdam/topology_description';
