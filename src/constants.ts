// events
export const CONNECT = 'connect' as const;
export const CLOSE = 'close' as const;
export const CLOSED = 'closed' as const;
export const DESCRIPTION_RECEIVED = 'descriptionReceived' as const;
export const RESET_SERVER = 'resetServer' as const;
export const SERVER_OPENING = 'serverOpening' as const;
export const SERVER_CLOSED = 'serverClosed' as const;
export const SERVER_DESCRIPTION_CHANGED = 'serverDescriptionChanged' as const;
export const TOPOLOGY_OPENING = 'topologyOpening' as const;
export const TOPOLOGY_CLOSED = 'topologyClosed' as const;
export const TOPOLOGY_DESCRIPTION_CHANGED = 'topologyDescriptionChanged' as const;
export const CONNECTION_POOL_CREATED = 'connectionPoolCreated' as const;
export const CONNECTION_POOL_CLOSED = 'connectionPoolClosed' as const;
export const CONNECTION_POOL_CLEARED = 'connectionPoolCleared' as const;
export const CONNECTION_POOL_READY = 'connectionPoolReady' as const;
export const CONNECTION_CREATED = 'connectionCreated' as const;
export const CONNECTION_READY = 'connectionReady' as const;
export const CONNECTION_CLOSED = 'connectionClosed' as const;
export const CONNECTION_CHECK_OUT_STARTED = 'connectionCheckOutStarted' as const;
export const CONNECTION_CHECK_OUT_FAILED = 'connectionCheckOutFailed' as const;
export const CONNECTION_CHECKED_OUT = 'connectionCheckedOut' as const;
export const CONNECTION_CHECKED_IN = 'connectionCheckedIn' as const;
export const SERVER_HEARTBEAT_STARTED = 'serverHeartbeatStarted' as const;
export const SERVER_HEARTBEAT_SUCCEEDED = 'serverHeartbeatSucceeded' as const;
export const SERVER_HEARTBEAT_FAILED = 'serverHeartbeatFailed' as const;
export const SERVER_SELECTION_STARTED = 'serverSelectionStarted' as const;
export const SERVER_SELECTION_FAILED = 'serverSelectionFailed' as const;
export const SERVER_SELECTION_SUCCEEDED = 'serverSelectionSucceeded' as const;
export const WAITING_FOR_SUITABLE_SERVER = 'waitingForSuitableServer' as const;

/** @public */
export const HEARTBEAT_EVENTS = Object.freeze([
  SERVER_HEARTBEAT_STARTED,
  SERVER_HEARTBEAT_SUCCEEDED,
  SERVER_HEARTBEAT_FAILED
] as const);

/** @public */
export const CMAP_EVENTS = Object.freeze([
  CONNECTION_POOL_CREATED,
  CONNECTION_POOL_READY,
  CONNECTION_POOL_CLEARED,
  CONNECTION_POOL_CLOSED,
  CONNECTION_CREATED,
  CONNECTION_READY,
  CONNECTION_CLOSED,
  CONNECTION_CHECK_OUT_STARTED,
  CONNECTION_CHECK_OUT_FAILED,
  CONNECTION_CHECKED_OUT,
  CONNECTION_CHECKED_IN
] as const);

/** @public */
export const SERVER_SELECTION_EVENTS = Object.freeze([
  SERVER_SELECTION_STARTED,
  SERVER_SELECTION_FAILED,
  SERVER_SELECTION_SUCCEEDED,
  WAITING_FOR_SUITABLE_SERVER
] as const);

/** Wire versions this driver can talk to */
export const MIN_SUPPORTED_WIRE_VERSION = 6;
export const MAX_SUPPORTED_WIRE_VERSION = 25;
export const MIN_SUPPORTED_SERVER_VERSION = '3.6';
export const MAX_SUPPORTED_SERVER_VERSION = '8.0';

/** The name of the health-check command */
export const LEGACY_HELLO_COMMAND = 'ismaster';
export const HELLO_COMMAND = 'hello';
