import {
  SERVER_SELECTION_FAILED,
  SERVER_SELECTION_STARTED,
  SERVER_SELECTION_SUCCEEDED,
  WAITING_FOR_SUITABLE_SERVER
} from '../constants';
import type { ReadPreference } from '../read_preference';
import type { ServerSelector } from './server_selection';
import type { TopologyDescription } from './topology_description';

/** What `selectServer` accepts: a mode name, a read preference or a selector function */
export type ServerSelectionCriteria = string | ReadPreference | ServerSelector;

function describeCriteria(criteria: ServerSelectionCriteria): string {
  if (typeof criteria === 'string') return criteria;
  if (typeof criteria === 'function') return 'custom selector';
  return JSON.stringify(criteria.toJSON());
}

/**
 * Common shape of the events published while a server is selected.
 * @public
 * @category Event
 */
export abstract class ServerSelectionEvent {
  /** The criteria as text; `custom selector` for a selector function */
  selector: string;
  /** The operation the server is for; `custom operation` when none was named */
  operation: string;

  /** @internal */
  abstract name:
    | typeof SERVER_SELECTION_STARTED
    | typeof SERVER_SELECTION_SUCCEEDED
    | typeof SERVER_SELECTION_FAILED
    | typeof WAITING_FOR_SUITABLE_SERVER;

  abstract message: string;

  /** @internal */
  constructor(
    criteria: ServerSelectionCriteria,
    operation: string | undefined,
    public topologyDescription: TopologyDescription
  ) {
    this.selector = describeCriteria(criteria);
    this.operation = operation ?? 'custom operation';
  }
}

/** @public @category Event */
export class ServerSelectionStartedEvent extends ServerSelectionEvent {
  /** @internal */
  name = SERVER_SELECTION_STARTED;
  message = 'Server selection started';
}

/** @public @category Event */
export class ServerSelectionFailedEvent extends ServerSelectionEvent {
  /** @internal */
  name = SERVER_SELECTION_FAILED;
  message = 'Server selection failed';

  /** @internal */
  constructor(
    criteria: ServerSelectionCriteria,
    operation: string | undefined,
    topologyDescription: TopologyDescription,
    /** The error handed to the caller */
    public failure: Error
  ) {
    super(criteria, operation, topologyDescription);
  }
}

/** @public @category Event */
export class ServerSelectionSucceededEvent extends ServerSelectionEvent {
  /** @internal */
  name = SERVER_SELECTION_SUCCEEDED;
  message = 'Server selection succeeded';

  /** @internal */
  constructor(
    criteria: ServerSelectionCriteria,
    operation: string | undefined,
    topologyDescription: TopologyDescription,
    public serverHost: string,
    public serverPort: number
  ) {
    super(criteria, operation, topologyDescription);
  }
}

/**
 * Published once per selection, the first time no server matched.
 * @public
 * @category Event
 */
export class WaitingForSuitableServerEvent extends ServerSelectionEvent {
  /** @internal */
  name = WAITING_FOR_SUITABLE_SERVER;
  message = 'Waiting for suitable server to become available';

  /** @internal */
  constructor(
    criteria: ServerSelectionCriteria,
    operation: string | undefined,
    topologyDescription: TopologyDescription,
    /** Time left before the selection times out, -1 without a limit */
    public remainingTimeMS: number
  ) {
    super(criteria, operation, topologyDescription);
  }
}
