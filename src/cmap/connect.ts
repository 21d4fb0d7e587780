import type { Document } from 'bson';

import {
  HELLO_COMMAND,
  LEGACY_HELLO_COMMAND,
  MAX_SUPPORTED_SERVER_VERSION,
  MAX_SUPPORTED_WIRE_VERSION,
  MIN_SUPPORTED_SERVER_VERSION,
  MIN_SUPPORTED_WIRE_VERSION
} from '../constants';
import {
  DriverCompatibilityError,
  DriverError,
  DriverNetworkError,
  DriverNetworkTimeoutError
} from '../error';
import { raceWithTimeout } from '../timeout';
import { Connection, type ConnectionOptions, type TransportFactory } from './connection';

/** @internal */
export interface MakeConnectionOptions extends ConnectionOptions {
  transportFactory: TransportFactory;
  connectTimeoutMS: number;
}

/**
 * Opens a transport to `options.hostAddress` and performs the initial handshake over it.
 * The connection is destroyed when the handshake fails.
 * @internal
 */
export async function connect(options: MakeConnectionOptions): Promise<Connection> {
  const transport = await makeTransport(options);
  const connection = new Connection(transport, options);

  try {
    await performInitialHandshake(connection, options);
  } catch (error) {
    connection.destroy();
    throw error;
  }

  return connection;
}

async function makeTransport(options: MakeConnectionOptions) {
  const { hostAddress, connectTimeoutMS, transportFactory } = options;
  try {
    return await raceWithTimeout(
      transportFactory.connect(hostAddress, { connectTimeoutMS }),
      connectTimeoutMS,
      timeoutError =>
        new DriverNetworkTimeoutError(`connection timed out to ${hostAddress.toString()}`, {
          beforeHandshake: true,
          cause: timeoutError
        })
    );
  } catch (error) {
    throw connectionFailureError(error);
  }
}

function connectionFailureError(error: unknown): DriverError {
  if (error instanceof DriverError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new DriverNetworkError(message, { beforeHandshake: true, cause: error });
}

/** @internal */
export interface HandshakeDocument extends Document {
  hello?: 1;
  helloOk?: true;
}

/** @internal */
export function prepareHandshakeDocument(): HandshakeDocument {
  return { [HELLO_COMMAND]: 1, helloOk: true };
}

function checkSupportedServer(hello: Document, options: ConnectionOptions) {
  const maxWireVersion: unknown = hello.maxWireVersion;
  const minWireVersion: unknown = hello.minWireVersion;
  const serverVersionHighEnough =
    typeof maxWireVersion === 'number' && maxWireVersion >= MIN_SUPPORTED_WIRE_VERSION;
  const serverVersionLowEnough =
    typeof minWireVersion === 'number' && minWireVersion <= MAX_SUPPORTED_WIRE_VERSION;

  if (serverVersionHighEnough) {
    if (serverVersionLowEnough) {
      return null;
    }

    const message = `Server at ${options.hostAddress.toString()} reports minimum wire version ${JSON.stringify(
      minWireVersion
    )}, but this version of the driver requires at most ${MAX_SUPPORTED_WIRE_VERSION} (server ${MAX_SUPPORTED_SERVER_VERSION})`;
    return new DriverCompatibilityError(message);
  }

  const message = `Server at ${options.hostAddress.toString()} reports maximum wire version ${
    JSON.stringify(maxWireVersion) ?? 0
  }, but this version of the driver requires at least ${MIN_SUPPORTED_WIRE_VERSION} (server ${MIN_SUPPORTED_SERVER_VERSION})`;
  return new DriverCompatibilityError(message);
}

async function performInitialHandshake(
  conn: Connection,
  options: MakeConnectionOptions
): Promise<void> {
  // The handshake technically is a monitoring check, so its timeout is connectTimeoutMS
  const response = await conn.command(prepareHandshakeDocument(), {
    timeoutMS: options.connectTimeoutMS
  });

  if (!('isWritablePrimary' in response)) {
    // Provide hello-style response document.
    response.isWritablePrimary = response[LEGACY_HELLO_COMMAND];
  }

  const supportedServerErr = checkSupportedServer(response, options);
  if (supportedServerErr) {
    throw supportedServerErr;
  }

  conn.hello = response;
  conn.established = true;
}
