import { DriverError, DriverErrorLabel, DriverNetworkError } from '../error';
import type { ConnectionPool } from './connection_pool';

/**
 * An error indicating a connection pool is closed
 * @category Error
 */
export class PoolClosedError extends DriverError {
  /** The address of the connection pool */
  address: string;

  constructor(pool: Pick<ConnectionPool, 'address'>) {
    super('Attempted to check out a connection from closed connection pool');
    this.name = 'PoolClosedError';
    this.address = pool.address;
  }
}

/**
 * An error indicating a connection pool is currently paused
 * @category Error
 */
export class PoolClearedError extends DriverNetworkError {
  /** The address of the connection pool */
  address: string;

  constructor(pool: Pick<ConnectionPool, 'address' | 'serverError'>, message?: string) {
    const errorMessage = message
      ? message
      : `Connection pool for ${pool.address} was cleared because another operation failed with: "${
          pool.serverError?.message ?? 'unknown error'
        }"`;
    super(errorMessage, { cause: pool.serverError ?? undefined });
    this.name = 'PoolClearedError';
    this.address = pool.address;

    this.addErrorLabel(DriverErrorLabel.PoolRequestedRetry);
  }
}

/**
 * An error indicating that a connection pool has been cleared while the connection was in use.
 * @category Error
 */
export class PoolClearedOnNetworkError extends PoolClearedError {
  constructor(pool: Pick<ConnectionPool, 'address' | 'serverError'>) {
    super(pool, `Connection to ${pool.address} interrupted due to server monitor timeout`);
    this.name = 'PoolClearedOnNetworkError';
  }
}

/**
 * An error thrown when a request to check out a connection times out
 * @category Error
 */
export class WaitQueueTimeoutError extends DriverError {
  /** The address of the connection pool */
  address: string;

  constructor(message: string, address: string) {
    super(message);
    this.name = 'WaitQueueTimeoutError';
    this.address = address;
  }
}
