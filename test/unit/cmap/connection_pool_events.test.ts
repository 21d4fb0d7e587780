import { expect } from 'chai';

import { ConnectionPool } from '../../../src/cmap/connection_pool';
import {
  ConnectionClosedEvent,
  ConnectionPoolClearedEvent,
  ConnectionPoolCreatedEvent
} from '../../../src/cmap/connection_pool_events';
import { DriverNetworkError } from '../../../src/error';
import { HostAddress } from '../../../src/utils';
import { FakeTransportFactory } from '../../tools/fake_transport';

describe('Connection Pool Events', function () {
  let pool: ConnectionPool;

  beforeEach(function () {
    pool = new ConnectionPool({
      hostAddress: HostAddress.fromString('localhost:9000'),
      transportFactory: new FakeTransportFactory(),
      connectTimeoutMS: 1000,
      maxPoolSize: 10,
      waitQueueTimeoutMS: 1000
    });
  });

  afterEach(function () {
    pool.close();
  });

  describe('ConnectionPoolCreatedEvent', function () {
    it('reports only the sizing and timeout options', function () {
      const event = new ConnectionPoolCreatedEvent(pool);

      expect(event.address).to.equal('localhost:9000');
      expect(event.options).to.deep.equal({
        maxPoolSize: 10,
        minPoolSize: 0,
        maxConnecting: 2,
        maxIdleTimeMS: 0,
        waitQueueTimeoutMS: 1000
      });
    });
  });

  describe('ConnectionPoolClearedEvent', function () {
    it('only carries interruptInUseConnections when set', function () {
      expect(new ConnectionPoolClearedEvent(pool).interruptInUseConnections).to.be.undefined;
      expect(
        new ConnectionPoolClearedEvent(pool, { interruptInUseConnections: true })
      ).to.have.property('interruptInUseConnections', true);
    });
  });

  describe('ConnectionClosedEvent', function () {
    it('keeps the error that closed the connection', function () {
      const error = new DriverNetworkError('connection reset');

      const event = new ConnectionClosedEvent(pool, { id: 3 }, 'error', error);

      expect(event).to.include({ connectionId: 3, reason: 'error', error });
      expect(new ConnectionClosedEvent(pool, { id: 3 }, 'stale').error).to.be.null;
    });
  });
});
