import { expect } from 'chai';
import { once } from 'events';
import * as sinon from 'sinon';

import type { Connection } from '../../../src/cmap/connection';
import { ConnectionPool, type ConnectionPoolOptions } from '../../../src/cmap/connection_pool';
import type { ConnectionClosedEvent } from '../../../src/cmap/connection_pool_events';
import {
  PoolClearedError,
  PoolClearedOnNetworkError,
  PoolClosedError,
  WaitQueueTimeoutError
} from '../../../src/cmap/errors';
import { DriverConfigurationError, DriverNetworkError } from '../../../src/error';
import { HostAddress } from '../../../src/utils';
import { type FakeServer, FakeTransportFactory } from '../../tools/fake_transport';

const POOL_EVENTS = [
  'connectionPoolCreated',
  'connectionPoolReady',
  'connectionPoolCleared',
  'connectionPoolClosed',
  'connectionCreated',
  'connectionReady',
  'connectionClosed',
  'connectionCheckOutStarted',
  'connectionCheckOutFailed',
  'connectionCheckedOut',
  'connectionCheckedIn'
] as const;

describe('Connection Pool', function () {
  let factory: FakeTransportFactory;
  let server: FakeServer;
  let pool: ConnectionPool;
  let events: string[];

  function makePool(options: Partial<ConnectionPoolOptions> = {}): ConnectionPool {
    pool = new ConnectionPool({
      hostAddress: HostAddress.fromString('a:27017'),
      transportFactory: factory,
      connectTimeoutMS: 1000,
      ...options
    });
    for (const name of POOL_EVENTS) {
      pool.on(name, () => events.push(name));
    }
    return pool;
  }

  beforeEach(function () {
    events = [];
    factory = new FakeTransportFactory();
    server = factory.addServer('a:27017');
  });

  afterEach(function () {
    pool?.close();
    factory.cleanup();
  });

  it('rejects a minimum size above the maximum size', function () {
    expect(() => makePool({ minPoolSize: 5, maxPoolSize: 1 })).to.throw(
      DriverConfigurationError,
      'Connection pool minimum size must not be greater than maximum pool size'
    );
  });

  it('starts paused and announces itself on the next tick', async function () {
    makePool();
    expect(pool.state).to.equal('paused');
    expect(events).to.deep.equal([]);

    await once(pool, 'connectionPoolCreated');
    expect(events).to.deep.equal(['connectionPoolCreated']);
  });

  describe('checkOut()', function () {
    it('creates a connection and checks it out', async function () {
      makePool();
      pool.ready();

      const connection = await pool.checkOut();

      expect(connection.id).to.equal(1);
      expect(connection.generation).to.equal(0);
      expect(pool.currentCheckedOutCount).to.equal(1);
      expect(events).to.deep.equal([
        'connectionPoolReady',
        'connectionCheckOutStarted',
        'connectionPoolCreated',
        'connectionCreated',
        'connectionReady',
        'connectionCheckedOut'
      ]);
    });

    it('reuses a connection that was checked in', async function () {
      makePool();
      pool.ready();

      const first = await pool.checkOut();
      pool.checkIn(first);
      const second = await pool.checkOut();

      expect(second).to.equal(first);
      expect(server.connectionCount).to.equal(1);
    });

    it('never hands one connection to two callers', async function () {
      makePool({ maxPoolSize: 1 });
      pool.ready();

      const first = await pool.checkOut();
      let second: Connection | null = null;
      const waiting = pool.checkOut().then(connection => {
        second = connection;
        return connection;
      });
      await new Promise(resolve => setImmediate(resolve));

      expect(second).to.be.null;
      expect(pool.waitQueueSize).to.equal(1);
      expect(pool.totalConnectionCount).to.equal(1);

      pool.checkIn(first);
      expect(await waiting).to.equal(first);
      expect(server.connectionCount).to.equal(1);
    });

    it('times out waiting for a connection', async function () {
      makePool({ maxPoolSize: 1, waitQueueTimeoutMS: 20 });
      pool.ready();
      await pool.checkOut();

      const error = await pool.checkOut().catch(error => error);

      expect(error).to.be.instanceOf(WaitQueueTimeoutError);
      expect(error).to.include({
        message: 'Timed out while checking out a connection from connection pool',
        address: 'a:27017'
      });
      expect(events).to.include('connectionCheckOutFailed');
    });

    it('fails while the pool is paused', async function () {
      makePool();

      const error = await pool.checkOut().catch(error => error);

      expect(error).to.be.instanceOf(PoolClearedError);
      expect(error).to.have.property(
        'message',
        'Connection pool for a:27017 was cleared because another operation failed with: ' +
          '"unknown error"'
      );
      expect(error.hasErrorLabel('PoolRequestedRetry')).to.be.true;
    });

    it('fails once the pool is closed', async function () {
      makePool();
      pool.ready();
      pool.close();

      const error = await pool.checkOut().catch(error => error);

      expect(error).to.be.instanceOf(PoolClosedError);
      expect(error).to.have.property(
        'message',
        'Attempted to check out a connection from closed connection pool'
      );
    });

    it('reports a connection that could not be established', async function () {
      makePool();
      pool.ready();
      server.connectError = new Error('connect ECONNRESET a:27017');
      const onCreationFailed = sinon.spy();
      pool.on('connectionCreationFailed', onCreationFailed);

      const error = await pool.checkOut().catch(error => error);

      expect(error).to.be.instanceOf(DriverNetworkError);
      expect(error).to.have.property('message', 'connect ECONNRESET a:27017');
      expect(onCreationFailed).to.have.been.calledOnceWithExactly(error, 0);
      expect(pool.totalConnectionCount).to.equal(0);
    });
  });

  describe('checkIn()', function () {
    it('ignores a connection the pool did not hand out', async function () {
      makePool();
      pool.ready();
      const connection = await pool.checkOut();
      pool.checkIn(connection);
      events = [];

      pool.checkIn(connection);

      expect(events).to.deep.equal([]);
      expect(pool.availableConnectionCount).to.equal(1);
    });

    it('destroys a connection from an older generation', async function () {
      makePool();
      pool.ready();
      const connection = await pool.checkOut();
      const closed: ConnectionClosedEvent[] = [];
      pool.on('connectionClosed', event => closed.push(event));

      pool.clear();
      pool.ready();
      pool.checkIn(connection);

      expect(connection.closed).to.be.true;
      expect(pool.availableConnectionCount).to.equal(0);
      expect(closed.map(event => event.reason)).to.deep.equal(['stale']);
    });

    it('destroys a connection that closed while checked out', async function () {
      makePool();
      pool.ready();
      const connection = await pool.checkOut();
      connection.destroy();
      const closed: ConnectionClosedEvent[] = [];
      pool.on('connectionClosed', event => closed.push(event));

      pool.checkIn(connection);

      expect(pool.availableConnectionCount).to.equal(0);
      expect(closed.map(event => event.reason)).to.deep.equal(['error']);
    });
  });

  describe('clear()', function () {
    it('pauses the pool and moves to the next generation', async function () {
      makePool();
      pool.ready();
      await once(pool, 'connectionPoolCreated');

      pool.clear({ error: new DriverNetworkError('connection reset') });

      expect(pool.generation).to.equal(1);
      expect(pool.state).to.equal('paused');
      expect(events.slice(-1)).to.deep.equal(['connectionPoolCleared']);

      const error = await pool.checkOut().catch(error => error);
      expect(error).to.be.instanceOf(PoolClearedError);
      expect(error).to.have.property(
        'message',
        'Connection pool for a:27017 was cleared because another operation failed with: ' +
          '"connection reset"'
      );
    });

    it('destroys the available connections as stale', async function () {
      makePool();
      pool.ready();
      const connection = await pool.checkOut();
      pool.checkIn(connection);
      const closed: ConnectionClosedEvent[] = [];
      pool.on('connectionClosed', event => closed.push(event));

      pool.clear();

      expect(connection.closed).to.be.true;
      expect(pool.availableConnectionCount).to.equal(0);
      expect(server.openConnectionCount).to.equal(0);
      expect(closed.map(event => event.reason)).to.deep.equal(['stale']);
      expect(events.slice(-2)).to.deep.equal(['connectionPoolCleared', 'connectionClosed']);
    });

    it('emits cleared only when the pool was ready', function () {
      makePool();
      pool.clear();
      pool.clear();

      expect(pool.generation).to.equal(2);
      expect(events).to.not.include('connectionPoolCleared');
    });

    it('interrupts connections in use when asked to', async function () {
      makePool();
      pool.ready();
      const connection = await pool.checkOut();
      const closed: ConnectionClosedEvent[] = [];
      pool.on('connectionClosed', event => closed.push(event));

      pool.clear({ interruptInUseConnections: true });
      await new Promise(resolve => process.nextTick(resolve));

      expect(connection.closed).to.be.true;
      expect(pool.currentCheckedOutCount).to.equal(0);
      expect(closed.map(event => event.reason)).to.deep.equal(['dropped']);
      const error = await connection.command({ ping: 1 }).catch(error => error);
      expect(error).to.be.instanceOf(PoolClearedOnNetworkError);
      expect(error).to.have.property(
        'message',
        'Connection to a:27017 interrupted due to server monitor timeout'
      );
    });
  });

  describe('close()', function () {
    it('destroys the available connections', async function () {
      makePool();
      pool.ready();
      const connection = await pool.checkOut();
      pool.checkIn(connection);

      pool.close();

      expect(connection.closed).to.be.true;
      expect(pool.closed).to.be.true;
      expect(server.openConnectionCount).to.equal(0);
      expect(events.slice(-2)).to.deep.equal(['connectionClosed', 'connectionPoolClosed']);
    });

    it('destroys a connection checked in after closing', async function () {
      makePool();
      pool.ready();
      const connection = await pool.checkOut();

      pool.close();
      pool.checkIn(connection);

      expect(connection.closed).to.be.true;
    });
  });

  describe('minPoolSize', function () {
    it('opens connections in the background once ready', async function () {
      makePool({ minPoolSize: 2, minPoolSizeCheckFrequencyMS: 1 });
      pool.ready();

      await once(pool, 'connectionReady');
      await once(pool, 'connectionReady');
      await new Promise(resolve => setImmediate(resolve));

      expect(pool.availableConnectionCount).to.equal(2);
      expect(server.connectionCount).to.equal(2);
    });
  });
});
