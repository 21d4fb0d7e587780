import { expect } from 'chai';
import { once } from 'events';
import * as sinon from 'sinon';

import {
  DriverErrorLabel,
  DriverNetworkError,
  DriverNetworkTimeoutError,
  DriverServerError
} from '../../../src/error';
import { ServerType } from '../../../src/sdam/common';
import { Server, type ServerOptions } from '../../../src/sdam/server';
import { ServerDescription } from '../../../src/sdam/server_description';
import {
  FakeTransportFactory,
  makeTopologyVersion,
  newProcessId,
  standaloneHello
} from '../../tools/fake_transport';

describe('Server', function () {
  const processId = newProcessId();
  let factory: FakeTransportFactory;
  let server: Server;
  let received: ServerDescription[];

  function makeServer(
    description = new ServerDescription('a:27017', standaloneHello()),
    options: Partial<ServerOptions> = {}
  ): Server {
    server = new Server(description, {
      topologyId: 1,
      transportFactory: factory,
      connectTimeoutMS: 1000,
      heartbeatFrequencyMS: 10000,
      minHeartbeatFrequencyMS: 500,
      serverMonitoringMode: 'poll',
      loadBalanced: false,
      ...options
    });
    server.on('descriptionReceived', description => received.push(description));
    return server;
  }

  function stateChangeError(code: number, counter?: number) {
    return new DriverServerError({
      ok: 0,
      code,
      errmsg: 'state changed',
      ...(counter != null ? { topologyVersion: makeTopologyVersion(processId, counter) } : {})
    });
  }

  beforeEach(function () {
    factory = new FakeTransportFactory();
    factory.addServer('a:27017');
    received = [];
  });

  afterEach(function () {
    server?.close();
    factory.cleanup();
  });

  describe('connect()', function () {
    it('reports the first heartbeat as a description and emits connect', async function () {
      makeServer(new ServerDescription('a:27017'));

      const connected = once(server, 'connect');
      server.connect();
      await connected;

      expect(received).to.have.lengthOf(1);
      expect(received[0].type).to.equal(ServerType.Standalone);
      expect(received[0].address).to.equal('a:27017');
    });

    it('connects a load balancer without monitoring it', async function () {
      makeServer(new ServerDescription('a:27017', undefined, { loadBalanced: true }), {
        loadBalanced: true
      });

      const connected = once(server, 'connect');
      server.connect();
      await connected;

      expect(server.monitor).to.be.null;
      expect(received).to.deep.equal([]);
    });
  });

  describe('close()', function () {
    it('closes the pool and emits closed', async function () {
      makeServer();
      server.connect();
      const onClosed = sinon.spy();
      server.on('closed', onClosed);

      server.close();
      server.close();

      expect(server.pool.closed).to.be.true;
      expect(onClosed).to.have.been.calledOnce;
    });
  });

  describe('handleError()', function () {
    context('network errors', function () {
      it('marks the server Unknown and asks to reset the pool', function () {
        makeServer();
        const error = new DriverNetworkError('connection reset');

        server.handleError(error, 0);

        expect(received).to.have.lengthOf(1);
        expect(received[0].type).to.equal(ServerType.Unknown);
        expect(received[0].error).to.equal(error);
        expect(error.hasErrorLabel(DriverErrorLabel.ResetPool)).to.be.true;
      });

      it('requests an immediate check on the next tick', async function () {
        makeServer();
        const requestCheck = sinon.spy(server, 'requestCheck');

        server.handleError(new DriverNetworkError('connection reset'), 0);
        expect(requestCheck).to.not.have.been.called;

        await new Promise(resolve => process.nextTick(resolve));
        expect(requestCheck).to.have.been.calledOnce;
      });

      it('marks the server Unknown on a timeout before the handshake', function () {
        makeServer();
        const error = new DriverNetworkTimeoutError('timed out', { beforeHandshake: true });

        server.handleError(error, 0);

        expect(received.map(description => description.error)).to.deep.equal([error]);
        expect(error.hasErrorLabel(DriverErrorLabel.ResetPool)).to.be.true;
      });

      it('ignores a timeout after the handshake', function () {
        makeServer();

        server.handleError(new DriverNetworkTimeoutError('timed out'), 0);

        expect(received).to.deep.equal([]);
      });

      it('ignores errors from connections older than the pool', function () {
        makeServer();
        server.pool.clear();

        server.handleError(new DriverNetworkError('connection reset'), 0);

        expect(received).to.deep.equal([]);
      });

      it('only clears the pool of a load balancer', function () {
        makeServer(new ServerDescription('a:27017', undefined, { loadBalanced: true }), {
          loadBalanced: true
        });

        server.handleError(new DriverNetworkError('connection reset'), 0);

        expect(server.pool.generation).to.equal(1);
        expect(received).to.deep.equal([]);
      });
    });

    context('state change errors', function () {
      it('marks the server Unknown without resetting the pool', function () {
        makeServer();
        const error = stateChangeError(10107);

        server.handleError(error, 0);

        expect(received.map(description => description.error)).to.deep.equal([error]);
        expect(error.hasErrorLabel(DriverErrorLabel.ResetPool)).to.be.false;
      });

      it('resets the pool when the node is shutting down', function () {
        makeServer();
        const error = stateChangeError(91);

        server.handleError(error, 0);

        expect(received).to.have.lengthOf(1);
        expect(error.hasErrorLabel(DriverErrorLabel.ResetPool)).to.be.true;
      });

      it('resets the pool of an old server', function () {
        const hello = standaloneHello({ minWireVersion: 0, maxWireVersion: 7 });
        makeServer(new ServerDescription('a:27017', hello));
        const error = stateChangeError(10107);

        server.handleError(error, 0);

        expect(error.hasErrorLabel(DriverErrorLabel.ResetPool)).to.be.true;
      });

      it('applies an error with a newer topology version', function () {
        makeServer(
          new ServerDescription(
            'a:27017',
            standaloneHello({ topologyVersion: makeTopologyVersion(processId, 1) })
          )
        );

        server.handleError(stateChangeError(10107, 2), 0);

        expect(received).to.have.lengthOf(1);
        expect(received[0].topologyVersion?.counter.toNumber()).to.equal(2);
      });

      it('ignores an error that is not newer than the description', function () {
        makeServer(
          new ServerDescription(
            'a:27017',
            standaloneHello({ topologyVersion: makeTopologyVersion(processId, 2) })
          )
        );

        server.handleError(stateChangeError(10107, 2), 0);
        server.handleError(stateChangeError(10107, 1), 0);

        expect(received).to.deep.equal([]);
      });
    });

    it('ignores other server errors', function () {
      makeServer();

      server.handleError(new DriverServerError({ ok: 0, code: 11000, errmsg: 'duplicate key' }), 0);
      server.handleError(new Error('not from the driver'), 0);

      expect(received).to.deep.equal([]);
    });
  });

  describe('checkIn()', function () {
    beforeEach(function () {
      makeServer();
      server.pool.ready();
    });

    it('returns a healthy connection to the pool', async function () {
      const connection = await server.checkOut();

      server.checkIn(connection, { kind: 'healthy' });

      expect(server.pool.availableConnectionCount).to.equal(1);
      expect(received).to.deep.equal([]);
    });

    it('applies the error rules to a failed operation', async function () {
      const connection = await server.checkOut();
      const error = new DriverNetworkError('connection reset');

      server.checkIn(connection, { kind: 'error', error });

      expect(received.map(description => description.error)).to.deep.equal([error]);
      expect(server.pool.currentCheckedOutCount).to.equal(0);
    });
  });
});
