import { expect } from 'chai';
import * as sinon from 'sinon';

import { Connection } from '../../../src/cmap/connection';
import {
  DriverNetworkError,
  DriverNetworkTimeoutError,
  DriverServerError
} from '../../../src/error';
import { HostAddress } from '../../../src/utils';
import { type FakeServer, FakeTransportFactory } from '../../tools/fake_transport';

describe('class Connection', function () {
  const hostAddress = HostAddress.fromString('a:27017');
  let factory: FakeTransportFactory;
  let server: FakeServer;
  let connection: Connection;

  beforeEach(async function () {
    factory = new FakeTransportFactory();
    server = factory.addServer('a:27017');
    const transport = await factory.connect(hostAddress, { connectTimeoutMS: 0 });
    connection = new Connection(transport, { id: 1, generation: 0, hostAddress });
  });

  afterEach(function () {
    factory.cleanup();
  });

  it('takes its address from the host address', function () {
    expect(connection.address).to.equal('a:27017');
    expect(connection.closed).to.be.false;
  });

  describe('command()', function () {
    it('resolves with the reply', async function () {
      const reply = await connection.command({ ping: 1 });
      expect(reply).to.deep.equal({ ok: 1 });
      expect(server.commands).to.deep.equal([{ ping: 1 }]);
    });

    it('rejects a failed reply with a server error and stays open', async function () {
      server.handler = () => ({ ok: 0, code: 13, codeName: 'Unauthorized', errmsg: 'denied' });

      const error = await connection.command({ find: 'items' }).catch(error => error);

      expect(error).to.be.instanceOf(DriverServerError);
      expect(error).to.include({ message: 'denied', code: 13, codeName: 'Unauthorized' });
      expect(connection.closed).to.be.false;
    });

    it('closes the connection when the transport fails', async function () {
      const onClose = sinon.spy();
      connection.on('close', onClose);
      server.handler = () => new Error('socket hang up');

      const error = await connection.command({ ping: 1 }).catch(error => error);

      expect(error).to.be.instanceOf(DriverNetworkError);
      expect(error).to.have.property('message', 'socket hang up');
      expect(error).to.have.property('beforeHandshake', true);
      expect(connection.closed).to.be.true;
      expect(server.openConnectionCount).to.equal(0);
      expect(onClose).to.have.been.calledOnce;
    });

    it('rejects with a timeout error when no reply arrives in time', async function () {
      server.hang = true;

      const error = await connection.command({ ping: 1 }, { timeoutMS: 20 }).catch(error => error);

      expect(error).to.be.instanceOf(DriverNetworkTimeoutError);
      expect(error).to.have.property('message', 'connection 1 to a:27017 timed out');
      expect(connection.closed).to.be.true;
    });

    it('rejects again with the error that closed the connection', async function () {
      server.handler = () => new Error('socket hang up');
      const first = await connection.command({ ping: 1 }).catch(error => error);

      const second = await connection.command({ ping: 1 }).catch(error => error);

      expect(second).to.equal(first);
      expect(server.commands).to.have.lengthOf(1);
    });
  });

  describe('destroy()', function () {
    it('rejects commands in flight', async function () {
      server.hang = true;
      const pending = connection.command({ ping: 1 });

      connection.destroy();
      const error = await pending.catch(error => error);

      expect(error).to.be.instanceOf(DriverNetworkError);
      expect(error).to.have.property('message', 'connection 1 to a:27017 closed');
    });

    it('rejects commands in flight with the given error', async function () {
      server.hang = true;
      const pending = connection.command({ ping: 1 });
      const cause = new DriverNetworkError('pool cleared');

      connection.destroy(cause);

      expect(await pending.catch(error => error)).to.equal(cause);
    });

    it('emits close only once', function () {
      const onClose = sinon.spy();
      connection.on('close', onClose);

      connection.destroy();
      connection.destroy();

      expect(onClose).to.have.been.calledOnce;
    });
  });
});
