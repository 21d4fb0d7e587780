import { expect } from 'chai';
import { once } from 'events';
import * as sinon from 'sinon';

import { DriverErrorLabel, DriverNetworkError } from '../../../src/error';
import type {
  ServerHeartbeatStartedEvent,
  ServerHeartbeatSucceededEvent
} from '../../../src/sdam/events';
import {
  Monitor,
  MonitorInterval,
  type MonitorOptions,
  RTTSampler
} from '../../../src/sdam/monitor';
import { HostAddress } from '../../../src/utils';
import {
  FakeTransportFactory,
  makeTopologyVersion,
  newProcessId,
  standaloneHello
} from '../../tools/fake_transport';

function settle(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('monitoring', function () {
  describe('Monitor', function () {
    let factory: FakeTransportFactory;
    let monitor: Monitor | undefined;

    function makeMonitor(options: Partial<MonitorOptions> = {}): Monitor {
      monitor = new Monitor({
        hostAddress: HostAddress.fromString('a:27017'),
        topologyId: 1,
        transportFactory: factory,
        connectTimeoutMS: 1000,
        heartbeatFrequencyMS: 10000,
        minHeartbeatFrequencyMS: 10,
        serverMonitoringMode: 'poll',
        ...options
      });
      return monitor;
    }

    beforeEach(function () {
      factory = new FakeTransportFactory();
      monitor = undefined;
    });

    afterEach(function () {
      monitor?.close();
      factory.cleanup();
    });

    it('connects and reports the handshake as the first heartbeat', async function () {
      const server = factory.addServer('a:27017');
      const started: ServerHeartbeatStartedEvent[] = [];
      const monitor = makeMonitor();
      monitor.on('serverHeartbeatStarted', event => started.push(event));

      const succeeded = once(monitor, 'serverHeartbeatSucceeded');
      monitor.connect();
      const [event] = await succeeded;
      await settle();

      expect(started).to.have.lengthOf(1);
      expect(started[0]).to.include({ topologyId: 1, connectionId: 'a:27017', awaited: false });
      expect(event).to.include({ connectionId: 'a:27017', awaited: false });
      expect(event.reply).to.deep.equal(standaloneHello());
      expect(server.commands).to.deep.equal([{ hello: 1, helloOk: true }]);
      expect(monitor.s.state).to.equal('idle');
    });

    it('ignores connect() when it is already running', async function () {
      const server = factory.addServer('a:27017');
      const monitor = makeMonitor();

      const succeeded = once(monitor, 'serverHeartbeatSucceeded');
      monitor.connect();
      monitor.connect();
      await succeeded;

      expect(server.connectionCount).to.equal(1);
    });

    it('runs another check soon after one is requested', async function () {
      const server = factory.addServer('a:27017');
      const monitor = makeMonitor();
      const first = once(monitor, 'serverHeartbeatSucceeded');
      monitor.connect();
      await first;
      await settle();

      const second = once(monitor, 'serverHeartbeatSucceeded');
      monitor.requestCheck();
      await second;

      expect(server.commands).to.deep.equal([{ hello: 1, helloOk: true }, { hello: 1 }]);
      expect(server.connectionCount).to.equal(1);
    });

    it('reports a failed check and asks for the server to be reset', async function () {
      const monitor = makeMonitor();
      const onFailed = sinon.spy();
      monitor.on('serverHeartbeatFailed', onFailed);

      const reset = once(monitor, 'resetServer');
      monitor.connect();
      const [error] = await reset;
      await settle();

      expect(error).to.be.instanceOf(DriverNetworkError);
      expect(error).to.have.property('message', 'connect ECONNREFUSED a:27017');
      expect(error.hasErrorLabel(DriverErrorLabel.ResetPool)).to.be.true;
      expect(error.hasErrorLabel(DriverErrorLabel.InterruptInUseConnections)).to.be.false;
      expect(onFailed).to.have.been.calledOnce;
      expect(onFailed.firstCall.args[0]).to.include({ failure: error, awaited: false });
      expect(monitor.s.state).to.equal('idle');
    });

    it('stops checking once closed', async function () {
      const server = factory.addServer('a:27017');
      const monitor = makeMonitor();
      const succeeded = once(monitor, 'serverHeartbeatSucceeded');
      monitor.connect();
      await succeeded;

      const onClose = sinon.spy();
      monitor.on('close', onClose);
      monitor.close();
      monitor.requestCheck();

      expect(onClose).to.have.been.calledOnce;
      expect(monitor.s.state).to.equal('closed');
      expect(monitor.connection).to.be.null;
      expect(server.openConnectionCount).to.equal(0);
    });

    context('when the server supports streaming', function () {
      it('issues awaitable hellos that answer when the server changes', async function () {
        const processId = newProcessId();
        const server = factory.addServer(
          'a:27017',
          standaloneHello({ topologyVersion: makeTopologyVersion(processId, 1) })
        );
        const monitor = makeMonitor({ serverMonitoringMode: 'stream' });
        const started: boolean[] = [];
        monitor.on('serverHeartbeatStarted', event => started.push(event.awaited));

        const first = once(monitor, 'serverHeartbeatSucceeded');
        monitor.connect();
        await first;
        await settle();

        expect(started).to.deep.equal([false, true]);
        expect(server.commands[1]).to.include({ hello: 1, maxAwaitTimeMS: 10000 });
        expect(server.commands[1].topologyVersion.counter.toNumber()).to.equal(1);

        const changed = once(monitor, 'serverHeartbeatSucceeded');
        server.setHello(standaloneHello({ topologyVersion: makeTopologyVersion(processId, 2) }));
        const [event]: ServerHeartbeatSucceededEvent[] = await changed;

        expect(event.awaited).to.be.true;
        expect(event.reply.topologyVersion.counter.toNumber()).to.equal(2);
        expect(monitor.topologyVersion?.counter.toNumber()).to.equal(2);
      });

      it('reports a failed streamed check before checking again', async function () {
        const server = factory.addServer(
          'a:27017',
          standaloneHello({ topologyVersion: makeTopologyVersion(newProcessId(), 1) })
        );
        const monitor = makeMonitor({ serverMonitoringMode: 'stream' });
        const first = once(monitor, 'serverHeartbeatSucceeded');
        monitor.connect();
        await first;
        await settle();

        const seen: string[] = [];
        const onReset = sinon.spy(() => seen.push('resetServer'));
        monitor.on('resetServer', onReset);
        monitor.on('serverHeartbeatFailed', event => seen.push(`failed:${event.awaited}`));
        monitor.on('serverHeartbeatStarted', event => seen.push(`started:${event.awaited}`));
        const recovered = once(monitor, 'serverHeartbeatSucceeded');
        server.dropConnections();
        const [event]: ServerHeartbeatSucceededEvent[] = await recovered;

        expect(seen.slice(0, 3)).to.deep.equal(['failed:true', 'resetServer', 'started:false']);
        expect(onReset).to.have.been.calledOnce;
        expect(event.awaited).to.be.false;
        expect(server.connectionCount).to.equal(2);
      });

      it('polls instead when the mode is poll', async function () {
        factory.addServer(
          'a:27017',
          standaloneHello({ topologyVersion: makeTopologyVersion(newProcessId(), 1) })
        );
        const monitor = makeMonitor({ serverMonitoringMode: 'poll' });
        const started: boolean[] = [];
        monitor.on('serverHeartbeatStarted', event => started.push(event.awaited));

        const first = once(monitor, 'serverHeartbeatSucceeded');
        monitor.connect();
        await first;
        await settle();

        expect(started).to.deep.equal([false]);
        expect(monitor.s.state).to.equal('idle');
      });
    });

    describe('roundTripTime', function () {
      it('averages the samples it was given', function () {
        const monitor = makeMonitor();
        expect(monitor.roundTripTime).to.equal(0);
        expect(monitor.latestRtt).to.be.null;

        monitor.addRttSample(10);
        monitor.addRttSample(20);

        expect(monitor.roundTripTime).to.equal(12);
        expect(monitor.latestRtt).to.equal(20);
      });
    });
  });

  describe('class MonitorInterval', function () {
    let clock: sinon.SinonFakeTimers;
    let executor: MonitorInterval | undefined;
    let fnSpy: sinon.SinonSpy<[], Promise<void>>;

    beforeEach(function () {
      clock = sinon.useFakeTimers();
      executor = undefined;
      fnSpy = sinon.spy(async (): Promise<void> => {});
    });

    afterEach(function () {
      executor?.stop();
      clock.restore();
    });

    function delayedSpy(ms: number) {
      return sinon.spy(() => new Promise<void>(resolve => setTimeout(resolve, ms)));
    }

    context('#constructor()', function () {
      context('when the immediate option is provided', function () {
        it('runs fn() immediately and again after heartbeatFrequencyMS', async function () {
          executor = new MonitorInterval(fnSpy, {
            immediate: true,
            minHeartbeatFrequencyMS: 10,
            heartbeatFrequencyMS: 30
          });
          expect(fnSpy).to.have.been.calledOnce;

          await clock.tickAsync(29);
          expect(fnSpy).to.have.been.calledOnce;

          await clock.tickAsync(1);
          expect(fnSpy).to.have.been.calledTwice;
        });
      });

      context('when the immediate option is not provided', function () {
        it('runs fn() on the interval', async function () {
          executor = new MonitorInterval(fnSpy, {
            minHeartbeatFrequencyMS: 10,
            heartbeatFrequencyMS: 30
          });

          await clock.tickAsync(29);
          expect(fnSpy.callCount).to.equal(0);

          await clock.tickAsync(1);
          expect(fnSpy).to.have.been.calledOnce;

          await clock.tickAsync(30);
          expect(fnSpy).to.have.been.calledTwice;
        });
      });
    });

    describe('#wake()', function () {
      context('when fn() has not run yet', function () {
        beforeEach(async function () {
          executor = new MonitorInterval(fnSpy, {
            minHeartbeatFrequencyMS: 10,
            heartbeatFrequencyMS: 30
          });
          await clock.tickAsync(5);
          executor.wake();
        });

        it('runs fn() immediately', function () {
          expect(fnSpy).to.have.been.calledOnce;
        });

        it('schedules fn() for heartbeatFrequencyMS away', async function () {
          await clock.tickAsync(29);
          expect(fnSpy).to.have.been.calledOnce;

          await clock.tickAsync(1);
          expect(fnSpy).to.have.been.calledTwice;
        });
      });

      context('when fn() is in progress', function () {
        it('does not start another call to fn()', async function () {
          const slowSpy = delayedSpy(5);
          executor = new MonitorInterval(slowSpy, {
            minHeartbeatFrequencyMS: 10,
            heartbeatFrequencyMS: 30
          });
          await clock.tickAsync(30);

          executor.wake();
          executor.wake();
          executor.wake();

          expect(slowSpy).to.have.been.calledOnce;
        });
      });

      context('when minHeartbeatFrequencyMS has passed since fn() ended', function () {
        beforeEach(async function () {
          executor = new MonitorInterval(fnSpy, {
            minHeartbeatFrequencyMS: 10,
            heartbeatFrequencyMS: 30
          });
          await clock.tickAsync(30);
          expect(fnSpy).to.have.been.calledOnce;
          fnSpy.resetHistory();

          await clock.tickAsync(20);
          executor.wake();
        });

        it('runs fn() immediately', function () {
          expect(fnSpy).to.have.been.calledOnce;
        });

        it('schedules fn() for heartbeatFrequencyMS away', async function () {
          await clock.tickAsync(29);
          expect(fnSpy).to.have.been.calledOnce;

          await clock.tickAsync(1);
          expect(fnSpy).to.have.been.calledTwice;
        });
      });

      context('when fn() ended less than minHeartbeatFrequencyMS ago', function () {
        beforeEach(async function () {
          executor = new MonitorInterval(fnSpy, {
            minHeartbeatFrequencyMS: 10,
            heartbeatFrequencyMS: 30
          });
          await clock.tickAsync(30);
          fnSpy.resetHistory();

          await clock.tickAsync(5);
          executor.wake();
        });

        it('runs fn() minHeartbeatFrequencyMS after it last ended', async function () {
          expect(fnSpy.callCount).to.equal(0);
          await clock.tickAsync(5);
          expect(fnSpy).to.have.been.calledOnce;
        });

        it('collapses repeated wake-ups into one call', async function () {
          executor?.wake();
          executor?.wake();

          expect(fnSpy.callCount).to.equal(0);
          await clock.tickAsync(5);
          expect(fnSpy).to.have.been.calledOnce;
        });
      });

      context('when the last run appears to end in the future', function () {
        it('runs fn() immediately', function () {
          executor = new MonitorInterval(fnSpy, {
            minHeartbeatFrequencyMS: 10,
            heartbeatFrequencyMS: 30
          });
          executor.lastExecutionEnded = Infinity;

          executor.wake();

          expect(fnSpy).to.have.been.calledOnce;
        });
      });
    });

    describe('#stop()', function () {
      it('does not reschedule fn() when stopped while it runs', async function () {
        const slowSpy = delayedSpy(5);
        executor = new MonitorInterval(slowSpy, {
          minHeartbeatFrequencyMS: 10,
          heartbeatFrequencyMS: 30
        });
        await clock.tickAsync(30);

        executor.stop();
        await clock.tickAsync(5);
        await clock.tickAsync(30);

        expect(slowSpy).to.have.been.calledOnce;
      });

      it('clears a scheduled run', async function () {
        executor = new MonitorInterval(fnSpy, {
          minHeartbeatFrequencyMS: 10,
          heartbeatFrequencyMS: 30
        });

        executor.stop();
        await clock.tickAsync(30);

        expect(fnSpy.callCount).to.equal(0);
      });
    });

    context('when fn() rejects', function () {
      it('reports the error and keeps running', async function () {
        const onError = sinon.spy();
        const failure = new Error('heartbeat failed');
        const failingSpy = sinon.spy(() => Promise.reject(failure));
        executor = new MonitorInterval(failingSpy, {
          minHeartbeatFrequencyMS: 10,
          heartbeatFrequencyMS: 30,
          onError
        });

        await clock.tickAsync(30);
        expect(onError).to.have.been.calledOnceWithExactly(failure);

        await clock.tickAsync(30);
        expect(failingSpy).to.have.been.calledTwice;
      });
    });
  });

  describe('class RTTSampler', function () {
    it('reports 0 and no last sample before any sample', function () {
      const sampler = new RTTSampler();
      expect(sampler.average()).to.equal(0);
      expect(sampler.last).to.be.null;
    });

    it('takes the first sample as the average', function () {
      const sampler = new RTTSampler();
      sampler.addSample(10);
      expect(sampler.average()).to.equal(10);
      expect(sampler.last).to.equal(10);
    });

    it('weights new samples by 0.2', function () {
      const sampler = new RTTSampler();
      sampler.addSample(10);
      sampler.addSample(20);
      expect(sampler.average()).to.equal(12);
      expect(sampler.last).to.equal(20);
    });

    it('forgets every sample on clear()', function () {
      const sampler = new RTTSampler();
      sampler.addSample(10);
      sampler.clear();
      expect(sampler.average()).to.equal(0);
      expect(sampler.last).to.be.null;
    });
  });
});
