import { expect } from 'chai';
import * as sinon from 'sinon';

import { DriverInvalidArgumentError } from '../../src/error';
import { raceWithTimeout, Timeout, TimeoutError } from '../../src/timeout';

describe('Timeout', function () {
  let clock: sinon.SinonFakeTimers;
  let timeout: Timeout | undefined;

  beforeEach(function () {
    clock = sinon.useFakeTimers();
  });

  afterEach(function () {
    timeout?.clear();
    timeout = undefined;
    clock.restore();
  });

  describe('expires()', function () {
    context('when called with a duration of 0', function () {
      it('never expires', async function () {
        timeout = Timeout.expires(0);
        const settled = sinon.spy();
        timeout.then(settled, settled);

        await clock.tickAsync(60_000);

        expect(settled).to.not.have.been.called;
        expect(timeout.remainingTime).to.equal(Infinity);
      });
    });

    context('when called with a duration greater than 0', function () {
      it('rejects with a TimeoutError once the duration elapses', async function () {
        timeout = Timeout.expires(2000);
        const rejection = timeout.then(
          () => null,
          (error: unknown) => error
        );

        await clock.tickAsync(2000);

        const error = await rejection;
        expect(error).to.be.instanceOf(TimeoutError);
        expect(error).to.have.property('message', 'Expired after 2000ms');
        expect(error).to.have.property('duration', 2000);
        expect(timeout.expired).to.be.true;
      });

      it('reports the time left', async function () {
        timeout = Timeout.expires(2000);
        await clock.tickAsync(500);
        expect(timeout.remainingTime).to.equal(1500);
        expect(timeout.timeElapsed).to.equal(500);
      });
    });

    context('when called with a duration less than 0', function () {
      it('throws a DriverInvalidArgumentError', function () {
        expect(() => Timeout.expires(-1)).to.throw(
          DriverInvalidArgumentError,
          'Cannot create a Timeout with a negative duration'
        );
      });
    });
  });

  describe('clear()', function () {
    it('prevents the timeout from expiring', async function () {
      timeout = Timeout.expires(1000);
      const settled = sinon.spy();
      timeout.then(settled, settled);

      timeout.clear();
      await clock.tickAsync(2000);

      expect(settled).to.not.have.been.called;
      expect(timeout.cleared).to.be.true;
      expect(timeout.expired).to.be.false;
    });
  });

  describe('is()', function () {
    it('returns true for a Timeout', function () {
      timeout = Timeout.expires(0);
      expect(Timeout.is(timeout)).to.be.true;
    });

    it('returns false for a plain promise', function () {
      expect(Timeout.is(Promise.resolve())).to.be.false;
    });
  });

  describe('TimeoutError.is()', function () {
    it('matches on the error name', function () {
      expect(TimeoutError.is(new TimeoutError('Timed out', { duration: 5 }))).to.be.true;
      expect(TimeoutError.is(new Error('Timed out'))).to.be.false;
      expect(TimeoutError.is(null)).to.be.false;
    });
  });

  describe('raceWithTimeout()', function () {
    it('resolves with the value when the work finishes first', async function () {
      const result = raceWithTimeout(Promise.resolve('done'), 100, () => new Error('late'));
      expect(await result).to.equal('done');
    });

    it('rejects with the mapped error when the timeout wins', async function () {
      const result = raceWithTimeout(
        new Promise<string>(() => null),
        100,
        error => new Error(`gave up after ${error.duration}ms`)
      ).then(
        () => null,
        (error: unknown) => error
      );

      await clock.tickAsync(100);

      const error = await result;
      expect(error).to.be.instanceOf(Error);
      expect(error).to.have.property('message', 'gave up after 100ms');
    });

    it('passes the rejection of the work through unchanged', async function () {
      const failure = new Error('connection reset');
      const error = await raceWithTimeout(Promise.reject(failure), 100, () => new Error('late'))
        .then(
          () => null,
          (error: unknown) => error
        );
      expect(error).to.equal(failure);
    });

    it('waits forever when the timeout is 0', async function () {
      const settled = sinon.spy();
      raceWithTimeout(new Promise<string>(() => null), 0, () => new Error('late')).then(
        settled,
        settled
      );

      await clock.tickAsync(60_000);

      expect(settled).to.not.have.been.called;
    });
  });
});
