import { expect } from 'chai';

import { DriverConfigurationError, DriverInvalidArgumentError } from '../../src/error';
import { DEFAULT_OPTIONS, resolveOptions, type TopologyUserOptions } from '../../src/options';
import { ReadPreference } from '../../src/read_preference';
import { HostAddress } from '../../src/utils';
import { FakeTransportFactory } from '../tools/fake_transport';

describe('resolveOptions()', function () {
  const transportFactory = new FakeTransportFactory();

  function options(extra: Partial<TopologyUserOptions> = {}): TopologyUserOptions {
    return { transportFactory, ...extra };
  }

  context('defaults', function () {
    it('fills in every option that was not given', function () {
      const resolved = resolveOptions('localhost', options());

      expect(resolved).to.include({
        directConnection: false,
        loadBalanced: false,
        heartbeatFrequencyMS: 10000,
        minHeartbeatFrequencyMS: 500,
        connectTimeoutMS: 30000,
        socketTimeoutMS: 0,
        serverSelectionTimeoutMS: 30000,
        localThresholdMS: 15,
        serverMonitoringMode: 'auto',
        maxPoolSize: 100,
        minPoolSize: 0,
        maxConnecting: 2,
        maxIdleTimeMS: 0,
        waitQueueTimeoutMS: 0
      });
      expect(resolved.transportFactory).to.equal(transportFactory);
      expect(resolved.readPreference).to.equal(ReadPreference.primary);
      expect(resolved.hosts.map(String)).to.deep.equal(['localhost:27017']);
    });

    it('lets given options win over the defaults', function () {
      const resolved = resolveOptions(
        'localhost',
        options({ heartbeatFrequencyMS: 2000, maxPoolSize: 5, serverMonitoringMode: 'poll' })
      );
      expect(resolved).to.include({
        heartbeatFrequencyMS: 2000,
        maxPoolSize: 5,
        serverMonitoringMode: 'poll',
        minPoolSize: DEFAULT_OPTIONS.minPoolSize
      });
    });

    it('does not let an explicit undefined shadow a default', function () {
      const resolved = resolveOptions('localhost', options({ connectTimeoutMS: undefined }));
      expect(resolved.connectTimeoutMS).to.equal(30000);
    });

    it('returns a frozen object', function () {
      expect(Object.isFrozen(resolveOptions('localhost', options()))).to.be.true;
    });
  });

  context('seeds', function () {
    it('accepts a list of strings and addresses and drops duplicates', function () {
      const resolved = resolveOptions(
        ['A.example.test:27017', new HostAddress('a.example.test'), 'b.example.test:27018'],
        options()
      );
      expect(resolved.hosts.map(String)).to.deep.equal([
        'a.example.test:27017',
        'b.example.test:27018'
      ]);
    });

    it('requires at least one seed', function () {
      expect(() => resolveOptions([], options())).to.throw(
        DriverConfigurationError,
        'At least one seed host is required'
      );
    });
  });

  context('validation of single options', function () {
    it('rejects a negative timeout', function () {
      expect(() => resolveOptions('localhost', options({ connectTimeoutMS: -1 }))).to.throw(
        DriverInvalidArgumentError,
        'Option "connectTimeoutMS" must be a non-negative integer, got -1'
      );
    });

    it('rejects maxConnecting of 0', function () {
      expect(() => resolveOptions('localhost', options({ maxConnecting: 0 }))).to.throw(
        DriverInvalidArgumentError,
        'Option "maxConnecting" must be at least 1, got 0'
      );
    });

    it('rejects an unknown monitoring mode', function () {
      const userOptions = Object.assign(options(), { serverMonitoringMode: 'push' });
      expect(() => resolveOptions('localhost', userOptions)).to.throw(
        DriverInvalidArgumentError,
        'Option "serverMonitoringMode" must be one of "auto", "poll", "stream", got "push"'
      );
    });

    it('rejects an empty replica set name', function () {
      expect(() => resolveOptions('localhost', options({ replicaSet: '' }))).to.throw(
        DriverInvalidArgumentError,
        'Option "replicaSet" must be a non-empty string'
      );
    });

    it('rejects a transport factory without connect', function () {
      const userOptions = Object.assign(options(), { transportFactory: {} });
      expect(() => resolveOptions('localhost', userOptions)).to.throw(
        DriverInvalidArgumentError,
        'Option "transportFactory" must provide a connect method'
      );
    });
  });

  context('rules across options', function () {
    it('rejects directConnection with several seeds', function () {
      expect(() => resolveOptions(['a:1', 'b:2'], options({ directConnection: true }))).to.throw(
        DriverConfigurationError,
        'directConnection option requires exactly one host'
      );
    });

    it('rejects loadBalanced with several seeds', function () {
      expect(() => resolveOptions(['a:1', 'b:2'], options({ loadBalanced: true }))).to.throw(
        DriverConfigurationError,
        'loadBalanced option only supported with a single host'
      );
    });

    it('rejects loadBalanced with a replica set name', function () {
      expect(() =>
        resolveOptions('a:1', options({ loadBalanced: true, replicaSet: 'rs0' }))
      ).to.throw(
        DriverConfigurationError,
        'loadBalanced option not supported with a replicaSet option'
      );
    });

    it('rejects loadBalanced with an explicit directConnection', function () {
      expect(() =>
        resolveOptions('a:1', options({ loadBalanced: true, directConnection: false }))
      ).to.throw(
        DriverConfigurationError,
        'loadBalanced option not supported when directConnection is provided'
      );
    });

    it('rejects minPoolSize above maxPoolSize', function () {
      expect(() => resolveOptions('a:1', options({ minPoolSize: 10, maxPoolSize: 5 }))).to.throw(
        DriverConfigurationError,
        'minPoolSize (10) must not be greater than maxPoolSize (5)'
      );
    });

    it('allows any minPoolSize when maxPoolSize is unlimited', function () {
      const resolved = resolveOptions('a:1', options({ minPoolSize: 10, maxPoolSize: 0 }));
      expect(resolved.minPoolSize).to.equal(10);
    });

    it('rejects a heartbeat shorter than the minimum heartbeat', function () {
      expect(() => resolveOptions('a:1', options({ heartbeatFrequencyMS: 100 }))).to.throw(
        DriverConfigurationError,
        'heartbeatFrequencyMS (100) must be at least minHeartbeatFrequencyMS (500)'
      );
    });
  });

  context('read preference', function () {
    it('builds the read preference from its mode and tags', function () {
      const resolved = resolveOptions(
        'a:1',
        options({ readPreference: 'secondary', readPreferenceTags: [{ dc: 'east' }] })
      );
      expect(resolved.readPreference.toJSON()).to.deep.equal({
        mode: 'secondary',
        tags: [{ dc: 'east' }]
      });
    });
  });
});
