import { NotFoundError } from '../../src/infra/errors/factory-errors';
import { GameServerInstance } from '../../src/modules/factory/game-server-instance';
import { ServerRegistryService } from '../../src/modules/factory/server-registry.service';
import { FakeClock, testFactoryConfig } from '../helpers';

function instance(serverId: string, overrides: Partial<GameServerInstance> = {}): GameServerInstance {
  const at = new Date('2026-01-01T00:00:00.000Z');
  return {
    serverId,
    name: serverId,
    description: '',
    status: 'running',
    containerRef: `c-${serverId}`,
    imageRef: `i-${serverId}`,
    port: 9100,
    createdAt: at,
    updatedAt: at,
    resourceUsage: null,
    logs: [],
    ...overrides,
  };
}

describe('ServerRegistryService', () => {
  let clock: FakeClock;
  let registry: ServerRegistryService;

  beforeEach(() => {
    clock = new FakeClock();
    registry = new ServerRegistryService(testFactoryConfig({ logRetentionLines: 3 }), clock);
  });

  describe('get', () => {
    it('throws NotFoundError for an unknown id', () => {
      expect(() => registry.get('missing')).toThrow(NotFoundError);
    });

    it('returns a copy that later mutations do not affect', () => {
      registry.upsert(instance('s1', { logs: ['a'] }));
      const snapshot = registry.get('s1');
      registry.appendLog('s1', 'b');
      snapshot.logs.push('local');

      expect(snapshot.logs).toEqual(['a', 'local']);
      expect(registry.get('s1').logs).toEqual(['a', 'b']);
    });
  });

  describe('list', () => {
    it('orders by createdAt, then serverId', () => {
      registry.upsert(instance('b', { createdAt: new Date(2000) }));
      registry.upsert(instance('c', { createdAt: new Date(1000) }));
      registry.upsert(instance('a', { createdAt: new Date(2000) }));

      expect(registry.list().map((i) => i.serverId)).toEqual(['c', 'a', 'b']);
    });
  });

  describe('update', () => {
    it('applies the mutation and bumps updatedAt', () => {
      registry.upsert(instance('s1'));
      clock.advance(5000);

      const updated = registry.update('s1', (i) => {
        i.status = 'stopped';
      });

      expect(updated.status).toBe('stopped');
      expect(updated.updatedAt.getTime()).toBe(clock.now());
    });

    it('throws NotFoundError for an unknown id', () => {
      expect(() => registry.update('missing', () => undefined)).toThrow(NotFoundError);
    });
  });

  it('trims logs to the retention bound, keeping the newest lines', () => {
    registry.upsert(instance('s1', { logs: ['1', '2'] }));
    registry.appendLog('s1', '3', '4', '5');

    expect(registry.get('s1').logs).toEqual(['3', '4', '5']);
  });

  it('leases ports only for provisioning and running instances', () => {
    registry.upsert(instance('run', { port: 9100 }));
    registry.upsert(instance('stop', { port: 9101, status: 'stopped' }));
    registry.upsert(instance('err', { port: 9102, status: 'error' }));

    expect([...registry.leasedPorts()]).toEqual([9100]);
  });

  it('counts pending attempts as active without exposing them', () => {
    registry.upsert(instance('run'));
    registry.upsert(instance('stop', { status: 'stopped' }));
    registry.addPending('gs-pending');

    expect(registry.countActive()).toBe(2);
    expect(registry.has('gs-pending')).toBe(true);
    expect(() => registry.get('gs-pending')).toThrow(NotFoundError);

    registry.clearPending('gs-pending');
    expect(registry.countActive()).toBe(1);
  });

  it('delete ends the port lease', () => {
    registry.upsert(instance('s1', { port: 9105 }));
    expect(registry.delete('s1')).toBe(true);
    expect(registry.leasedPorts().size).toBe(0);
    expect(registry.delete('s1')).toBe(false);
  });
});
