import { AdmissionService } from '../../src/modules/factory/admission.service';
import { GameServerInstance } from '../../src/modules/factory/game-server-instance';
import { ServerRegistryService } from '../../src/modules/factory/server-registry.service';
import { FactoryConfig } from '../../src/infra/config/env.config';
import { FakeClock, testFactoryConfig } from '../helpers';

function running(serverId: string, cpuPercent?: number): GameServerInstance {
  const at = new Date(0);
  return {
    serverId,
    name: serverId,
    description: '',
    status: 'running',
    containerRef: `c-${serverId}`,
    imageRef: `i-${serverId}`,
    port: null,
    createdAt: at,
    updatedAt: at,
    resourceUsage:
      cpuPercent === undefined
        ? null
        : { cpuPercent, memoryMb: 100, memoryLimitMb: 512, networkRxMb: 0, networkTxMb: 0, observedAt: at },
    logs: [],
  };
}

describe('AdmissionService', () => {
  function setup(overrides: Partial<FactoryConfig>) {
    const config = testFactoryConfig(overrides);
    const registry = new ServerRegistryService(config, new FakeClock());
    return { registry, admission: new AdmissionService(config, registry) };
  }

  it('allows when under every limit', async () => {
    const { admission } = setup({});
    await expect(admission.canAdmit()).resolves.toEqual({ allowed: true, reason: 'ok' });
  });

  it('denies at the container count limit', async () => {
    const { registry, admission } = setup({ maxContainers: 2 });
    registry.upsert(running('a'));
    registry.addPending('b');

    await expect(admission.canAdmit()).resolves.toEqual({
      allowed: false,
      reason: 'Maximum container count reached (2)',
    });
  });

  it('ignores stopped instances', async () => {
    const { registry, admission } = setup({ maxContainers: 1 });
    registry.upsert({ ...running('a'), status: 'stopped' });

    await expect(admission.canAdmit()).resolves.toEqual({ allowed: true, reason: 'ok' });
  });

  it('denies when CPU reservations would exceed the ceiling', async () => {
    const { registry, admission } = setup({ maxTotalCpu: 2, containerCpuLimit: 1 });
    registry.upsert(running('a'));
    registry.upsert(running('b'));

    await expect(admission.canAdmit()).resolves.toEqual({
      allowed: false,
      reason: 'CPU reservation limit reached (3 of 2 CPUs)',
    });
  });

  it('denies when memory reservations would exceed the ceiling', async () => {
    const { registry, admission } = setup({ maxTotalMemoryMb: 1000, containerMemoryLimitMb: 512 });
    registry.upsert(running('a'));

    await expect(admission.canAdmit()).resolves.toEqual({
      allowed: false,
      reason: 'Memory reservation limit reached (1024 of 1000 MB)',
    });
  });

  it('denies when observed CPU reaches maxCpuPercent times host cores', async () => {
    const { registry, admission } = setup({ maxCpuPercent: 50, hostCpuCount: 2 });
    registry.upsert(running('a', 60));
    registry.upsert(running('b', 40));

    await expect(admission.canAdmit()).resolves.toEqual({
      allowed: false,
      reason: 'Observed CPU usage too high (100% of 100%)',
    });
  });

  it('summarizes reservations and observations', () => {
    const { registry, admission } = setup({ hostCpuCount: 4, maxCpuPercent: 80 });
    registry.upsert(running('a', 12.5));
    registry.upsert(running('b'));

    expect(admission.summary()).toEqual({
      activeContainers: 2,
      maxContainers: 50,
      reservedCpu: 2,
      maxTotalCpu: 32,
      reservedMemoryMb: 1024,
      maxTotalMemoryMb: 16384,
      observedCpuPercent: 12.5,
      observedCpuCeiling: 320,
      observedMemoryMb: 100,
      hostCpuCount: 4,
    });
  });
});
