import { SchedulerRegistry } from '@nestjs/schedule';
import { AdmissionService } from '../../src/modules/factory/admission.service';
import {
  CONTAINER_MONITOR_INTERVAL,
  ContainerMonitorService,
} from '../../src/modules/factory/container-monitor.service';
import { PortAllocatorService } from '../../src/modules/factory/port-allocator.service';
import { ProvisioningService } from '../../src/modules/factory/provisioning.service';
import { ServerRegistryService } from '../../src/modules/factory/server-registry.service';
import { InMemoryContainerRuntime } from '../../src/modules/runtime/inmemory-container-runtime';
import { FakeClock, FakeHostPortProbe, SIMPLE_GAME, testFactoryConfig, testRuntimeConfig } from '../helpers';

describe('ContainerMonitorService', () => {
  function setup(monitorIntervalMs: number) {
    const config = testFactoryConfig({ monitorIntervalMs });
    const clock = new FakeClock();
    const runtime = new InMemoryContainerRuntime();
    const registry = new ServerRegistryService(config, clock);
    const allocator = new PortAllocatorService(config, new FakeHostPortProbe(), registry);
    const provisioning = new ProvisioningService(
      config,
      testRuntimeConfig(),
      runtime,
      clock,
      registry,
      allocator,
      new AdmissionService(config, registry),
    );
    const scheduler = new SchedulerRegistry();
    const monitor = new ContainerMonitorService(config, provisioning, scheduler);
    return { runtime, provisioning, scheduler, monitor };
  }

  it('does not schedule anything when disabled', () => {
    const { monitor, scheduler } = setup(0);
    monitor.onModuleInit();
    expect(scheduler.getIntervals()).toEqual([]);
  });

  it('registers and removes its interval', () => {
    const { monitor, scheduler } = setup(60_000);
    monitor.onModuleInit();
    expect(scheduler.getIntervals()).toEqual([CONTAINER_MONITOR_INTERVAL]);

    monitor.onModuleDestroy();
    expect(scheduler.getIntervals()).toEqual([]);
  });

  it('marks exited containers as error and refreshes usage of the rest', async () => {
    const { monitor, provisioning, runtime } = setup(0);
    const healthy = await provisioning.provision({ userCode: SIMPLE_GAME, name: 'healthy' });
    const crashed = await provisioning.provision({ userCode: SIMPLE_GAME, name: 'crashed' });
    runtime.markExited(crashed.containerRef ?? '');
    runtime.setStats(healthy.containerRef ?? '', {
      cpuPercent: 5,
      memoryMb: 32,
      memoryLimitMb: 512,
      networkRxMb: 0,
      networkTxMb: 0,
    });

    await expect(monitor.runPass()).resolves.toBe(2);

    expect(provisioning.getInstance(crashed.serverId).status).toBe('error');
    expect(provisioning.getInstance(healthy.serverId).resourceUsage).toMatchObject({ cpuPercent: 5, memoryMb: 32 });
  });

  it('keeps going when one instance fails', async () => {
    const { monitor, provisioning, runtime } = setup(0);
    await provisioning.provision({ userCode: SIMPLE_GAME, name: 'a' });
    const b = await provisioning.provision({ userCode: SIMPLE_GAME, name: 'b' });
    const refreshStatus = jest.spyOn(provisioning, 'refreshStatus');
    refreshStatus.mockRejectedValueOnce(new Error('inspect exploded'));
    runtime.markExited(b.containerRef ?? '');

    await expect(monitor.runPass()).resolves.toBe(2);
    expect(refreshStatus).toHaveBeenCalledTimes(2);
    expect(provisioning.getInstance(b.serverId).status).toBe('error');
  });
});
