import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { FACTORY_CONFIG, FactoryConfig } from '../../infra/config/env.config';
import { describeError } from '../../infra/errors/factory-errors';
import { ProvisioningService } from './provisioning.service';

export const CONTAINER_MONITOR_INTERVAL = 'container-monitor';

/**
 * Periodically refreshes status and resource usage of running instances.
 * Disabled when monitorIntervalMs is 0. A pass still in progress skips the next tick.
 */
@Injectable()
export class ContainerMonitorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ContainerMonitorService.name);
  private passInProgress = false;

  constructor(
    @Inject(FACTORY_CONFIG) private readonly config: FactoryConfig,
    private readonly provisioning: ProvisioningService,
    private readonly scheduler: SchedulerRegistry,
  ) {}

  onModuleInit(): void {
    const ms = this.config.monitorIntervalMs;
    if (ms <= 0) {
      this.logger.log('Container monitor disabled');
      return;
    }
    const handle = setInterval(() => {
      this.runPass().catch((err: unknown) => {
        this.logger.error(`Monitor pass failed: ${describeError(err)}`);
      });
    }, ms);
    this.scheduler.addInterval(CONTAINER_MONITOR_INTERVAL, handle);
    this.logger.log(`Container monitor every ${ms}ms`);
  }

  onModuleDestroy(): void {
    if (this.scheduler.doesExist('interval', CONTAINER_MONITOR_INTERVAL)) {
      this.scheduler.deleteInterval(CONTAINER_MONITOR_INTERVAL);
    }
  }

  /** Returns the number of instances checked; 0 when a pass is already running. */
  async runPass(): Promise<number> {
    if (this.passInProgress) return 0;
    this.passInProgress = true;
    try {
      const running = this.provisioning.listInstances().filter((i) => i.status === 'running');
      for (const { serverId } of running) {
        try {
          const refreshed = await this.provisioning.refreshStatus(serverId);
          if (refreshed.status === 'running') {
            await this.provisioning.refreshStats(serverId);
          }
        } catch (err) {
          this.logger.warn(`Monitor check failed for ${serverId}: ${describeError(err)}`);
        }
      }
      return running.length;
    } finally {
      this.passInProgress = false;
    }
  }
}
