import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { MATCHMAKER_CONFIG, MatchmakerConfig } from '../../infra/config/env.config';
import { describeError } from '../../infra/errors/factory-errors';
import { LivenessRegistryService } from './liveness-registry.service';

export const EVICTION_SWEEP_INTERVAL = 'matchmaker-eviction-sweep';

/** Runs LivenessRegistryService.sweep every sweepIntervalMs. A failing tick is logged, never thrown. */
@Injectable()
export class EvictionSweeperService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(EvictionSweeperService.name);

  constructor(
    @Inject(MATCHMAKER_CONFIG) private readonly config: MatchmakerConfig,
    private readonly registry: LivenessRegistryService,
    private readonly scheduler: SchedulerRegistry,
  ) {}

  onModuleInit(): void {
    const handle = setInterval(() => this.tick(), this.config.sweepIntervalMs);
    this.scheduler.addInterval(EVICTION_SWEEP_INTERVAL, handle);
    this.logger.log(
      `Eviction sweep every ${this.config.sweepIntervalMs}ms (heartbeat timeout ${this.config.heartbeatTimeoutMs}ms)`,
    );
  }

  onModuleDestroy(): void {
    if (this.scheduler.doesExist('interval', EVICTION_SWEEP_INTERVAL)) {
      this.scheduler.deleteInterval(EVICTION_SWEEP_INTERVAL);
    }
  }

  /** Returns the number of entries evicted; 0 when the sweep failed. */
  tick(): number {
    try {
      const removed = this.registry.sweep();
      if (removed > 0) this.logger.log(`Evicted ${removed} stale server(s)`);
      return removed;
    } catch (err) {
      this.logger.error(`Eviction sweep failed: ${describeError(err)}`);
      return 0;
    }
  }
}
