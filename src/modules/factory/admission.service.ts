import { Inject, Injectable } from '@nestjs/common';
import { FACTORY_CONFIG, FactoryConfig } from '../../infra/config/env.config';
import { ServerRegistryService } from './server-registry.service';

export interface AdmissionDecision {
  allowed: boolean;
  reason: string;
}

export interface ResourceSummary {
  activeContainers: number;
  maxContainers: number;
  reservedCpu: number;
  maxTotalCpu: number;
  reservedMemoryMb: number;
  maxTotalMemoryMb: number;
  /** Sum of the last observed CPU percent of running instances. */
  observedCpuPercent: number;
  /** maxCpuPercent × host CPU count. */
  observedCpuCeiling: number;
  observedMemoryMb: number;
  hostCpuCount: number;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/** Decides whether one more game server fits. Read-only. */
@Injectable()
export class AdmissionService {
  constructor(
    @Inject(FACTORY_CONFIG) private readonly config: FactoryConfig,
    private readonly registry: ServerRegistryService,
  ) {}

  async canAdmit(): Promise<AdmissionDecision> {
    const s = this.summary();
    const cfg = this.config;

    if (s.activeContainers >= cfg.maxContainers) {
      return { allowed: false, reason: `Maximum container count reached (${cfg.maxContainers})` };
    }
    const cpuAfter = round2(s.reservedCpu + cfg.containerCpuLimit);
    if (cpuAfter > cfg.maxTotalCpu) {
      return {
        allowed: false,
        reason: `CPU reservation limit reached (${cpuAfter} of ${cfg.maxTotalCpu} CPUs)`,
      };
    }
    const memoryAfter = s.reservedMemoryMb + cfg.containerMemoryLimitMb;
    if (memoryAfter > cfg.maxTotalMemoryMb) {
      return {
        allowed: false,
        reason: `Memory reservation limit reached (${memoryAfter} of ${cfg.maxTotalMemoryMb} MB)`,
      };
    }
    if (s.observedCpuPercent >= s.observedCpuCeiling) {
      return {
        allowed: false,
        reason: `Observed CPU usage too high (${s.observedCpuPercent}% of ${s.observedCpuCeiling}%)`,
      };
    }
    return { allowed: true, reason: 'ok' };
  }

  summary(): ResourceSummary {
    const cfg = this.config;
    const activeContainers = this.registry.countActive();
    let observedCpu = 0;
    let observedMemory = 0;
    for (const instance of this.registry.activeInstances()) {
      observedCpu += instance.resourceUsage?.cpuPercent ?? 0;
      observedMemory += instance.resourceUsage?.memoryMb ?? 0;
    }
    return {
      activeContainers,
      maxContainers: cfg.maxContainers,
      reservedCpu: round2(activeContainers * cfg.containerCpuLimit),
      maxTotalCpu: cfg.maxTotalCpu,
      reservedMemoryMb: activeContainers * cfg.containerMemoryLimitMb,
      maxTotalMemoryMb: cfg.maxTotalMemoryMb,
      observedCpuPercent: round2(observedCpu),
      observedCpuCeiling: round2(cfg.maxCpuPercent * cfg.hostCpuCount),
      observedMemoryMb: round2(observedMemory),
      hostCpuCount: cfg.hostCpuCount,
    };
  }
}
