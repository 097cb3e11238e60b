import { ContainerStats } from '../runtime/container-runtime.port';

/**
 * provisioning → running → (stopped | error) → removed.
 * stopped and error only move to removed; there is no restart.
 */
export type InstanceStatus = 'provisioning' | 'running' | 'stopped' | 'error' | 'removed';

export interface ResourceUsage extends ContainerStats {
  observedAt: Date;
}

export interface GameServerInstance {
  serverId: string;
  name: string;
  description: string;
  status: InstanceStatus;
  containerRef: string | null;
  imageRef: string | null;
  port: number | null;
  createdAt: Date;
  updatedAt: Date;
  resourceUsage: ResourceUsage | null;
  logs: string[];
}

/** Statuses that hold a port and count against admission limits. */
export function isActiveStatus(status: InstanceStatus): boolean {
  return status === 'provisioning' || status === 'running';
}

export function cloneInstance(instance: GameServerInstance): GameServerInstance {
  return {
    ...instance,
    createdAt: new Date(instance.createdAt),
    updatedAt: new Date(instance.updatedAt),
    resourceUsage: instance.resourceUsage
      ? { ...instance.resourceUsage, observedAt: new Date(instance.resourceUsage.observedAt) }
      : null,
    logs: [...instance.logs],
  };
}
