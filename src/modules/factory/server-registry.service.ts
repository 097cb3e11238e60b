import { Inject, Injectable } from '@nestjs/common';
import { FACTORY_CONFIG, FactoryConfig } from '../../infra/config/env.config';
import { NotFoundError } from '../../infra/errors/factory-errors';
import { CLOCK, Clock } from '../../infra/time/clock';
import { GameServerInstance, cloneInstance, isActiveStatus } from './game-server-instance';

/**
 * In-memory registry of provisioned game servers.
 * Reads return copies. Every mutation is a synchronous map operation, so no caller
 * observes a half-applied change; runtime I/O never happens in here.
 * In-flight provisioning attempts are tracked as pending ids: counted as active,
 * not visible through get/list.
 */
@Injectable()
export class ServerRegistryService {
  private readonly instances = new Map<string, GameServerInstance>();
  private readonly pending = new Set<string>();

  constructor(
    @Inject(FACTORY_CONFIG) private readonly config: FactoryConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  get(serverId: string): GameServerInstance {
    const instance = this.instances.get(serverId);
    if (!instance) throw new NotFoundError('Server', serverId);
    return cloneInstance(instance);
  }

  has(serverId: string): boolean {
    return this.instances.has(serverId) || this.pending.has(serverId);
  }

  /** Ordered by createdAt, then serverId. */
  list(): GameServerInstance[] {
    return [...this.instances.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.serverId.localeCompare(b.serverId))
      .map(cloneInstance);
  }

  upsert(instance: GameServerInstance): GameServerInstance {
    const stored = cloneInstance(instance);
    stored.logs = this.trim(stored.logs);
    this.instances.set(stored.serverId, stored);
    this.pending.delete(stored.serverId);
    return cloneInstance(stored);
  }

  delete(serverId: string): boolean {
    return this.instances.delete(serverId);
  }

  /** Applies `mutate` to the stored instance and bumps updatedAt. */
  update(serverId: string, mutate: (instance: GameServerInstance) => void): GameServerInstance {
    const instance = this.instances.get(serverId);
    if (!instance) throw new NotFoundError('Server', serverId);
    mutate(instance);
    instance.logs = this.trim(instance.logs);
    instance.updatedAt = new Date(this.clock.now());
    return cloneInstance(instance);
  }

  appendLog(serverId: string, ...lines: string[]): GameServerInstance {
    return this.update(serverId, (instance) => {
      instance.logs.push(...lines);
    });
  }

  addPending(serverId: string): void {
    this.pending.add(serverId);
  }

  clearPending(serverId: string): void {
    this.pending.delete(serverId);
  }

  /** Ports held by instances in provisioning or running. */
  leasedPorts(): Set<number> {
    const ports = new Set<number>();
    for (const instance of this.instances.values()) {
      if (instance.port !== null && isActiveStatus(instance.status)) ports.add(instance.port);
    }
    return ports;
  }

  /** Active instances plus pending provisioning attempts. */
  countActive(): number {
    let count = this.pending.size;
    for (const instance of this.instances.values()) {
      if (isActiveStatus(instance.status)) count += 1;
    }
    return count;
  }

  activeInstances(): GameServerInstance[] {
    return this.list().filter((i) => isActiveStatus(i.status));
  }

  private trim(logs: string[]): string[] {
    const max = this.config.logRetentionLines;
    return logs.length > max ? logs.slice(-max) : logs;
  }
}
