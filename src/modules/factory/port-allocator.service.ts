import { Inject, Injectable, Logger } from '@nestjs/common';
import { SerialLock } from '../../infra/concurrency/serial-lock';
import { FACTORY_CONFIG, FactoryConfig } from '../../infra/config/env.config';
import { NoPortAvailableError } from '../../infra/errors/factory-errors';
import { HOST_PORT_PROBE, HostPortProbe } from './host-port-probe';
import { ServerRegistryService } from './server-registry.service';

/**
 * Hands out host ports from [portRangeStart, portRangeEnd], lowest first.
 * A port is skipped when a registry instance leases it, an in-flight attempt
 * reserves it, or the host reports it bound. allocate() runs behind a lock and
 * records the reservation before releasing it.
 */
@Injectable()
export class PortAllocatorService {
  private readonly logger = new Logger(PortAllocatorService.name);
  private readonly lock = new SerialLock();
  private readonly reserved = new Set<number>();

  constructor(
    @Inject(FACTORY_CONFIG) private readonly config: FactoryConfig,
    @Inject(HOST_PORT_PROBE) private readonly probe: HostPortProbe,
    private readonly registry: ServerRegistryService,
  ) {}

  allocate(): Promise<number> {
    return this.lock.runExclusive(async () => {
      const { portRangeStart, portRangeEnd } = this.config;
      const leased = this.registry.leasedPorts();
      for (let port = portRangeStart; port <= portRangeEnd; port++) {
        if (leased.has(port) || this.reserved.has(port)) continue;
        if (await this.probe.isInUse(port)) continue;
        this.reserved.add(port);
        return port;
      }
      this.logger.warn(`Port range ${portRangeStart}-${portRangeEnd} exhausted`);
      throw new NoPortAvailableError(portRangeStart, portRangeEnd);
    });
  }

  /** Drops the reservation of a failed attempt. */
  release(port: number): void {
    this.reserved.delete(port);
  }

  /** Drops the reservation once the registry lease protects the port. */
  commit(port: number): void {
    this.reserved.delete(port);
  }

  reservedPorts(): number[] {
    return [...this.reserved].sort((a, b) => a - b);
  }
}
