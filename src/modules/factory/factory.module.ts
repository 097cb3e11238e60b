import { Module } from '@nestjs/common';
import { ConfigModule } from '../../infra/config/config.module';
import { RuntimeModule } from '../runtime/runtime.module';
import { AdmissionService } from './admission.service';
import { ContainerMonitorService } from './container-monitor.service';
import { FactoryController } from './factory.controller';
import { HOST_PORT_PROBE, NetHostPortProbe } from './host-port-probe';
import { PortAllocatorService } from './port-allocator.service';
import { ProvisioningService } from './provisioning.service';
import { ServerRegistryService } from './server-registry.service';
import { SystemController } from './system.controller';

/**
 * Factory module: provisioning pipeline, lifecycle registry, admission and ports.
 * Expects ScheduleModule.forRoot() in the root module for the container monitor.
 */
@Module({
  imports: [ConfigModule, RuntimeModule],
  controllers: [FactoryController, SystemController],
  providers: [
    ServerRegistryService,
    PortAllocatorService,
    AdmissionService,
    ProvisioningService,
    ContainerMonitorService,
    { provide: HOST_PORT_PROBE, useClass: NetHostPortProbe },
  ],
  exports: [ProvisioningService, ServerRegistryService],
})
export class FactoryModule {}
