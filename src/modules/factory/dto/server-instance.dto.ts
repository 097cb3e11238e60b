import { ApiProperty } from '@nestjs/swagger';
import { GameServerInstance, InstanceStatus } from '../game-server-instance';

export interface ResourceUsageDto {
  cpuPercent: number;
  memoryMb: number;
  memoryLimitMb: number;
  networkRxMb: number;
  networkTxMb: number;
  observedAt: string;
}

/** Wire shape of a game server instance; dates as ISO strings. */
export class ServerInstanceDto {
  @ApiProperty({ example: 'gs-clickrace-3f9a1c02b7de' })
  serverId!: string;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  description!: string;

  @ApiProperty({ enum: ['provisioning', 'running', 'stopped', 'error', 'removed'] })
  status!: InstanceStatus;

  @ApiProperty({ nullable: true, type: Number })
  port!: number | null;

  @ApiProperty({ nullable: true, type: String })
  containerRef!: string | null;

  @ApiProperty({ nullable: true, type: String })
  imageRef!: string | null;

  @ApiProperty()
  createdAt!: string;

  @ApiProperty()
  updatedAt!: string;

  @ApiProperty({ nullable: true, type: Object })
  resourceUsage!: ResourceUsageDto | null;

  @ApiProperty({ type: [String] })
  logs!: string[];
}

export function toServerInstanceDto(instance: GameServerInstance): ServerInstanceDto {
  const usage = instance.resourceUsage;
  return {
    serverId: instance.serverId,
    name: instance.name,
    description: instance.description,
    status: instance.status,
    port: instance.port,
    containerRef: instance.containerRef,
    imageRef: instance.imageRef,
    createdAt: instance.createdAt.toISOString(),
    updatedAt: instance.updatedAt.toISOString(),
    resourceUsage: usage ? { ...usage, observedAt: usage.observedAt.toISOString() } : null,
    logs: instance.logs,
  };
}
