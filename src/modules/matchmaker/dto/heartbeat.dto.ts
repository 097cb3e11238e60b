import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, Min } from 'class-validator';

/** Request body for POST /v1/matchmaker/servers/:serverId/heartbeat. Body may be empty. */
export class HeartbeatDto {
  @ApiPropertyOptional({ minimum: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  currentPlayers?: number;
}
