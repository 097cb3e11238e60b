import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { MAX_LOG_TAIL } from '../provisioning.service';

/** Query for GET /v1/servers/:serverId/logs. */
export class LogsQueryDto {
  @ApiPropertyOptional({ minimum: 1, maximum: MAX_LOG_TAIL, default: 100 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_LOG_TAIL)
  tail?: number;
}
