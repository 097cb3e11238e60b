import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIP, IsInt, IsNotEmpty, IsObject, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { DEFAULT_MAX_PLAYERS, MAX_PLAYERS_LIMIT } from '../liveness-registry.service';

/** Request body for POST /v1/matchmaker/servers. */
export class RegisterServerDto {
  @ApiProperty({ example: '192.168.1.100', description: 'IPv4 or IPv6 address' })
  @IsIP()
  ip!: string;

  @ApiProperty({ example: 8080, minimum: 1, maximum: 65535 })
  @IsInt()
  @Min(1)
  @Max(65535)
  port!: number;

  @ApiProperty({ example: 'Click Race' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @ApiPropertyOptional({ default: DEFAULT_MAX_PLAYERS, minimum: 1, maximum: MAX_PLAYERS_LIMIT })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_PLAYERS_LIMIT)
  maxPlayers?: number;

  @ApiPropertyOptional({ default: 0, minimum: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  currentPlayers?: number;

  @ApiPropertyOptional({ type: Object })
  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;

  /** Reused when free; a live entry at the same ip:port is refreshed instead. */
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  serverId?: string;
}
