import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { DESCRIPTION_MAX_LENGTH, NAME_MAX_LENGTH } from '../provisioning.service';

/** Request body for POST /v1/servers. Size limit on userCode is enforced by the service. */
export class CreateServerDto {
  @ApiProperty({ description: 'Game logic module (JavaScript)', example: 'function initGame() { return { clickCount: 0 }; }' })
  @IsString()
  @IsNotEmpty()
  userCode!: string;

  @ApiProperty({ example: 'Click Race' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(NAME_MAX_LENGTH)
  name!: string;

  @ApiPropertyOptional({ example: 'First to 100 clicks wins' })
  @IsOptional()
  @IsString()
  @MaxLength(DESCRIPTION_MAX_LENGTH)
  description?: string;
}
