import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ApiResponseDto, apiSuccess } from '../../infra/http/api-response.dto';
import { HeartbeatDto } from './dto/heartbeat.dto';
import { ListServersQueryDto } from './dto/list-servers-query.dto';
import { MatchmakerEntryDto, toMatchmakerEntryDto } from './dto/matchmaker-entry.dto';
import { RegisterServerDto } from './dto/register-server.dto';
import { LivenessRegistryService } from './liveness-registry.service';

/**
 * Matchmaker API. Game servers register, then heartbeat within the timeout to stay listed.
 * All responses use the standard envelope: { success, result?, error? }.
 */
@ApiTags('matchmaker')
@Controller('v1/matchmaker/servers')
export class MatchmakerController {
  constructor(private readonly registry: LivenessRegistryService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Register a game server (or refresh its own live entry)' })
  @ApiResponse({ status: 200, type: ApiResponseDto })
  register(@Body() dto: RegisterServerDto): ApiResponseDto<MatchmakerEntryDto> {
    return apiSuccess(toMatchmakerEntryDto(this.registry.register(dto)));
  }

  @Post(':serverId/heartbeat')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Heartbeat; optionally report the current player count' })
  @ApiResponse({ status: 404, description: 'Unknown or already evicted; register again' })
  heartbeat(@Param('serverId') serverId: string, @Body() dto: HeartbeatDto): ApiResponseDto<MatchmakerEntryDto> {
    return apiSuccess(toMatchmakerEntryDto(this.registry.heartbeat(serverId, dto.currentPlayers)));
  }

  @Get()
  @ApiOperation({ summary: 'List registered servers (active only by default)' })
  list(@Query() query: ListServersQueryDto): ApiResponseDto<MatchmakerEntryDto[]> {
    return apiSuccess(this.registry.list(query.activeOnly ?? true).map(toMatchmakerEntryDto));
  }

  @Get(':serverId')
  @ApiOperation({ summary: 'Get one server' })
  @ApiResponse({ status: 410, description: 'Heartbeat lapsed; pending eviction' })
  get(@Param('serverId') serverId: string): ApiResponseDto<MatchmakerEntryDto> {
    return apiSuccess(toMatchmakerEntryDto(this.registry.get(serverId)));
  }

  @Delete(':serverId')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Unregister a server' })
  unregister(@Param('serverId') serverId: string): ApiResponseDto<{ serverId: string }> {
    this.registry.unregister(serverId);
    return apiSuccess({ serverId });
  }
}
