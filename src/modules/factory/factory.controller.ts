import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ApiResponseDto, apiSuccess } from '../../infra/http/api-response.dto';
import { CreateServerDto } from './dto/create-server.dto';
import { LogsQueryDto } from './dto/logs-query.dto';
import { ResourceUsageDto, ServerInstanceDto, toServerInstanceDto } from './dto/server-instance.dto';
import { DEFAULT_LOG_TAIL, ProvisioningService } from './provisioning.service';

/**
 * Game server factory API.
 * All responses use the standard envelope: { success, result?, error? }.
 */
@ApiTags('servers')
@Controller('v1/servers')
export class FactoryController {
  constructor(private readonly provisioning: ProvisioningService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Build and launch a game server from user code' })
  @ApiResponse({ status: 201, type: ApiResponseDto })
  @ApiResponse({ status: 503, description: 'Admission denied or no port available' })
  async create(@Body() dto: CreateServerDto): Promise<ApiResponseDto<ServerInstanceDto>> {
    const instance = await this.provisioning.provision(dto);
    return apiSuccess(toServerInstanceDto(instance));
  }

  @Get()
  @ApiOperation({ summary: 'List game servers' })
  list(): ApiResponseDto<ServerInstanceDto[]> {
    return apiSuccess(this.provisioning.listInstances().map(toServerInstanceDto));
  }

  @Get(':serverId')
  @ApiOperation({ summary: 'Get a game server (status refreshed from the runtime)' })
  async get(@Param('serverId') serverId: string): Promise<ApiResponseDto<ServerInstanceDto>> {
    const instance = await this.provisioning.refreshStatus(serverId);
    return apiSuccess(toServerInstanceDto(instance));
  }

  @Get(':serverId/logs')
  @ApiOperation({ summary: 'Tail of the server log' })
  async logs(
    @Param('serverId') serverId: string,
    @Query() query: LogsQueryDto,
  ): Promise<ApiResponseDto<{ serverId: string; lines: string[] }>> {
    const lines = await this.provisioning.fetchLogs(serverId, query.tail ?? DEFAULT_LOG_TAIL);
    return apiSuccess({ serverId, lines });
  }

  @Get(':serverId/stats')
  @ApiOperation({ summary: 'Live resource usage (cached value when the runtime is unreachable)' })
  async stats(
    @Param('serverId') serverId: string,
  ): Promise<ApiResponseDto<{ serverId: string; resourceUsage: ResourceUsageDto | null }>> {
    const instance = await this.provisioning.refreshStats(serverId);
    return apiSuccess({ serverId, resourceUsage: toServerInstanceDto(instance).resourceUsage });
  }

  @Post(':serverId/stop')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Stop a game server' })
  async stop(@Param('serverId') serverId: string): Promise<ApiResponseDto<ServerInstanceDto>> {
    return apiSuccess(toServerInstanceDto(await this.provisioning.stop(serverId)));
  }

  @Delete(':serverId')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Stop and remove a game server with its container and image' })
  async remove(@Param('serverId') serverId: string): Promise<ApiResponseDto<ServerInstanceDto>> {
    return apiSuccess(toServerInstanceDto(await this.provisioning.remove(serverId)));
  }
}
