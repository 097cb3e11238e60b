import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ApiResponseDto, apiSuccess } from '../../infra/http/api-response.dto';
import { AdmissionService, ResourceSummary } from './admission.service';

@ApiTags('system')
@Controller('v1/system')
export class SystemController {
  constructor(private readonly admission: AdmissionService) {}

  @Get('resources')
  @ApiOperation({ summary: 'Reserved and observed resources against admission ceilings' })
  resources(): ApiResponseDto<ResourceSummary> {
    return apiSuccess(this.admission.summary());
  }
}
