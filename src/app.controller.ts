import { Controller, Get, HttpStatus } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';

import { ApiResponse } from './common/types/api-response.type';

export interface HealthDTO {
  status: 'ok';
  uptime: number;
  timestamp: string;
}

@ApiTags('Health')
@Controller()
export class AppController {
  @Get('health')
  @ApiOperation({ summary: 'Liveness' })
  @ApiOkResponse({ description: 'La API está en marcha' })
  health(): ApiResponse<HealthDTO> {
    return ApiResponse.ok<HealthDTO>(HttpStatus.OK, {
      status: 'ok',
      uptime: Math.round(process.uptime()),
      timestamp: new Date().toISOString(),
    });
  }
}
