import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { publicDecorator } from './common/decorators/public.decorator';

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  uptime: number;
}

@ApiTags('Health')
@Controller()
export class AppController {
  @publicDecorator()
  @Get('health')
  @ApiOperation({ summary: 'Liveness check' })
  getHealth(): HealthStatus {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }
}
