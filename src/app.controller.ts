import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { AppService } from './app.service';
import {
  HealthCheckResponseDto,
  ServiceInfoDto,
} from './common/dto/health-check-response.dto';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  @ApiOperation({ summary: 'Service information' })
  getInfo(): ServiceInfoDto {
    return this.appService.getInfo();
  }

  @Get('health')
  @ApiOperation({ summary: 'System health check' })
  getHealth(): HealthCheckResponseDto {
    return this.appService.getHealth();
  }
}
