import { Injectable } from '@nestjs/common';
import { DatabaseService } from './common/database.service';
import {
  HealthCheckResponseDto,
  ServiceInfoDto,
} from './common/dto/health-check-response.dto';
import {
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from './common/errors';

export const SERVICE_NAME = 'board-api';

@Injectable()
export class AppService {
  constructor(private readonly database: DatabaseService) {}

  getInfo(): ServiceInfoDto {
    return {
      message: 'Board API is running',
      status: 'ok',
      swagger: '/swagger',
      api: '/api/test',
    };
  }

  getHealth(): HealthCheckResponseDto {
    try {
      // Verify database connectivity
      this.database.ping();
    } catch (error) {
      throw new SystemHealthError(
        SYSTEM_HEALTH_ERROR_CODES.DATABASE_FAILURE,
        'Database connection failed',
        'critical',
        'database',
        { reason: error instanceof Error ? error.message : String(error) },
      );
    }

    return {
      data: {
        status: 'healthy',
        service: SERVICE_NAME,
      },
      timestamp: new Date().toISOString(),
    };
  }
}
