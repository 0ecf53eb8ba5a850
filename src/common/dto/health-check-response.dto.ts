import { ApiProperty } from '@nestjs/swagger';

export class HealthStatusDto {
  @ApiProperty({ example: 'healthy' })
  status!: string;

  @ApiProperty({ example: 'board-api' })
  service!: string;
}

export class HealthCheckResponseDto {
  @ApiProperty({ type: HealthStatusDto })
  data!: HealthStatusDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export class ServiceInfoDto {
  @ApiProperty({ example: 'Board API is running' })
  message!: string;

  @ApiProperty({ example: 'ok' })
  status!: string;

  @ApiProperty({ example: '/swagger' })
  swagger!: string;

  @ApiProperty({ example: '/api/test' })
  api!: string;
}
