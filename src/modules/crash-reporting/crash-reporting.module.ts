import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CRASH_REPORTING_CONFIG,
  CRASH_REPORTING_ENV,
  loadCrashReportingConfig,
} from '../../common/config/crash-reporting.config';
import { SystemErrorFilter } from '../../common/filters/system-error.filter';
import { ReportDispatcherService } from './report-dispatcher.service';

/**
 * Provides what PanicRecoveryFilter needs. The filter itself is registered
 * globally (APP_FILTER) in AppModule.
 */
@Module({
  providers: [
    {
      provide: CRASH_REPORTING_CONFIG,
      useFactory: (configService: ConfigService) =>
        loadCrashReportingConfig({
          [CRASH_REPORTING_ENV.ENDPOINT_URL]: configService.get<string>(
            CRASH_REPORTING_ENV.ENDPOINT_URL,
          ),
          [CRASH_REPORTING_ENV.BOARD_ID]: configService.get<string>(
            CRASH_REPORTING_ENV.BOARD_ID,
          ),
        }),
      inject: [ConfigService],
    },
    ReportDispatcherService,
    SystemErrorFilter,
  ],
  exports: [CRASH_REPORTING_CONFIG, ReportDispatcherService, SystemErrorFilter],
})
export class CrashReportingModule {}
