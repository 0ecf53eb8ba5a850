import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { PersistenceModule } from './common/persistence.module';
import { loggerConfig } from './common/config/logger.config';
import { CrashReportingModule } from './modules/crash-reporting/crash-reporting.module';
import { PanicRecoveryFilter } from './modules/crash-reporting/panic-recovery.filter';
import { TestProjectsModule } from './modules/test-projects/test-projects.module';

@Module({
  imports: [
    // CRITICAL: LoggerModule MUST be first to replace default logger early
    LoggerModule.forRoot(loggerConfig),

    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env.${process.env.NODE_ENV || 'development'}`,
    }),
    PersistenceModule,
    CrashReportingModule,
    TestProjectsModule,
  ],
  controllers: [AppController],
  providers: [AppService, { provide: APP_FILTER, useClass: PanicRecoveryFilter }],
})
export class AppModule {}
