import { Global, Module } from '@nestjs/common';
import { DatabaseService } from './database.service';

/**
 * Global persistence module providing database access.
 * DatabaseService is available to all modules without explicit imports.
 */
@Global()
@Module({
  providers: [DatabaseService],
  exports: [DatabaseService],
})
export class PersistenceModule {}
