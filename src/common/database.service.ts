import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import {
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from './errors';

const IN_MEMORY = ':memory:';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS "TestProjects" (
    "Id" INTEGER PRIMARY KEY AUTOINCREMENT,
    "Name" TEXT NOT NULL
  )
`;

/**
 * Owns the SQLite connection. Opened on module init, closed on destroy.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private db: Database.Database | undefined;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit(): void {
    const databasePath = this.configService.get<string>(
      'DATABASE_PATH',
      'data/board-api.sqlite',
    );
    try {
      if (databasePath !== IN_MEMORY) {
        fs.mkdirSync(path.dirname(path.resolve(databasePath)), {
          recursive: true,
        });
      }
      this.db = new Database(databasePath);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);
    } catch (error) {
      throw new SystemHealthError(
        SYSTEM_HEALTH_ERROR_CODES.DATABASE_INITIALIZATION_FAILED,
        `Failed to open database at ${databasePath}: ${error instanceof Error ? error.message : String(error)}`,
        'critical',
        'database',
        { path: databasePath },
      );
    }
    this.logger.log({
      message: `Database ready at ${databasePath}`,
      module: 'persistence',
    });
  }

  onModuleDestroy(): void {
    this.db?.close();
    this.db = undefined;
  }

  get connection(): Database.Database {
    if (!this.db) {
      throw new SystemHealthError(
        SYSTEM_HEALTH_ERROR_CODES.DATABASE_FAILURE,
        'Database connection is not open',
        'critical',
        'database',
      );
    }
    return this.db;
  }

  /** Round-trips a trivial query. Throws when the database is unusable. */
  ping(): void {
    this.connection.prepare('SELECT 1').get();
  }
}
