import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../common/database.service';
import {
  PersistenceError,
  PERSISTENCE_ERROR_CODES,
} from '../../common/errors';

export interface TestProject {
  Id: number;
  Name: string;
}

@Injectable()
export class TestProjectRepository {
  constructor(private readonly database: DatabaseService) {}

  findAll(): TestProject[] {
    return this.query('findAll', () =>
      this.database.connection
        .prepare<[], TestProject>(
          'SELECT "Id", "Name" FROM "TestProjects" ORDER BY "Id"',
        )
        .all(),
    );
  }

  findById(id: number): TestProject | undefined {
    return this.query('findById', () =>
      this.database.connection
        .prepare<[number], TestProject>(
          'SELECT "Id", "Name" FROM "TestProjects" WHERE "Id" = ?',
        )
        .get(id),
    );
  }

  create(name: string): TestProject {
    const created = this.write('create', () =>
      this.database.connection
        .prepare<[string], TestProject>(
          'INSERT INTO "TestProjects" ("Name") VALUES (?) RETURNING "Id", "Name"',
        )
        .get(name),
    );
    if (!created) {
      throw new PersistenceError(
        PERSISTENCE_ERROR_CODES.WRITE_FAILED,
        'Database error: insert returned no row',
        'create',
      );
    }
    return created;
  }

  /** Returns false when no row has that id. */
  update(id: number, name: string): boolean {
    const result = this.write('update', () =>
      this.database.connection
        .prepare<[string, number]>(
          'UPDATE "TestProjects" SET "Name" = ? WHERE "Id" = ?',
        )
        .run(name, id),
    );
    return result.changes > 0;
  }

  /** Returns false when no row has that id. */
  remove(id: number): boolean {
    const result = this.write('remove', () =>
      this.database.connection
        .prepare<[number]>('DELETE FROM "TestProjects" WHERE "Id" = ?')
        .run(id),
    );
    return result.changes > 0;
  }

  private query<T>(operation: string, run: () => T): T {
    try {
      return run();
    } catch (error) {
      throw PersistenceError.fromDriverError(
        PERSISTENCE_ERROR_CODES.QUERY_FAILED,
        operation,
        error,
      );
    }
  }

  private write<T>(operation: string, run: () => T): T {
    try {
      return run();
    } catch (error) {
      throw PersistenceError.fromDriverError(
        PERSISTENCE_ERROR_CODES.WRITE_FAILED,
        operation,
        error,
      );
    }
  }
}
