import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import initSqlJs from 'sql.js';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { migrateUp } from '../../database/migrations/runner';
import { SqliteConnection } from '../../database/sqlite-connection';

const IN_MEMORY = ':memory:';

/**
 * Owns the SQLite database. The engine runs in process (sql.js); a file
 * path keeps the database on disk, `:memory:` keeps it for the process
 * lifetime only.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private connection?: SqliteConnection;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const path = this.configService.get<string>(
      'database.path',
      'data/marketplace.db',
    );

    const SQL = await initSqlJs();
    let connection: SqliteConnection;
    if (path === IN_MEMORY) {
      connection = new SqliteConnection(new SQL.Database());
    } else {
      mkdirSync(dirname(path), { recursive: true });
      const image = existsSync(path) ? readFileSync(path) : undefined;
      connection = new SqliteConnection(new SQL.Database(image), (data) =>
        writeFileSync(path, data),
      );
    }

    migrateUp(connection, this.logger);
    this.connection = connection;
    this.logger.log(`Connected to database at ${path}`);
  }

  onModuleDestroy(): void {
    if (!this.connection) return;
    this.connection.close();
    this.connection = undefined;
    this.logger.log('Disconnected from database');
  }

  get db(): SqliteConnection {
    if (!this.connection) {
      throw new Error('Database connection is not open');
    }
    return this.connection;
  }
}
