import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { isSchemaSyncEnabled } from './schema-sync';

// Contributor lookup matches LOWER(email) = LOWER($1); TypeORM cannot declare expression indexes.
const USERS_EMAIL_LOWER_INDEX_SQL = `
CREATE INDEX IF NOT EXISTS users_email_lower_idx ON users (LOWER(email));
`;

/**
 * DDL that entity synchronization does not cover. Runs on startup in the
 * process that owns the schema, the same one that synchronizes entities.
 */
@Injectable()
export class DatabaseSchemaService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseSchemaService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly config: ConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    if (!isSchemaSyncEnabled(this.config.get<string>('SYNC_DATABASE'))) return;
    await this.ensureUsersEmailLowerIndex();
  }

  private async ensureUsersEmailLowerIndex(): Promise<void> {
    // Advisory lock: only one process runs DDL at a time.
    await this.dataSource.transaction(async (manager) => {
      await manager.query(`SELECT pg_advisory_xact_lock(hashtext('users_email_lower_idx'))`);
      await manager.query(USERS_EMAIL_LOWER_INDEX_SQL);
    });
    this.logger.log('users_email_lower_idx ensured');
  }
}
