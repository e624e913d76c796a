import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { User, Project, Task, Repository, GitContribution } from './entities';
import { DatabaseSchemaService } from './database-schema.service';
import { isSchemaSyncEnabled } from './schema-sync';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService) => ({
        type: 'postgres',
        url: config.get<string>('DATABASE_URL'),
        entities: [User, Project, Task, Repository, GitContribution],
        // Only one process should synchronize the database (see SYNC_DATABASE in .env.example)
        synchronize: isSchemaSyncEnabled(config.get<string>('SYNC_DATABASE')),
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [DatabaseSchemaService],
})
export class DatabaseModule {}
