import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { WebhooksModule } from './api/webhooks/webhooks.module';
import { RepositoriesModule } from './api/repositories/repositories.module';
import { ContributionsModule } from './api/contributions/contributions.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    DatabaseModule,
    WebhooksModule,
    RepositoriesModule,
    ContributionsModule,
  ],
})
export class AppModule {}
