import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { orchestratorConfig } from './config/orchestrator.config';
import { DatabaseModule } from './database/database.module';
import { PipelinesModule } from './api/pipelines/pipelines.module';
import { RunsModule } from './api/runs/runs.module';
import { WebhooksModule } from './api/webhooks/webhooks.module';
import { StatusModule } from './status/status.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [orchestratorConfig] }),
    DatabaseModule,
    PipelinesModule,
    RunsModule,
    WebhooksModule,
    StatusModule,
  ],
})
export class AppModule {}
