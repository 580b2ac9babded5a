import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { NotificationDispatcherService } from './notification-dispatcher.service';
import { SSEController } from './sse.controller';
import { StatusReporterService } from './status-reporter.service';
import { WebhookOutboxService } from './webhook-outbox.service';

@Module({
  imports: [StoreModule],
  controllers: [SSEController],
  providers: [StatusReporterService, WebhookOutboxService, NotificationDispatcherService],
  exports: [StatusReporterService],
})
export class StatusModule {}
