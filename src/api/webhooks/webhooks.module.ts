import { Module } from '@nestjs/common';
import { IntakeModule } from '../../intake/intake.module';
import { GitWebhookController } from './git-webhook.controller';

@Module({
  imports: [IntakeModule],
  controllers: [GitWebhookController],
})
export class WebhooksModule {}
