import { Module } from '@nestjs/common';
import { DeliveryModule } from '../delivery/delivery.module';
import { CommentIntakeService } from './comment-intake.service';
import { KeywordMatcher } from './keyword.matcher';
import { MessageTemplateService } from './message-template.service';
import { WebhookController } from './webhook.controller';

@Module({
  imports: [DeliveryModule],
  controllers: [WebhookController],
  providers: [KeywordMatcher, MessageTemplateService, CommentIntakeService],
})
export class WebhookModule {}
