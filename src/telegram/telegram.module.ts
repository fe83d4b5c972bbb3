import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TelegramService } from './telegram.service';
import { TelegramWebhookController } from './telegram-webhook.controller';
import { ConversationService } from './conversation/conversation.service';
import { SESSION_STORAGE, createSessionStorage } from './session-storage';
import { OrdersModule } from '../modules/orders/orders.module';
import { UsageLogModule } from '../modules/usage-log/usage-log.module';

@Module({
  imports: [OrdersModule, UsageLogModule],
  controllers: [TelegramWebhookController],
  providers: [
    {
      provide: SESSION_STORAGE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => createSessionStorage(configService).storage,
    },
    ConversationService,
    TelegramService,
  ],
  exports: [TelegramService],
})
export class TelegramModule {}
