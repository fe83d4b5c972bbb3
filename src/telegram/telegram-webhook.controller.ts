import {
  BadRequestException,
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';
import { TelegramService, TelegramUpdate } from './telegram.service';

export const SECRET_TOKEN_HEADER = 'x-telegram-bot-api-secret-token';

@Controller('telegram')
export class TelegramWebhookController {
  private readonly logger = new Logger(TelegramWebhookController.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly telegramService: TelegramService,
  ) {}

  @Post('webhook')
  @HttpCode(HttpStatus.OK)
  async receiveUpdate(
    @Headers(SECRET_TOKEN_HEADER) secretToken: string | undefined,
    @Body() update: TelegramUpdate,
  ) {
    if (!this.isTrustedCaller(secretToken)) {
      this.logger.warn('Rejected webhook call with a missing or wrong secret token');
      throw new UnauthorizedException('Invalid secret token');
    }

    if (typeof update?.update_id !== 'number') {
      throw new BadRequestException('Body is not a Telegram update');
    }

    await this.telegramService.handleWebhookUpdate(update);
    return { ok: true };
  }

  private isTrustedCaller(secretToken: string | undefined): boolean {
    const expected = Buffer.from(this.configService.getOrThrow<string>('telegram.webhookSecret'));
    const received = Buffer.from(secretToken ?? '');

    // Use timing-safe comparison to prevent timing attacks
    if (received.length !== expected.length) {
      return false;
    }
    return crypto.timingSafeEqual(received, expected);
  }
}
