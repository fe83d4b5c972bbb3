import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Bot, Context, InlineKeyboard } from 'grammy';
import { sequentialize } from '@grammyjs/runner';
import { ConversationService } from './conversation/conversation.service';
import { InboundEvent, ReplyButton, ReplySink, Sender } from './conversation/conversation.types';
import { TelegramMode } from '../config/configuration';
import { captureException } from '../config/sentry.config';
import { getErrorMessage } from '../common/utils/errors';

export type TelegramUpdate = Parameters<Bot['handleUpdate']>[0];
type TelegramUser = NonNullable<Context['from']>;

const ALLOWED_UPDATES = ['message', 'callback_query'] as const;
const REMOVE_KEYBOARD = { remove_keyboard: true } as const;

// "/start", "/start@PartsBot", "/start payload"
const COMMAND_PATTERN = /^\/([a-z0-9_]+)(?:@\S+)?(?:\s|$)/i;

export function toSender(user: TelegramUser): Sender {
  const sender: Sender = { id: user.id, firstName: user.first_name };
  if (user.username) sender.username = user.username;
  return sender;
}

export function toTextEvent(from: Sender, text: string): InboundEvent {
  const match = COMMAND_PATTERN.exec(text);
  if (match) {
    return { kind: 'command', from, name: match[1].toLowerCase(), text };
  }
  return { kind: 'text', from, text };
}

function toKeyboard(rows: ReplyButton[][]): InlineKeyboard {
  return InlineKeyboard.from(
    rows.map((row) => row.map((button) => InlineKeyboard.text(button.text, button.tag))),
  );
}

@Injectable()
export class TelegramService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TelegramService.name);
  private bot?: Bot;

  constructor(
    private readonly configService: ConfigService,
    private readonly conversation: ConversationService,
  ) { }

  async onModuleInit() {
    const token = this.configService.getOrThrow<string>('telegram.botToken');
    const mode = this.configService.get<TelegramMode>('telegram.mode') ?? 'webhook';

    const bot = new Bot(token);

    // Global error handler
    bot.catch((err) => {
      const ctx = err.ctx;
      const error = err.error;

      // Handle "bot was blocked by the user" errors silently
      if (error instanceof Error && error.message.includes('bot was blocked by the user')) {
        this.logger.debug(`User ${ctx.from?.id} has blocked the bot`);
        return;
      }

      this.logger.error(`Error while handling update ${ctx.update.update_id}: ${getErrorMessage(error)}`);
      captureException(error, { updateId: ctx.update.update_id, userId: ctx.from?.id });
    });

    // One update at a time per user
    bot.use(sequentialize((ctx: Context) => ctx.from?.id.toString()));

    this.setupHandlers(bot);
    this.bot = bot;

    await bot.init();
    this.logger.log(`Telegram bot @${bot.botInfo.username} initialized`);

    await bot.api
      .setMyCommands([
        { command: 'start', description: '🚗 Новый запрос на запчасти' },
        { command: 'cancel', description: '✖️ Отменить запрос' },
      ])
      .catch((err) => this.logger.warn(`Failed to set bot commands: ${getErrorMessage(err)}`));

    if (mode === 'webhook') {
      await this.registerWebhook(bot);
      return;
    }

    await bot.api.deleteWebhook();
    // Start polling in background (don't await - it resolves only when the bot stops)
    bot
      .start({
        allowed_updates: ALLOWED_UPDATES,
        onStart: () => this.logger.log('Telegram bot started (long polling)'),
      })
      .catch((error) => {
        this.logger.error(`Telegram polling stopped: ${getErrorMessage(error)}`);
        captureException(error);
      });
  }

  async onModuleDestroy() {
    if (this.bot?.isRunning()) {
      await this.bot.stop();
      this.logger.log('Telegram bot stopped');
    }
  }

  /** Feeds one update received on the webhook endpoint through the bot. */
  async handleWebhookUpdate(update: TelegramUpdate): Promise<void> {
    if (!this.bot) {
      throw new Error('Telegram bot is not initialized');
    }
    await this.bot.handleUpdate(update);
  }

  private async registerWebhook(bot: Bot) {
    const url = this.configService.getOrThrow<string>('telegram.webhookUrl');
    await bot.api.setWebhook(url, {
      secret_token: this.configService.getOrThrow<string>('telegram.webhookSecret'),
      allowed_updates: ALLOWED_UPDATES,
    });
    this.logger.log(`Telegram webhook registered at ${url}`);
  }

  private setupHandlers(bot: Bot) {
    bot.on('callback_query:data', async (ctx) => {
      await ctx.answerCallbackQuery();
      await this.conversation.dispatch(
        { kind: 'callback', from: toSender(ctx.callbackQuery.from), tag: ctx.callbackQuery.data },
        this.replySink(ctx),
      );
    });

    bot.on('message:text', async (ctx) => {
      if (!ctx.from) return;
      await this.conversation.dispatch(
        toTextEvent(toSender(ctx.from), ctx.message.text),
        this.replySink(ctx),
      );
    });

    // Photos, stickers, voice notes...
    bot.on('message', async (ctx) => {
      if (!ctx.from) return;
      await this.conversation.dispatch(
        { kind: 'unsupported', from: toSender(ctx.from) },
        this.replySink(ctx),
      );
    });
  }

  private replySink(ctx: Context): ReplySink {
    return async (reply) => {
      const keyboard = reply.buttons ? toKeyboard(reply.buttons) : undefined;

      if (reply.kind === 'edit') {
        // Edits only make sense on the message whose button was pressed
        if (ctx.callbackQuery?.message) {
          await ctx.editMessageText(reply.text, { reply_markup: keyboard });
        } else {
          await ctx.reply(reply.text, { reply_markup: keyboard });
        }
        return;
      }

      await ctx.reply(reply.text, {
        parse_mode: reply.html ? 'HTML' : undefined,
        reply_markup: keyboard ?? (reply.removeKeyboard ? REMOVE_KEYBOARD : undefined),
      });
    };
  }
}
