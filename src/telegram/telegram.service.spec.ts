import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { TelegramService, toSender, toTextEvent } from './telegram.service';
import { ConversationService } from './conversation/conversation.service';
import { Sender } from './conversation/conversation.types';
import { captureException } from '../config/sentry.config';

const mockBot = {
  api: {
    setMyCommands: jest.fn().mockResolvedValue(true),
    setWebhook: jest.fn().mockResolvedValue(true),
    deleteWebhook: jest.fn().mockResolvedValue(true),
  },
  botInfo: { username: 'parts_test_bot' },
  use: jest.fn(),
  on: jest.fn(),
  catch: jest.fn(),
  init: jest.fn().mockResolvedValue(undefined),
  start: jest.fn().mockResolvedValue(undefined),
  stop: jest.fn().mockResolvedValue(undefined),
  isRunning: jest.fn().mockReturnValue(false),
  handleUpdate: jest.fn().mockResolvedValue(undefined),
};

// Mock grammy Bot, keep the real keyboard builders
jest.mock('grammy', () => ({
  ...jest.requireActual('grammy'),
  Bot: jest.fn().mockImplementation(() => mockBot),
}));

jest.mock('@grammyjs/runner', () => ({
  sequentialize: jest.fn().mockReturnValue(jest.fn()),
}));

jest.mock('../config/sentry.config', () => ({
  captureException: jest.fn(),
}));

describe('TelegramService', () => {
  let service: TelegramService;
  let dispatch: jest.Mock;
  let config: Record<string, unknown>;

  const telegramUser = { id: 1001, is_bot: false, first_name: 'Ivan', username: 'driver' };
  const sender: Sender = { id: 1001, firstName: 'Ivan', username: 'driver' };

  const handlerFor = (filter: string) => {
    const call = mockBot.on.mock.calls.find(([registered]) => registered === filter);
    if (!call) throw new Error(`No handler registered for ${filter}`);
    return call[1];
  };

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  beforeEach(async () => {
    dispatch = jest.fn().mockResolvedValue(undefined);
    config = {
      'telegram.botToken': 'test-bot-token',
      'telegram.mode': 'webhook',
      'telegram.webhookUrl': 'https://bot.example.com/api/telegram/webhook',
      'telegram.webhookSecret': 'test-secret',
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TelegramService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn().mockImplementation((key: string) => config[key]),
            getOrThrow: jest.fn().mockImplementation((key: string) => config[key]),
          },
        },
        {
          provide: ConversationService,
          useValue: { dispatch },
        },
      ],
    }).compile();

    service = module.get<TelegramService>(TelegramService);
  });

  describe('onModuleInit', () => {
    it('should register the webhook with the secret token in webhook mode', async () => {
      await service.onModuleInit();

      expect(mockBot.init).toHaveBeenCalled();
      expect(mockBot.api.setWebhook).toHaveBeenCalledWith('https://bot.example.com/api/telegram/webhook', {
        secret_token: 'test-secret',
        allowed_updates: ['message', 'callback_query'],
      });
      expect(mockBot.start).not.toHaveBeenCalled();
    });

    it('should drop the webhook and start polling in polling mode', async () => {
      config['telegram.mode'] = 'polling';

      await service.onModuleInit();

      expect(mockBot.api.deleteWebhook).toHaveBeenCalled();
      expect(mockBot.start).toHaveBeenCalledWith(
        expect.objectContaining({ allowed_updates: ['message', 'callback_query'] }),
      );
      expect(mockBot.api.setWebhook).not.toHaveBeenCalled();
    });

    it('should register the start and cancel commands', async () => {
      await service.onModuleInit();

      expect(mockBot.api.setMyCommands).toHaveBeenCalledWith([
        { command: 'start', description: '🚗 Новый запрос на запчасти' },
        { command: 'cancel', description: '✖️ Отменить запрос' },
      ]);
    });

    it('should keep starting when the command menu cannot be set', async () => {
      mockBot.api.setMyCommands.mockRejectedValueOnce(new Error('Too Many Requests'));

      await service.onModuleInit();

      expect(mockBot.api.setWebhook).toHaveBeenCalled();
    });

    it('should serialize updates per user before the handlers', async () => {
      await service.onModuleInit();

      expect(mockBot.use).toHaveBeenCalledTimes(1);
      expect(mockBot.on.mock.calls.map(([filter]) => filter)).toEqual([
        'callback_query:data',
        'message:text',
        'message',
      ]);
    });
  });

  describe('error handler', () => {
    it('should report unexpected errors', async () => {
      await service.onModuleInit();
      const onError = mockBot.catch.mock.calls[0][0];
      const error = new Error('Bad Request: message text is empty');

      onError({ ctx: { from: { id: 1001 }, update: { update_id: 77 } }, error });

      expect(captureException).toHaveBeenCalledWith(error, { updateId: 77, userId: 1001 });
    });

    it('should ignore users who blocked the bot', async () => {
      await service.onModuleInit();
      const onError = mockBot.catch.mock.calls[0][0];

      onError({
        ctx: { from: { id: 1001 }, update: { update_id: 78 } },
        error: new Error('Forbidden: bot was blocked by the user'),
      });

      expect(captureException).not.toHaveBeenCalled();
    });
  });

  describe('update handlers', () => {
    beforeEach(async () => {
      await service.onModuleInit();
    });

    it('should answer the callback query and dispatch the button tag', async () => {
      const ctx = {
        callbackQuery: { from: telegramUser, data: 'vin_yes', message: { message_id: 5 } },
        answerCallbackQuery: jest.fn().mockResolvedValue(true),
      };

      await handlerFor('callback_query:data')(ctx);

      expect(ctx.answerCallbackQuery).toHaveBeenCalled();
      expect(dispatch).toHaveBeenCalledWith({ kind: 'callback', from: sender, tag: 'vin_yes' }, expect.any(Function));
    });

    it('should dispatch commands addressed to the bot by name', async () => {
      const ctx = { from: telegramUser, message: { text: '/start@parts_test_bot' } };

      await handlerFor('message:text')(ctx);

      expect(dispatch).toHaveBeenCalledWith(
        { kind: 'command', from: sender, name: 'start', text: '/start@parts_test_bot' },
        expect.any(Function),
      );
    });

    it('should dispatch other messages as unsupported', async () => {
      const ctx = { from: telegramUser, message: { photo: [] } };

      await handlerFor('message')(ctx);

      expect(dispatch).toHaveBeenCalledWith({ kind: 'unsupported', from: sender }, expect.any(Function));
    });

    it('should ignore messages without a sender', async () => {
      await handlerFor('message:text')({ message: { text: 'hello' } });

      expect(dispatch).not.toHaveBeenCalled();
    });
  });

  describe('replies', () => {
    const sinkFor = async (ctx: object) => {
      await service.onModuleInit();
      await handlerFor('message')(ctx);
      return dispatch.mock.calls[0][1];
    };

    it('should send HTML and remove the reply keyboard when asked', async () => {
      const ctx = { from: telegramUser, reply: jest.fn().mockResolvedValue({}) };
      const sink = await sinkFor(ctx);

      await sink({ kind: 'send', text: '<b>Hi</b>', html: true, removeKeyboard: true });

      expect(ctx.reply).toHaveBeenCalledWith('<b>Hi</b>', {
        parse_mode: 'HTML',
        reply_markup: { remove_keyboard: true },
      });
    });

    it('should attach inline buttons carrying their tags', async () => {
      const ctx = { from: telegramUser, reply: jest.fn().mockResolvedValue({}) };
      const sink = await sinkFor(ctx);

      await sink({ kind: 'send', text: 'Pick', buttons: [[{ text: 'Yes', tag: 'vin_yes' }], [{ text: 'No', tag: 'vin_no' }]] });

      expect(ctx.reply).toHaveBeenCalledWith('Pick', {
        reply_markup: expect.objectContaining({
          inline_keyboard: [[{ text: 'Yes', callback_data: 'vin_yes' }], [{ text: 'No', callback_data: 'vin_no' }]],
        }),
      });
    });

    it('should edit the message whose button was pressed', async () => {
      const ctx = {
        from: telegramUser,
        callbackQuery: { message: { message_id: 5 } },
        editMessageText: jest.fn().mockResolvedValue(true),
        reply: jest.fn(),
      };
      const sink = await sinkFor(ctx);

      await sink({ kind: 'edit', text: 'Enter your VIN' });

      expect(ctx.editMessageText).toHaveBeenCalledWith('Enter your VIN', {});
      expect(ctx.reply).not.toHaveBeenCalled();
    });

    it('should send a new message when there is nothing to edit', async () => {
      const ctx = { from: telegramUser, reply: jest.fn().mockResolvedValue({}) };
      const sink = await sinkFor(ctx);

      await sink({ kind: 'edit', text: 'Enter your VIN' });

      expect(ctx.reply).toHaveBeenCalledWith('Enter your VIN', {});
    });
  });

  describe('handleWebhookUpdate', () => {
    const update = { update_id: 10 };

    it('should refuse updates before the bot is initialized', async () => {
      await expect(service.handleWebhookUpdate(update)).rejects.toThrow('Telegram bot is not initialized');
    });

    it('should hand updates to the bot', async () => {
      await service.onModuleInit();

      await service.handleWebhookUpdate(update);

      expect(mockBot.handleUpdate).toHaveBeenCalledWith(update);
    });
  });

  describe('onModuleDestroy', () => {
    it('should stop a polling bot', async () => {
      await service.onModuleInit();
      mockBot.isRunning.mockReturnValueOnce(true);

      await service.onModuleDestroy();

      expect(mockBot.stop).toHaveBeenCalled();
    });

    it('should leave a webhook bot alone', async () => {
      await service.onModuleInit();

      await service.onModuleDestroy();

      expect(mockBot.stop).not.toHaveBeenCalled();
    });
  });
});

describe('toSender', () => {
  it('should omit a missing username', () => {
    expect(toSender({ id: 5, is_bot: false, first_name: 'Olga' })).toEqual({ id: 5, firstName: 'Olga' });
  });
});

describe('toTextEvent', () => {
  const from: Sender = { id: 5 };

  it('should lower-case command names', () => {
    expect(toTextEvent(from, '/CANCEL')).toEqual({ kind: 'command', from, name: 'cancel', text: '/CANCEL' });
  });

  it('should keep the full text of commands with arguments', () => {
    expect(toTextEvent(from, '/start promo')).toEqual({ kind: 'command', from, name: 'start', text: '/start promo' });
  });

  it('should treat text with a slash elsewhere as plain text', () => {
    expect(toTextEvent(from, 'front/rear pads')).toEqual({ kind: 'text', from, text: 'front/rear pads' });
  });
});
