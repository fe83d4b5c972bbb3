import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HealthCheckService, MemoryHealthIndicator, TypeOrmHealthIndicator } from '@nestjs/terminus';
import request from 'supertest';
import { TelegramWebhookController } from '../src/telegram/telegram-webhook.controller';
import { TelegramService } from '../src/telegram/telegram.service';
import { HealthController } from '../src/health/health.controller';
import { LoggingInterceptor } from '../src/common/interceptors/logging.interceptor';

describe('Telegram webhook and health (e2e)', () => {
  let app: INestApplication;
  let handleWebhookUpdate: jest.Mock;
  let check: jest.Mock;

  const update = {
    update_id: 500,
    message: {
      message_id: 1,
      date: 1700000000,
      chat: { id: 1001, type: 'private', first_name: 'Ivan' },
      from: { id: 1001, is_bot: false, first_name: 'Ivan' },
      text: '/start',
    },
  };

  beforeAll(async () => {
    handleWebhookUpdate = jest.fn().mockResolvedValue(undefined);
    check = jest.fn();

    const moduleFixture: TestingModule = await Test.createTestingModule({
      controllers: [TelegramWebhookController, HealthController],
      providers: [
        {
          provide: ConfigService,
          useValue: {
            getOrThrow: jest.fn().mockImplementation((key: string) =>
              key === 'telegram.webhookSecret' ? 'test-secret' : undefined,
            ),
          },
        },
        { provide: TelegramService, useValue: { handleWebhookUpdate } },
        { provide: HealthCheckService, useValue: { check } },
        { provide: TypeOrmHealthIndicator, useValue: { pingCheck: jest.fn() } },
        { provide: MemoryHealthIndicator, useValue: { checkHeap: jest.fn() } },
      ],
    }).compile();

    app = moduleFixture.createNestApplication();
    app.setGlobalPrefix('api');
    app.useGlobalInterceptors(new LoggingInterceptor());
    await app.init();

    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /api/telegram/webhook', () => {
    it('should hand the update to the bot when the secret matches', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/telegram/webhook')
        .set('X-Telegram-Bot-Api-Secret-Token', 'test-secret')
        .send(update)
        .expect(200);

      expect(response.body).toEqual({ ok: true });
      expect(handleWebhookUpdate).toHaveBeenCalledWith(update);
    });

    it('should reject a missing secret with 401', async () => {
      await request(app.getHttpServer()).post('/api/telegram/webhook').send(update).expect(401);

      expect(handleWebhookUpdate).not.toHaveBeenCalled();
    });

    it('should reject a wrong secret with 401', async () => {
      await request(app.getHttpServer())
        .post('/api/telegram/webhook')
        .set('X-Telegram-Bot-Api-Secret-Token', 'test-secreT')
        .send(update)
        .expect(401);

      expect(handleWebhookUpdate).not.toHaveBeenCalled();
    });

    it('should reject a secret of a different length with 401', async () => {
      await request(app.getHttpServer())
        .post('/api/telegram/webhook')
        .set('X-Telegram-Bot-Api-Secret-Token', 'test-secret-2')
        .send(update)
        .expect(401);
    });

    it('should reject a body that is not an update with 400', async () => {
      await request(app.getHttpServer())
        .post('/api/telegram/webhook')
        .set('X-Telegram-Bot-Api-Secret-Token', 'test-secret')
        .send({ hello: 'world' })
        .expect(400);

      expect(handleWebhookUpdate).not.toHaveBeenCalled();
    });

    it('should tag responses with a request id', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/telegram/webhook')
        .set('X-Telegram-Bot-Api-Secret-Token', 'test-secret')
        .set('X-Request-ID', 'req-42')
        .send(update)
        .expect(200);

      expect(response.headers['x-request-id']).toBe('req-42');
    });
  });

  describe('GET /api/health', () => {
    it('should answer the liveness probe', async () => {
      const response = await request(app.getHttpServer()).get('/api/health/live').expect(200);

      expect(response.body).toEqual({ status: 'ok', timestamp: expect.any(String) });
    });

    it('should report readiness from the health checks', async () => {
      check.mockResolvedValue({
        status: 'ok',
        info: { database: { status: 'up' } },
        error: {},
        details: { database: { status: 'up' } },
      });

      const response = await request(app.getHttpServer()).get('/api/health/ready').expect(200);

      expect(response.body.status).toBe('ok');
    });
  });
});
