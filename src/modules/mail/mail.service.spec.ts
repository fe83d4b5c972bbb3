import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { MailService } from './mail.service';
import { RESEND_CLIENT } from './mail.constants';

describe('MailService', () => {
  let service: MailService;
  let sendEmail: jest.Mock;
  let errorSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  const config: Record<string, unknown> = {
    'mail.adminEmail': 'admin@example.com',
    'mail.from': 'Parts Bot <bot@example.com>',
    'mail.timeoutMs': 50,
  };

  beforeEach(async () => {
    sendEmail = jest.fn();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MailService,
        {
          provide: RESEND_CLIENT,
          useValue: { emails: { send: sendEmail } },
        },
        {
          provide: ConfigService,
          useValue: { get: jest.fn().mockImplementation((key: string) => config[key]) },
        },
      ],
    }).compile();

    service = module.get<MailService>(MailService);
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should send to the configured administrator only', async () => {
    sendEmail.mockResolvedValue({ data: { id: 'email-1' }, error: null });

    const result = await service.send({ subject: 'New request', html: '<p>hi</p>' });

    expect(result).toBe(true);
    expect(sendEmail).toHaveBeenCalledWith({
      from: 'Parts Bot <bot@example.com>',
      to: ['admin@example.com'],
      subject: 'New request',
      html: '<p>hi</p>',
    });
    expect(logSpy).toHaveBeenCalledWith('Admin notification sent: email-1');
  });

  it('should return false when the provider reports an error', async () => {
    sendEmail.mockResolvedValue({
      data: null,
      error: { name: 'validation_error', message: 'Invalid `from` field' },
    });

    const result = await service.send({ subject: 'New request', html: '<p>hi</p>' });

    expect(result).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith('Failed to send admin notification: validation_error: Invalid `from` field');
    expect(errorSpy).toHaveBeenCalledWith(
      'Mail params attempted: From=Parts Bot <bot@example.com>, To=admin@example.com, Subject=New request',
    );
  });

  it('should return false when the client throws', async () => {
    sendEmail.mockRejectedValue(new Error('getaddrinfo ENOTFOUND api.resend.com'));

    const result = await service.send({ subject: 'New request', html: '<p>hi</p>' });

    expect(result).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith('Failed to send admin notification: getaddrinfo ENOTFOUND api.resend.com');
  });

  it('should give up after the notifier timeout', async () => {
    sendEmail.mockReturnValue(new Promise(() => undefined));

    const result = await service.send({ subject: 'New request', html: '<p>hi</p>' });

    expect(result).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith('Failed to send admin notification: resend.emails.send timed out after 50 ms');
  });
});
