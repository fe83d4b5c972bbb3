import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Resend } from 'resend';
import { RESEND_CLIENT } from './mail.constants';
import { withTimeout } from '../../common/utils/timeout';
import { getErrorMessage } from '../../common/utils/errors';

const DEFAULT_NOTIFIER_TIMEOUT_MS = 10_000;

export interface AdminMessage {
  subject: string;
  html: string;
}

/**
 * Admin notifier. The recipient is fixed by configuration; callers only
 * choose the subject and body.
 */
@Injectable()
export class MailService {
  private readonly logger = new Logger(MailService.name);

  constructor(
    @Inject(RESEND_CLIENT) private readonly resend: Resend,
    private readonly configService: ConfigService,
  ) {}

  async send(message: AdminMessage): Promise<boolean> {
    const adminEmail = this.configService.get<string>('mail.adminEmail');
    if (!adminEmail) {
      this.logger.error('Admin email is not configured, cannot send notification');
      return false;
    }

    const params = {
      from: this.configService.get<string>('mail.from') ?? 'Parts Bot <bot@example.com>',
      to: [adminEmail],
      subject: message.subject,
      html: message.html,
    };
    const timeoutMs = this.configService.get<number>('mail.timeoutMs') ?? DEFAULT_NOTIFIER_TIMEOUT_MS;

    try {
      const { data, error } = await withTimeout(this.resend.emails.send(params), timeoutMs, 'resend.emails.send');
      if (error) {
        this.logger.error(`Failed to send admin notification: ${error.name}: ${error.message}`);
        this.logAttempt(params);
        return false;
      }

      this.logger.log(`Admin notification sent: ${data?.id ?? 'N/A'}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to send admin notification: ${getErrorMessage(error)}`);
      this.logAttempt(params);
      return false;
    }
  }

  private logAttempt(params: { from: string; to: string[]; subject: string }): void {
    this.logger.error(`Mail params attempted: From=${params.from}, To=${params.to.join(',')}, Subject=${params.subject}`);
  }
}
