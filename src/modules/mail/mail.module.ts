import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Resend } from 'resend';
import { RESEND_CLIENT } from './mail.constants';
import { MailService } from './mail.service';

@Module({
  providers: [
    {
      provide: RESEND_CLIENT,
      useFactory: (configService: ConfigService) => new Resend(configService.get<string>('mail.resendApiKey')),
      inject: [ConfigService],
    },
    MailService,
  ],
  exports: [MailService],
})
export class MailModule {}
