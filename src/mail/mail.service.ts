import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import path from 'path';
import { AllConfigType } from '../config/config.type';
import { MailerService } from '../mailer/mailer.service';
import { MailData } from './interfaces/mail-data.interface';

@Injectable()
export class MailService {
  constructor(
    private readonly mailerService: MailerService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async userSignUp(mailData: MailData<{ token: string }>): Promise<void> {
    const url = this.frontendUrl('confirm-email', mailData.data.token);

    await this.mailerService.sendMail({
      to: mailData.to,
      subject: 'Confirm your email',
      text: `${url} Confirm your email`,
      templatePath: this.templatePath('activation.hbs'),
      context: {
        title: 'Confirm your email',
        url,
        actionTitle: 'Confirm email',
        app_name: this.appName(),
      },
    });
  }

  async forgotPassword(
    mailData: MailData<{ token: string; expiresAt: Date }>,
  ): Promise<void> {
    const url = this.frontendUrl('password-change', mailData.data.token);

    await this.mailerService.sendMail({
      to: mailData.to,
      subject: 'Reset your password',
      text: `${url} Reset your password`,
      templatePath: this.templatePath('reset-password.hbs'),
      context: {
        title: 'Reset your password',
        url,
        actionTitle: 'Reset password',
        app_name: this.appName(),
        expires_at: mailData.data.expiresAt.toISOString(),
      },
    });
  }

  private frontendUrl(route: string, token: string): string {
    const url = new URL(
      `${this.configService.getOrThrow('app.frontendDomain', { infer: true })}/${route}`,
    );
    url.searchParams.set('token', token);
    return url.toString();
  }

  private templatePath(name: string): string {
    return path.join(
      this.configService.getOrThrow('app.workingDirectory', { infer: true }),
      'src',
      'mail',
      'mail-templates',
      'auth',
      name,
    );
  }

  private appName(): string {
    return this.configService.getOrThrow('app.name', { infer: true });
  }
}
