import { Injectable } from '@nestjs/common';
import fs from 'node:fs/promises';
import { ConfigService } from '@nestjs/config';
import nodemailer from 'nodemailer';
import Handlebars from 'handlebars';
import { AllConfigType } from '../config/config.type';

export type SendMailOptions = {
  to: string;
  subject: string;
  text?: string;
  templatePath: string;
  context: Record<string, unknown>;
};

@Injectable()
export class MailerService {
  private readonly transporter: nodemailer.Transporter;
  private readonly templates = new Map<string, HandlebarsTemplateDelegate>();

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    const mail = configService.getOrThrow('mail', { infer: true });
    this.transporter = nodemailer.createTransport({
      host: mail.host,
      port: mail.port,
      ignoreTLS: mail.ignoreTLS,
      secure: mail.secure,
      requireTLS: mail.requireTLS,
      auth: mail.user ? { user: mail.user, pass: mail.password } : undefined,
    });
  }

  async sendMail({
    templatePath,
    context,
    ...mailOptions
  }: SendMailOptions): Promise<void> {
    const template = await this.loadTemplate(templatePath);
    const mail = this.configService.getOrThrow('mail', { infer: true });

    await this.transporter.sendMail({
      ...mailOptions,
      from: { name: mail.defaultName, address: mail.defaultEmail },
      html: template(context),
    });
  }

  private async loadTemplate(
    templatePath: string,
  ): Promise<HandlebarsTemplateDelegate> {
    const cached = this.templates.get(templatePath);
    if (cached) {
      return cached;
    }
    const source = await fs.readFile(templatePath, 'utf-8');
    const template = Handlebars.compile(source, { strict: true });
    this.templates.set(templatePath, template);
    return template;
  }
}
