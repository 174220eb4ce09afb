import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import fs from 'node:fs/promises';
import os from 'os';
import path from 'path';
import nodemailer from 'nodemailer';
import { MailerService } from './mailer.service';

jest.mock('nodemailer');

const mailConfig = {
  host: 'localhost',
  port: 1025,
  defaultEmail: 'noreply@example.com',
  defaultName: 'Events',
  ignoreTLS: true,
  secure: false,
  requireTLS: false,
};

describe('MailerService', () => {
  let service: MailerService;
  let templateDir: string;
  const sendMail = jest.fn();

  beforeAll(async () => {
    templateDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mailer-'));
    await fs.writeFile(
      path.join(templateDir, 'hello.hbs'),
      '<p>Hello {{name}}</p>',
    );
  });

  afterAll(async () => {
    await fs.rm(templateDir, { recursive: true, force: true });
  });

  beforeEach(async () => {
    sendMail.mockReset().mockResolvedValue({});
    jest.mocked(nodemailer.createTransport).mockReturnValue({
      sendMail,
    } as unknown as ReturnType<typeof nodemailer.createTransport>);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MailerService,
        {
          provide: ConfigService,
          useValue: { getOrThrow: jest.fn().mockReturnValue(mailConfig) },
        },
      ],
    }).compile();
    service = module.get<MailerService>(MailerService);
  });

  it('should create the transport from the mail config without auth when no user is set', () => {
    expect(nodemailer.createTransport).toHaveBeenCalledWith(
      expect.objectContaining({
        host: 'localhost',
        port: 1025,
        ignoreTLS: true,
        auth: undefined,
      }),
    );
  });

  it('should render the template and send from the default sender', async () => {
    await service.sendMail({
      to: 'jane@example.com',
      subject: 'Hi',
      templatePath: path.join(templateDir, 'hello.hbs'),
      context: { name: 'Jane' },
    });

    expect(sendMail).toHaveBeenCalledWith({
      to: 'jane@example.com',
      subject: 'Hi',
      from: { name: 'Events', address: 'noreply@example.com' },
      html: '<p>Hello Jane</p>',
    });
  });

  it('should reject when the context is missing a template variable', async () => {
    await expect(
      service.sendMail({
        to: 'jane@example.com',
        subject: 'Hi',
        templatePath: path.join(templateDir, 'hello.hbs'),
        context: {},
      }),
    ).rejects.toThrow();
    expect(sendMail).not.toHaveBeenCalled();
  });
});
