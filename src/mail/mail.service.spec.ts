import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import path from 'path';
import { MailerService } from '../mailer/mailer.service';
import { MailService } from './mail.service';

const config: Record<string, string> = {
  'app.frontendDomain': 'https://events.example.com',
  'app.workingDirectory': '/srv/app',
  'app.name': 'Events',
};

describe('MailService', () => {
  let mailService: MailService;
  const sendMail = jest.fn();

  beforeEach(async () => {
    sendMail.mockReset().mockResolvedValue(undefined);
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MailService,
        { provide: MailerService, useValue: { sendMail } },
        {
          provide: ConfigService,
          useValue: { getOrThrow: jest.fn((key: string) => config[key]) },
        },
      ],
    }).compile();
    mailService = module.get<MailService>(MailService);
  });

  describe('userSignUp', () => {
    it('should send the confirmation link built from the frontend domain', async () => {
      await mailService.userSignUp({
        to: 'jane@example.com',
        data: { token: 'abc123' },
      });

      expect(sendMail).toHaveBeenCalledWith(
        expect.objectContaining({
          to: 'jane@example.com',
          subject: 'Confirm your email',
          templatePath: path.join(
            '/srv/app',
            'src',
            'mail',
            'mail-templates',
            'auth',
            'activation.hbs',
          ),
          context: expect.objectContaining({
            url: 'https://events.example.com/confirm-email?token=abc123',
            app_name: 'Events',
          }),
        }),
      );
    });
  });

  describe('forgotPassword', () => {
    it('should send the reset link with its expiry', async () => {
      await mailService.forgotPassword({
        to: 'jane@example.com',
        data: {
          token: 'def456',
          expiresAt: new Date('2026-05-10T12:30:00.000Z'),
        },
      });

      expect(sendMail).toHaveBeenCalledWith(
        expect.objectContaining({
          to: 'jane@example.com',
          subject: 'Reset your password',
          context: expect.objectContaining({
            url: 'https://events.example.com/password-change?token=def456',
            expires_at: '2026-05-10T12:30:00.000Z',
          }),
        }),
      );
    });
  });
});
