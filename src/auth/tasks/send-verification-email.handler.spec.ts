import { Test, TestingModule } from '@nestjs/testing';
import { MailService } from '../../mail/mail.service';
import { UserService } from '../../user/user.service';
import {
  hashToken,
  TokenPurpose,
} from '../../verification-token/domain/verification-token';
import { VerificationTokenService } from '../../verification-token/verification-token.service';
import { VerificationTokenRepository } from '../../verification-token/infrastructure/persistence/verification-token.repository';
import { VERIFICATION_TOKEN_OPTIONS } from '../../verification-token/verification-token.types';
import { InMemoryVerificationTokenRepository } from '../../test/fakes/in-memory-verification-token.repository';
import { SendVerificationEmailHandler } from './send-verification-email.handler';

describe('SendVerificationEmailHandler', () => {
  let handler: SendVerificationEmailHandler;
  let tokens: InMemoryVerificationTokenRepository;
  const mockUserService = { findById: jest.fn() };
  const mockMailService = { userSignUp: jest.fn() };

  beforeEach(async () => {
    jest.clearAllMocks();
    tokens = new InMemoryVerificationTokenRepository();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SendVerificationEmailHandler,
        VerificationTokenService,
        { provide: UserService, useValue: mockUserService },
        { provide: MailService, useValue: mockMailService },
        { provide: VerificationTokenRepository, useValue: tokens },
        {
          provide: VERIFICATION_TOKEN_OPTIONS,
          useValue: {
            ttlMs: {
              [TokenPurpose.EmailVerification]: 3_600_000,
              [TokenPurpose.PasswordReset]: 1_800_000,
            },
            retentionMs: 0,
          },
        },
      ],
    }).compile();

    handler = module.get(SendVerificationEmailHandler);
  });

  it('should mail a token whose hash is the one stored', async () => {
    mockUserService.findById.mockResolvedValue({
      id: 5,
      email: 'jane@example.com',
      isVerified: false,
    });

    await handler.handle({ userId: 5 });

    expect(mockMailService.userSignUp).toHaveBeenCalledTimes(1);
    const [mail] = mockMailService.userSignUp.mock.calls[0];
    expect(mail.to).toBe('jane@example.com');
    expect(tokens.tokens).toHaveLength(1);
    expect(tokens.tokens[0]).toMatchObject({
      userId: 5,
      purpose: TokenPurpose.EmailVerification,
      tokenHash: hashToken(mail.data.token),
    });
  });

  it('should retire the previous token when sent again', async () => {
    mockUserService.findById.mockResolvedValue({
      id: 5,
      email: 'jane@example.com',
      isVerified: false,
    });

    await handler.handle({ userId: 5 });
    await handler.handle({ userId: 5 });

    expect(tokens.tokens).toHaveLength(2);
    expect(tokens.tokens[0].revokedAt).not.toBeNull();
    expect(tokens.tokens[0].consumedAt).toBeNull();
    expect(tokens.tokens[1].revokedAt).toBeNull();
  });

  it('should skip an account that is already verified', async () => {
    mockUserService.findById.mockResolvedValue({
      id: 5,
      email: 'jane@example.com',
      isVerified: true,
    });

    await handler.handle({ userId: 5 });

    expect(tokens.tokens).toHaveLength(0);
    expect(mockMailService.userSignUp).not.toHaveBeenCalled();
  });

  it('should skip a user that no longer exists', async () => {
    mockUserService.findById.mockResolvedValue(null);

    await handler.handle({ userId: 5 });

    expect(mockMailService.userSignUp).not.toHaveBeenCalled();
  });

  it('should let a mail failure reach the worker', async () => {
    mockUserService.findById.mockResolvedValue({
      id: 5,
      email: 'jane@example.com',
      isVerified: false,
    });
    mockMailService.userSignUp.mockRejectedValue(new Error('smtp down'));

    await expect(handler.handle({ userId: 5 })).rejects.toThrow('smtp down');
  });
});
