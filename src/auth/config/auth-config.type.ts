export type AuthConfig = {
  secret: string;
  expires: string;
  refreshSecret: string;
  refreshExpires: string;
  emailVerificationExpires: string;
  passwordResetExpires: string;
  tokenRetention: string;
};
