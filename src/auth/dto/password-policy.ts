import { IsStrongPasswordOptions } from 'class-validator';

export const PASSWORD_POLICY: IsStrongPasswordOptions = {
  minLength: 8,
  minLowercase: 1,
  minUppercase: 1,
  minNumbers: 1,
  minSymbols: 0,
};

export const PASSWORD_POLICY_MESSAGE =
  'password must be at least 8 characters and contain an uppercase letter, a lowercase letter and a digit';
