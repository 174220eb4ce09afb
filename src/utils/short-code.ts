import { customAlphabet } from 'nanoid';

const alphabet = '0123456789abcdefghijklmnopqrstuvwxyz';

export function generateShortCode(length = 5): string {
  return customAlphabet(alphabet, length)();
}
