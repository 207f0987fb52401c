import * as crypto from 'crypto';
import { RANDOM_PASSWORD_LENGTH } from './defaults';

const LOWERCASE_LETTERS = 'abcdefghijklmnopqrstuvwxyz';

/**
 * Generate a random password made of lowercase ASCII letters only
 */
export function randomPassword(length: number = RANDOM_PASSWORD_LENGTH): string {
  let password = '';
  for (let i = 0; i < length; i++) {
    password += LOWERCASE_LETTERS[crypto.randomInt(LOWERCASE_LETTERS.length)];
  }
  return password;
}
