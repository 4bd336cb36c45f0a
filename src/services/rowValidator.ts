/**
 * Row Validator
 * Checks one raw `name,email,age` row. Rules run in a fixed order
 * (name, email format, age) so a row breaking several rules always reports
 * the first one. Email uniqueness needs the store and is left to the import engine.
 */

import type { RowValidationResult } from '../types/index.js';

export const MIN_NAME_LENGTH = 2;
export const MIN_AGE = 1;
export const MAX_AGE = 120;

const EMAIL_RE = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;
const INTEGER_RE = /^[+-]?\d+$/;

export function isValidEmailFormat(email: string): boolean {
  return EMAIL_RE.test(email);
}

export function validateRow(
  rawName: string,
  rawEmail: string,
  rawAge: string
): RowValidationResult {
  const name = rawName.trim();
  const email = rawEmail.trim();
  const ageText = rawAge.trim();

  if ([...name].length < MIN_NAME_LENGTH) {
    return {
      ok: false,
      reason: 'NameTooShort',
      message: `name must be at least ${MIN_NAME_LENGTH} characters`,
    };
  }

  if (!isValidEmailFormat(email)) {
    return { ok: false, reason: 'InvalidEmailFormat', message: 'invalid email' };
  }

  if (!INTEGER_RE.test(ageText)) {
    return {
      ok: false,
      reason: 'AgeNotInteger',
      message: `age must be an integer, got '${ageText}'`,
    };
  }

  const age = parseInt(ageText, 10);
  if (age < MIN_AGE || age > MAX_AGE) {
    return {
      ok: false,
      reason: 'AgeOutOfRange',
      message: `age must be between ${MIN_AGE} and ${MAX_AGE}, got ${age}`,
    };
  }

  return { ok: true, name, email, age };
}
