/**
 * Row Validator Tests
 */

import { describe, it, expect } from 'vitest';
import { validateRow, isValidEmailFormat } from '../services/rowValidator.js';

describe('Row Validator', () => {
  describe('accepted rows', () => {
    it('should accept a valid row and return trimmed values', () => {
      const result = validateRow('  Alice  ', ' alice@example.com ', ' 30 ');

      expect(result).toEqual({ ok: true, name: 'Alice', email: 'alice@example.com', age: 30 });
    });

    it('should accept the age bounds 1 and 120', () => {
      expect(validateRow('Al', 'al@example.com', '1')).toMatchObject({ ok: true, age: 1 });
      expect(validateRow('Al', 'al@example.com', '120')).toMatchObject({ ok: true, age: 120 });
    });

    it('should keep the email case as written', () => {
      const result = validateRow('Bob', 'Bob.Smith@Example.ORG', '25');

      expect(result).toMatchObject({ ok: true, email: 'Bob.Smith@Example.ORG' });
    });
  });

  describe('rejected rows', () => {
    it('should reject a name shorter than 2 characters after trimming', () => {
      const result = validateRow('  A ', 'a@example.com', '30');

      expect(result).toEqual({
        ok: false,
        reason: 'NameTooShort',
        message: 'name must be at least 2 characters',
      });
    });

    it('should count name length in characters, not UTF-16 units', () => {
      expect(validateRow('😀', 'a@b.co', '30')).toMatchObject({ ok: false, reason: 'NameTooShort' });
      expect(validateRow('😀😀', 'a@b.co', '30')).toMatchObject({ ok: true, name: '😀😀' });
    });

    it('should reject malformed emails', () => {
      for (const email of ['plainaddress', 'no-at.example.com', 'a@nodot', 'two@@example.com', 'sp ace@example.com', '']) {
        expect(validateRow('Alice', email, '30')).toMatchObject({ ok: false, reason: 'InvalidEmailFormat' });
      }
    });

    it('should reject ages that are not integers', () => {
      for (const age of ['30.5', 'abc', '', '3e1', '1,000']) {
        expect(validateRow('Alice', 'alice@example.com', age)).toMatchObject({ ok: false, reason: 'AgeNotInteger' });
      }
    });

    it('should reject integer ages outside 1..120', () => {
      expect(validateRow('Alice', 'alice@example.com', '0')).toEqual({
        ok: false,
        reason: 'AgeOutOfRange',
        message: 'age must be between 1 and 120, got 0',
      });
      expect(validateRow('Alice', 'alice@example.com', '121')).toMatchObject({ reason: 'AgeOutOfRange' });
      expect(validateRow('Alice', 'alice@example.com', '-5')).toMatchObject({ reason: 'AgeOutOfRange' });
    });
  });

  describe('rule order', () => {
    it('should report the name before the email and age', () => {
      expect(validateRow('A', 'bad', '0')).toMatchObject({ reason: 'NameTooShort' });
    });

    it('should report the email before the age', () => {
      expect(validateRow('Alice', 'bad', 'x')).toMatchObject({ reason: 'InvalidEmailFormat' });
    });
  });

  describe('isValidEmailFormat', () => {
    it('should require a local part, an @ and a dotted domain', () => {
      expect(isValidEmailFormat('user@mail.example.com')).toBe(true);
      expect(isValidEmailFormat('user@localhost')).toBe(false);
    });
  });
});
