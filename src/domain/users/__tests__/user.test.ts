import { describe, it, expect } from 'vitest';
import { MAX_USER_ID, User } from '../user.js';
import { DomainError, InvalidUserIdError } from '../errors.js';

describe('User', () => {
  describe('create', () => {
    it('should create an unsaved user with the given fields', () => {
      const user = User.create('Alice', 'alice@example.com');

      expect(user.id).toBe(0n);
      expect(user.name).toBe('Alice');
      expect(user.email).toBe('alice@example.com');
      expect(user.isPersisted()).toBe(false);
    });

    it('should accept empty and malformed values', () => {
      const user = User.create('', 'not-an-email');

      expect(user.name).toBe('');
      expect(user.email).toBe('not-an-email');
    });

    it('should return independent values for identical input', () => {
      const first = User.create('Bob', 'bob@x.com');
      const second = User.create('Bob', 'bob@x.com');

      expect(first).not.toBe(second);
      expect(first.id).toBe(0n);
      expect(second.id).toBe(0n);
    });
  });

  describe('validateEmail', () => {
    it.each([
      ['', false],
      ['ab', false],
      ['a@b', true],
      ['@', true],
      ['alice@example.com', true],
    ])('should return %s -> %s', (email, expected) => {
      expect(User.create('Alice', email).validateEmail()).toBe(expected);
    });
  });

  describe('withId', () => {
    it('should return a copy carrying the id', () => {
      const user = User.create('Alice', 'alice@example.com');
      const stored = user.withId(7n);

      expect(stored).not.toBe(user);
      expect(stored.id).toBe(7n);
      expect(stored.name).toBe('Alice');
      expect(stored.email).toBe('alice@example.com');
      expect(stored.isPersisted()).toBe(true);
      expect(user.id).toBe(0n);
    });

    it('should accept the largest unsigned 64-bit id', () => {
      const user = User.create('Alice', 'alice@example.com').withId(MAX_USER_ID);

      expect(user.id).toBe(18446744073709551615n);
    });

    it('should reject negative ids', () => {
      const user = User.create('Alice', 'alice@example.com');

      expect(() => user.withId(-1n)).toThrow(InvalidUserIdError);
    });

    it('should reject ids above the 64-bit range', () => {
      const user = User.create('Alice', 'alice@example.com');

      expect(() => user.withId(MAX_USER_ID + 1n)).toThrow(
        'User id out of range: 18446744073709551616'
      );
    });
  });

  describe('errors', () => {
    it('should name InvalidUserIdError after its class', () => {
      const error = new InvalidUserIdError();

      expect(error).toBeInstanceOf(DomainError);
      expect(error.name).toBe('InvalidUserIdError');
      expect(error.message).toBe('User id must be an unsigned 64-bit integer');
    });
  });
});
