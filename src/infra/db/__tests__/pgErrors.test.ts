import { describe, it, expect } from 'vitest';
import { uniqueViolationConstraint } from '../pgErrors.js';

describe('uniqueViolationConstraint', () => {
  it('should return the violated constraint', () => {
    const error = Object.assign(new Error('duplicate key'), {
      code: '23505',
      constraint: 'users_email_key',
    });

    expect(uniqueViolationConstraint(error)).toBe('users_email_key');
  });

  it('should return an empty name when the driver gives none', () => {
    expect(uniqueViolationConstraint({ code: '23505' })).toBe('');
  });

  it('should ignore other errors', () => {
    expect(uniqueViolationConstraint({ code: '23503' })).toBeNull();
    expect(uniqueViolationConstraint(new Error('connection refused'))).toBeNull();
    expect(uniqueViolationConstraint(null)).toBeNull();
  });
});
