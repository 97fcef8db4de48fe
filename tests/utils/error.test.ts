import { describe, it, expect } from 'vitest';
import { ServiceValidationError, errMsg } from '../../src/utils/error.js';

describe('errMsg', () => {
  it('returns the message of an Error', () => {
    expect(errMsg(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(errMsg('plain')).toBe('plain');
    expect(errMsg(42)).toBe('42');
  });
});

describe('ServiceValidationError', () => {
  it('carries a machine-readable code', () => {
    const err = new ServiceValidationError('entry_not_found', 'No scale with id x');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ServiceValidationError');
    expect(err.code).toBe('entry_not_found');
    expect(err.message).toBe('No scale with id x');
  });
});
