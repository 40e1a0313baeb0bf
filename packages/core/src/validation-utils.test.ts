import { describe, it, expect } from 'vitest';
import { ValidationUtils } from './validation-utils.js';

describe('ValidationUtils', () => {
  it('accepts absolute URLs', () => {
    expect(() => ValidationUtils.validateUrl('https://oauth2.example.com/token')).not.toThrow();
  });

  it('rejects empty and malformed URLs with context', () => {
    expect(() => ValidationUtils.validateUrl('', 'Token URI')).toThrow('Token URI: URL is required');
    expect(() => ValidationUtils.validateUrl('not a url', 'Token URI')).toThrow(
      'Token URI: Invalid URL format: not a url',
    );
  });
});
