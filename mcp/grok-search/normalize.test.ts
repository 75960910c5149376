import { describe, expect, it } from 'vitest';
import {
  canonicalizeEndpoint,
  isPlaceholder,
  normalizeCredential,
  normalizeEndpoint,
} from './normalize.js';

describe('normalizeCredential', () => {
  it('trims surrounding whitespace', () => {
    expect(normalizeCredential('  test-secret \n')).toBe('test-secret');
  });

  it('treats empty and placeholder values as missing', () => {
    expect(normalizeCredential('')).toBe('');
    expect(normalizeCredential('   ')).toBe('');
    expect(normalizeCredential('your_api_key')).toBe('');
    expect(normalizeCredential(' Change_Me ')).toBe('');
    expect(normalizeCredential('API_KEY')).toBe('');
  });

  it('accepts a substituted placeholder set', () => {
    const placeholders = new Set(['TODO']);
    expect(normalizeCredential('todo', placeholders)).toBe('');
    expect(normalizeCredential('CHANGE_ME', placeholders)).toBe('CHANGE_ME');
  });
});

describe('normalizeEndpoint', () => {
  it('strips trailing slashes and a trailing /v1', () => {
    expect(normalizeEndpoint('https://api.example.com/v1/')).toBe('https://api.example.com');
    expect(normalizeEndpoint('https://api.example.com//')).toBe('https://api.example.com');
    expect(normalizeEndpoint(' https://api.example.com/v1 ')).toBe('https://api.example.com');
  });

  it('keeps path prefixes other than /v1', () => {
    expect(normalizeEndpoint('https://gw.example.com/grok/')).toBe('https://gw.example.com/grok');
    expect(normalizeEndpoint('https://gw.example.com/v10')).toBe('https://gw.example.com/v10');
  });

  it('treats placeholders as missing, before and after canonicalization', () => {
    expect(normalizeEndpoint('https://your-grok-endpoint.example')).toBe('');
    expect(normalizeEndpoint('https://your-grok-endpoint.example/v1/')).toBe('');
    expect(normalizeEndpoint('your_base_url')).toBe('');
    expect(normalizeEndpoint('')).toBe('');
  });

  it('is idempotent', () => {
    const inputs = [
      'https://api.example.com/v1/v1/',
      'https://api.example.com/v1//',
      'https://api.example.com',
      '/v1',
      'REPLACE_ME',
      '  https://api.example.com/api/v1  ',
    ];
    for (const input of inputs) {
      const once = normalizeEndpoint(input);
      expect(normalizeEndpoint(once)).toBe(once);
    }
  });
});

describe('canonicalizeEndpoint', () => {
  it('repeats until stable', () => {
    expect(canonicalizeEndpoint('https://api.example.com/v1/v1/')).toBe('https://api.example.com');
    expect(canonicalizeEndpoint('/v1')).toBe('');
  });
});

describe('isPlaceholder', () => {
  it('compares case-insensitively after trimming', () => {
    expect(isPlaceholder(' replace_me ', new Set(['REPLACE_ME']))).toBe(true);
    expect(isPlaceholder('replace', new Set(['REPLACE_ME']))).toBe(false);
  });
});
