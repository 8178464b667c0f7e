/**
 * Tests for scheme decomposition.
 */

import { parseScheme, schemeTokens } from '../index';

describe('parseScheme', () => {
  it('should decompose a bare smtp scheme', () => {
    expect(parseScheme('smtp')).toStrictEqual({ scheme: 'smtp', tls: false, insecure: false });
  });

  it('should flag implicit TLS for smtps', () => {
    expect(parseScheme('smtps').tls).toBe(true);
    expect(parseScheme('smtps+login').tls).toBe(true);
  });

  it('should take the first non-reserved modifier as auth', () => {
    expect(parseScheme('smtps+insecure+login+plain')).toStrictEqual({
      scheme: 'smtps+insecure+login+plain',
      tls: true,
      insecure: true,
      auth: 'login',
    });
  });

  it('should find insecure in any position', () => {
    const parts = parseScheme('smtp+login+insecure');

    expect(parts.insecure).toBe(true);
    expect(parts.auth).toBe('login');
  });

  it('should match insecure as a whole token only', () => {
    const parts = parseScheme('smtp+insecurely');

    expect(parts.insecure).toBe(false);
    expect(parts.auth).toBe('insecurely');
  });

  it('should accept custom auth tokens', () => {
    expect(parseScheme('smtp+xoauth2').auth).toBe('xoauth2');
  });

  it('should leave auth absent without modifiers', () => {
    expect(parseScheme('smtp+insecure').auth).toBeUndefined();
  });
});

describe('schemeTokens', () => {
  it('should split on +', () => {
    expect(schemeTokens('smtp+insecure+login')).toEqual(['smtp', 'insecure', 'login']);
  });
});
