/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { defineConfig, loadConfig, DEFAULT_SESSION_FILE } from '../config';
import { ValidationError } from '../types/errors';

describe('loadConfig', () => {
  it('should apply defaults for everything but the client id', () => {
    const config = loadConfig({ PLAYDECK_CLIENT_ID: 'test-client' });

    expect(config.clientId).toBe('test-client');
    expect(config.apiUrl).toBe('https://api.spotify.com/v1');
    expect(config.sessionFile).toBe(DEFAULT_SESSION_FILE);
    expect(config.pollFastMs).toBe(1000);
    expect(config.pollSlowMs).toBe(5000);
    expect(config.queueCapacity).toBe(32);
    expect(config.keys.togglePlayback).toBe(' ');
  });

  it('should read numbers from strings', () => {
    const config = loadConfig({
      PLAYDECK_CLIENT_ID: 'test-client',
      PLAYDECK_POLL_FAST_MS: '500',
      PLAYDECK_SESSION_FILE: '/tmp/session.json',
    });

    expect(config.pollFastMs).toBe(500);
    expect(config.sessionFile).toBe('/tmp/session.json');
  });

  it('should require a client id', () => {
    expect(() => loadConfig({})).toThrow(ValidationError);
  });

  it('should reject intervals below the minimum', () => {
    const env = { PLAYDECK_CLIENT_ID: 'test-client', PLAYDECK_POLL_FAST_MS: '10' };
    expect(() => loadConfig(env)).toThrow('Validation failed for configuration: pollFastMs');
  });

  it('should read key bindings from PLAYDECK_KEYS', () => {
    const config = loadConfig({
      PLAYDECK_CLIENT_ID: 'test-client',
      PLAYDECK_KEYS: '{"shuffle":"x","logout":"Q"}',
    });

    expect(config.keys.shuffle).toBe('x');
    expect(config.keys.logout).toBe('Q');
    expect(config.keys.repeat).toBe('r');
  });

  it('should reject PLAYDECK_KEYS that is not JSON', () => {
    const env = { PLAYDECK_CLIENT_ID: 'test-client', PLAYDECK_KEYS: '{shuffle' };
    expect(() => loadConfig(env)).toThrow(
      'Validation failed for PLAYDECK_KEYS: Expected a JSON object'
    );
  });

  it('should reject a binding that is not a string', () => {
    const env = { PLAYDECK_CLIENT_ID: 'test-client', PLAYDECK_KEYS: '{"shuffle":1}' };
    expect(() => loadConfig(env)).toThrow('Validation failed for PLAYDECK_KEYS: shuffle');
  });
});

describe('defineConfig', () => {
  it('should merge overrides over the defaults', () => {
    const config = defineConfig({ volumeStep: 5, keys: { shuffle: 'x' } });

    expect(config.clientId).toBe('playdeck');
    expect(config.volumeStep).toBe(5);
    expect(config.keys.shuffle).toBe('x');
    expect(config.keys.repeat).toBe('r');
  });
});
