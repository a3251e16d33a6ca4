/**
 * Configuration Tests
 *
 * Environment loading, production detection and production-only validation.
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigValidationError,
  configSchema,
  isProduction,
  loadFromEnvironment,
  validateConfig,
  type Config,
} from '../../src/config';

function configFor(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse(loadFromEnvironment(env));
}

describe('loadFromEnvironment', () => {
  it('should fall back to schema defaults for unset variables', () => {
    const config = configFor({});

    expect(config.server.nodeEnv).toBe('development');
    expect(config.scaffolding.multipleChoiceOptions).toBe(4);
    expect(config.session.ttlMinutes).toBe(30);
  });

  it('should ignore an unknown NODE_ENV', () => {
    expect(configFor({ NODE_ENV: 'staging' }).server.nodeEnv).toBe('development');
  });
});

describe('isProduction', () => {
  it('should be true only for NODE_ENV=production', () => {
    expect(isProduction(configFor({ NODE_ENV: 'production' }))).toBe(true);
    expect(isProduction(configFor({ NODE_ENV: 'development' }))).toBe(false);
    expect(isProduction(configFor({ NODE_ENV: 'test' }))).toBe(false);
  });
});

describe('validateConfig', () => {
  it('should require an API key in production', () => {
    const config = configFor({ NODE_ENV: 'production' });

    expect(() => validateConfig(config)).toThrow(ConfigValidationError);
    try {
      validateConfig(config);
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.missingVars).toEqual(['ANTHROPIC_API_KEY']);
      }
    }
  });

  it('should accept production with an API key', () => {
    expect(() => validateConfig(configFor({ NODE_ENV: 'production', ANTHROPIC_API_KEY: 'test-secret' }))).not.toThrow();
  });

  it('should accept development without an API key', () => {
    expect(() => validateConfig(configFor({ NODE_ENV: 'development' }))).not.toThrow();
  });
});
