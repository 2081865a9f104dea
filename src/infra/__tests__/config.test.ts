import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  const base = { DATABASE_URL: 'postgres://localhost/test', JWT_SECRET: 'test-secret' };

  it('should apply defaults', () => {
    expect(loadConfig(base)).toEqual({
      databaseUrl: 'postgres://localhost/test',
      jwtSecret: 'test-secret',
      jwtExpiresInSeconds: 604800,
      port: 3000,
    });
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({ ...base, PORT: '8080', JWT_EXPIRES_IN_SECONDS: '900' });

    expect(config.port).toBe(8080);
    expect(config.jwtExpiresInSeconds).toBe(900);
  });

  it('should list every missing variable', () => {
    expect(() => loadConfig({})).toThrow(
      'Invalid configuration: DATABASE_URL: Required; JWT_SECRET: Required'
    );
  });

  it('should reject a non-numeric port', () => {
    expect(() => loadConfig({ ...base, PORT: 'http' })).toThrow(/^Invalid configuration: PORT: /);
  });
});
