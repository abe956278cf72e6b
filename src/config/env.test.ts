import path from 'path';
import { describe, it, expect } from 'vitest';
import { parseEnv } from './env.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const config = parseEnv({});

    expect(config).toMatchObject({
      nodeEnv: 'development',
      port: 8000,
      host: '0.0.0.0',
      logLevel: 'info',
      httpLogFormat: 'dev',
      corsOrigins: []
    });
    expect(config.logDir).toBeUndefined();
    expect(path.basename(config.staticDir)).toBe('static');
  });

  it('coerces the port and splits CORS origins', () => {
    const config = parseEnv({
      PORT: '3001',
      CORS_ORIGINS: 'http://localhost:3000, http://localhost:5173,,'
    });

    expect(config.port).toBe(3001);
    expect(config.corsOrigins).toEqual(['http://localhost:3000', 'http://localhost:5173']);
  });

  it('resolves STATIC_DIR to an absolute path', () => {
    const config = parseEnv({ STATIC_DIR: 'public' });

    expect(config.staticDir).toBe(path.resolve('public'));
  });

  it('rejects an invalid port', () => {
    expect(() => parseEnv({ PORT: 'eighty' })).toThrow('Invalid environment configuration: PORT');
  });

  it('rejects an unknown log level', () => {
    expect(() => parseEnv({ LOG_LEVEL: 'loud' })).toThrow('LOG_LEVEL');
  });
});
