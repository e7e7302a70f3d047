import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { InvalidInputError } from '../src/exceptions.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      crypto: { secretKey: 'dev-secret-key', fileKey: undefined },
      storage: { recordStoreUrl: 'memory://', blobStoreUrl: 'file:uploads' },
      handleBytes: 6,
      server: { port: 5000, publicUrl: undefined },
      logLevel: 'info',
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      SECRET_KEY: 'test-secret',
      FILE_KEY: 'test-file-key',
      RECORD_STORE_URL: 'redis://localhost:6379/0',
      BLOB_STORE_URL: 'file:///var/lib/links',
      HANDLE_BYTES: '9',
      PORT: '8080',
      PUBLIC_URL: 'https://links.example.test',
      LOG_LEVEL: 'warn',
    });

    expect(config).toEqual({
      crypto: { secretKey: 'test-secret', fileKey: 'test-file-key' },
      storage: { recordStoreUrl: 'redis://localhost:6379/0', blobStoreUrl: 'file:///var/lib/links' },
      handleBytes: 9,
      server: { port: 8080, publicUrl: 'https://links.example.test' },
      logLevel: 'warn',
    });
  });

  it('should treat empty strings as unset', () => {
    const config = loadConfig({ FILE_KEY: '', PORT: '  ' });

    expect(config.crypto.fileKey).toBeUndefined();
    expect(config.server.port).toBe(5000);
  });

  it('should reject invalid numbers', () => {
    expect(() => loadConfig({ HANDLE_BYTES: 'many' })).toThrow(InvalidInputError);
    expect(() => loadConfig({ PORT: '70000' })).toThrow(/Invalid configuration for PORT/);
  });

  it('should reject unknown log levels', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});
