import { loadConfig } from '../../src/config/env';

describe('loadConfig', () => {
  test('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      maxUploadBytes: 5 * 1024 * 1024,
      parseOptions: { strictVersion: false }
    });
  });

  test('should read overrides from the environment', () => {
    expect(
      loadConfig({ PORT: '8080', MAX_UPLOAD_BYTES: '2048', OPML_MAX_DEPTH: '64', OPML_STRICT_VERSION: 'true' })
    ).toEqual({
      port: 8080,
      maxUploadBytes: 2048,
      parseOptions: { strictVersion: true, maxDepth: 64 }
    });
  });

  test('should reject values that are not integers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('Expected a non-negative integer, got "abc"');
  });

  test('should reject numbers with trailing characters', () => {
    expect(() => loadConfig({ MAX_UPLOAD_BYTES: '12abc' })).toThrow('Expected a non-negative integer, got "12abc"');
    expect(() => loadConfig({ PORT: '1.5' })).toThrow('Expected a non-negative integer, got "1.5"');
  });

  test('should refuse a zero outline depth', () => {
    expect(() => loadConfig({ OPML_MAX_DEPTH: '0' })).toThrow('Expected a positive integer, got "0"');
  });

  test('should treat a blank outline depth as unlimited', () => {
    expect(loadConfig({ OPML_MAX_DEPTH: '  ' }).parseOptions).toEqual({ strictVersion: false });
  });
});
