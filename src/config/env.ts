import { ParseOptions } from '../parsers/opmlParser';

export interface ServerConfig {
  port: number;
  /** Largest accepted upload, in bytes. */
  maxUploadBytes: number;
  parseOptions: ParseOptions;
}

function isUnset(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

function intFromEnv(value: string | undefined, fallback: number, minimum = 0): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const digits = value.trim();
  if (!/^\d+$/.test(digits) || Number(digits) < minimum) {
    const expected = minimum > 0 ? 'a positive integer' : 'a non-negative integer';
    throw new Error(`Expected ${expected}, got "${value}"`);
  }
  return Number(digits);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parseOptions: ParseOptions = {
    strictVersion: env.OPML_STRICT_VERSION === 'true',
  };
  if (!isUnset(env.OPML_MAX_DEPTH)) {
    parseOptions.maxDepth = intFromEnv(env.OPML_MAX_DEPTH, 0, 1);
  }

  return {
    port: intFromEnv(env.PORT, 3000),
    maxUploadBytes: intFromEnv(env.MAX_UPLOAD_BYTES, 5 * 1024 * 1024),
    parseOptions,
  };
}
