/**
 * Server configuration from environment variables (PORT, HOST, STATIC_DIR).
 * Missing or invalid values fall back to the defaults below.
 */

import path from 'path';

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_STATIC_DIR = 'static';

export interface ServerConfig {
  port: number;
  host: string;
  /** Absolute path of the directory served under /static */
  staticDir: string;
}

/**
 * Parses a TCP port.
 * - trims surrounding whitespace
 * - digits only, 1-65535
 * - anything else is null
 */
export function normalizePort(raw: string | undefined): number | null {
  if (raw == null) return null;
  const s = raw.trim();
  if (!/^\d+$/.test(s)) return null;
  const port = Number.parseInt(s, 10);
  if (port < 1 || port > 65535) return null;
  return port;
}

export function normalizeHost(raw: string | undefined): string | null {
  const s = raw?.trim() ?? '';
  return s.length > 0 ? s : null;
}

export function resolveStaticDir(raw: string | undefined, cwd: string = process.cwd()): string {
  const s = raw?.trim() ?? '';
  return path.resolve(cwd, s.length > 0 ? s : DEFAULT_STATIC_DIR);
}

export function getServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: normalizePort(env.PORT) ?? DEFAULT_PORT,
    host: normalizeHost(env.HOST) ?? DEFAULT_HOST,
    staticDir: resolveStaticDir(env.STATIC_DIR),
  };
}
