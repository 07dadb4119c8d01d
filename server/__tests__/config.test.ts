import path from 'path';
import { describe, it, expect } from 'vitest';
import { getServerConfig, normalizeHost, normalizePort, resolveStaticDir } from '../config';

describe('normalizePort', () => {
  it('parses a port with surrounding whitespace', () => {
    expect(normalizePort('8080')).toBe(8080);
    expect(normalizePort(' 3000 ')).toBe(3000);
  });

  it('returns null for missing or invalid values', () => {
    expect(normalizePort(undefined)).toBeNull();
    expect(normalizePort('')).toBeNull();
    expect(normalizePort('abc')).toBeNull();
    expect(normalizePort('80.5')).toBeNull();
    expect(normalizePort('0')).toBeNull();
    expect(normalizePort('65536')).toBeNull();
  });
});

describe('normalizeHost', () => {
  it('trims and rejects empty values', () => {
    expect(normalizeHost(' 127.0.0.1 ')).toBe('127.0.0.1');
    expect(normalizeHost('   ')).toBeNull();
    expect(normalizeHost(undefined)).toBeNull();
  });
});

describe('resolveStaticDir', () => {
  it('resolves relative paths against cwd', () => {
    expect(resolveStaticDir('public', '/srv/app')).toBe(path.resolve('/srv/app', 'public'));
  });

  it('keeps absolute paths', () => {
    expect(resolveStaticDir('/var/www', '/srv/app')).toBe(path.resolve('/var/www'));
  });

  it('defaults to ./static', () => {
    expect(resolveStaticDir('', '/srv/app')).toBe(path.resolve('/srv/app', 'static'));
  });
});

describe('getServerConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(getServerConfig({})).toEqual({
      port: 8000,
      host: '0.0.0.0',
      staticDir: path.resolve(process.cwd(), 'static'),
    });
  });

  it('reads PORT, HOST and STATIC_DIR', () => {
    expect(getServerConfig({ PORT: '9000', HOST: ' localhost ', STATIC_DIR: 'public' })).toEqual({
      port: 9000,
      host: 'localhost',
      staticDir: path.resolve(process.cwd(), 'public'),
    });
  });

  it('falls back to the default port when PORT is invalid', () => {
    expect(getServerConfig({ PORT: 'eighty' }).port).toBe(8000);
  });
});
