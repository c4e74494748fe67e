import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfigFromEnv, parseListenAddress, resolveModelProfile } from '../../src/config/index.js';
import { parseArgs } from '../../src/config/cli-args.js';
import { ConfigurationError } from '../../src/utils/errors.js';
import { MODEM_MODELS } from '../../src/types/modem-models.js';

describe('loadConfigFromEnv', () => {
  it('should apply defaults', () => {
    const config = loadConfigFromEnv({ MODEM_PASSWORD: 'test-password' });

    expect(config).toEqual({
      modem: {
        host: '192.168.100.1',
        username: 'admin',
        password: 'test-password',
        model: 'sb8200',
        profilePath: undefined,
        verifyTls: false,
        requestTimeoutMs: 10000,
      },
      web: { listenAddress: ':9143', telemetryPath: '/metrics' },
      metrics: { namespace: 'sb8200' },
      logging: { level: 'info' },
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfigFromEnv({
      MODEM_HOST: '10.0.0.1',
      MODEM_USER: 'technician',
      MODEM_PASSWORD: 'test-password',
      MODEM_VERIFY_TLS: 'true',
      MODEM_REQUEST_TIMEOUT_MS: '2500',
      WEB_LISTEN_ADDRESS: '127.0.0.1:9200',
      WEB_TELEMETRY_PATH: '/probe',
      METRICS_NAMESPACE: 'cable_modem',
      LOG_LEVEL: 'debug',
    });

    expect(config.modem.host).toBe('10.0.0.1');
    expect(config.modem.username).toBe('technician');
    expect(config.modem.verifyTls).toBe(true);
    expect(config.modem.requestTimeoutMs).toBe(2500);
    expect(config.web).toEqual({ listenAddress: '127.0.0.1:9200', telemetryPath: '/probe' });
    expect(config.metrics.namespace).toBe('cable_modem');
    expect(config.logging.level).toBe('debug');
  });

  it('should require a password', () => {
    expect(() => loadConfigFromEnv({})).toThrow(ConfigurationError);
    expect(() => loadConfigFromEnv({})).toThrow('modem.password: MODEM_PASSWORD is required');
  });

  it('should reject invalid values', () => {
    expect(() => loadConfigFromEnv({ MODEM_PASSWORD: 'x', MODEM_REQUEST_TIMEOUT_MS: 'soon' })).toThrow(
      ConfigurationError
    );
    expect(() => loadConfigFromEnv({ MODEM_PASSWORD: 'x', MODEM_MODEL: 'unknown' })).toThrow(ConfigurationError);
    expect(() => loadConfigFromEnv({ MODEM_PASSWORD: 'x', LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
  });
});

describe('resolveModelProfile', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should return the built-in profile by default', () => {
    const { modem } = loadConfigFromEnv({ MODEM_PASSWORD: 'x' });

    expect(resolveModelProfile(modem)).toBe(MODEM_MODELS.sb8200);
  });

  it('should load a profile override from JSON', () => {
    dir = mkdtempSync(join(tmpdir(), 'modem-profile-'));
    const path = join(dir, 'profile.json');
    const variant = {
      ...MODEM_MODELS.sb8200,
      model: 'SB8200 variant',
      infoPage: { ...MODEM_MODELS.sb8200.infoPage, path: '/swinfo.html' },
    };
    writeFileSync(path, JSON.stringify(variant));

    const { modem } = loadConfigFromEnv({ MODEM_PASSWORD: 'x', MODEM_PROFILE_PATH: path });
    const profile = resolveModelProfile(modem);

    expect(profile.model).toBe('SB8200 variant');
    expect(profile.infoPage.path).toBe('/swinfo.html');
  });

  it('should reject an unreadable or invalid profile', () => {
    dir = mkdtempSync(join(tmpdir(), 'modem-profile-'));
    const path = join(dir, 'profile.json');
    writeFileSync(path, JSON.stringify({ model: 'broken' }));

    const { modem } = loadConfigFromEnv({ MODEM_PASSWORD: 'x', MODEM_PROFILE_PATH: path });
    expect(() => resolveModelProfile(modem)).toThrow(ConfigurationError);

    const missing = { ...modem, profilePath: join(dir, 'missing.json') };
    expect(() => resolveModelProfile(missing)).toThrow(/Cannot read modem profile/);
  });
});

describe('parseListenAddress', () => {
  it('should parse port-only and host:port forms', () => {
    expect(parseListenAddress(':9143')).toEqual({ host: undefined, port: 9143 });
    expect(parseListenAddress('0.0.0.0:9143')).toEqual({ host: '0.0.0.0', port: 9143 });
    expect(parseListenAddress('[::1]:9143')).toEqual({ host: '::1', port: 9143 });
  });

  it('should reject addresses without a valid port', () => {
    expect(() => parseListenAddress('localhost')).toThrow(ConfigurationError);
    expect(() => parseListenAddress(':http')).toThrow(ConfigurationError);
    expect(() => parseListenAddress(':70000')).toThrow(ConfigurationError);
  });
});

describe('parseArgs', () => {
  it('should default to serve', () => {
    expect(parseArgs([])).toEqual({ command: 'serve' });
  });

  it('should read flags in both forms', () => {
    expect(parseArgs(['serve', '--web.listen-address=:9200', '--web.telemetry-path', '/probe'])).toEqual({
      command: 'serve',
      listenAddress: ':9200',
      telemetryPath: '/probe',
    });
  });

  it('should recognise scrape and help', () => {
    expect(parseArgs(['scrape']).command).toBe('scrape');
    expect(parseArgs(['--help']).command).toBe('help');
  });

  it('should reject unknown arguments and missing values', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown argument: --verbose');
    expect(() => parseArgs(['--web.telemetry-path'])).toThrow('Missing value for --web.telemetry-path');
  });
});
