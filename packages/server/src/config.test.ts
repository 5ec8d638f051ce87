import { describe, expect, it } from 'vitest';
import path from 'path';
import { envVarName, loadConfig } from './config';
import { isStringLosslesslyNumeric, processEnv, serverPackageDir } from './envLoader';

describe('envVarName', () => {
  it('derives SNAKE_CASE names from the config path', () => {
    expect(envVarName(['server', 'port'])).toBe('SERVER_PORT');
    expect(envVarName(['mediaServer', 'friendlyName'])).toBe('MEDIA_SERVER_FRIENDLY_NAME');
    expect(envVarName(['events', 'defaultTimeoutSec'])).toBe('EVENTS_DEFAULT_TIMEOUT_SEC');
  });
});

describe('processEnv', () => {
  it('turns numeric strings into numbers', () => {
    expect(processEnv({ A: '42', B: '1.0', C: 'abc', D: '' })).toEqual({ A: 42, B: 1, C: 'abc', D: '' });
    expect(isStringLosslesslyNumeric('  ')).toBe(false);
  });
});

describe('loadConfig', () => {
  it('uses the defaults when nothing is set', () => {
    const config = loadConfig({});
    expect(config.server).toEqual({ port: 9000, host: '0.0.0.0' });
    expect(config.mediaServer).toEqual({ friendlyName: 'UPnP Media Directory', publicUrl: '' });
    expect(config.library).toEqual({
      file: path.join(serverPackageDir, 'data', 'sample-library.json'),
      browseAgeLimit: 100,
    });
    expect(config.events).toEqual({ defaultTimeoutSec: 1800, notifyTimeoutMs: 5000, sweepIntervalMs: 60000 });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(processEnv({
      SERVER_PORT: '8200',
      MEDIA_SERVER_FRIENDLY_NAME: 'Living Room',
      LIBRARY_BROWSE_AGE_LIMIT: '50',
      LIBRARY_FILE: '/srv/music/library.json',
    }));
    expect(config.server.port).toBe(8200);
    expect(config.mediaServer.friendlyName).toBe('Living Room');
    expect(config.library).toEqual({ file: path.resolve('/srv/music/library.json'), browseAgeLimit: 50 });
  });

  it('ignores a non numeric value for a numeric setting', () => {
    expect(loadConfig({ SERVER_PORT: 'eighty' }).server.port).toBe(9000);
  });
});
