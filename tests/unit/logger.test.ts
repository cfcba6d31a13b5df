/**
 * Logger configuration tests (electron-log is the mock from tests/setup.ts).
 */

import { describe, it, expect, afterEach } from 'vitest';
import log from 'electron-log/node';
import { configureLogging, createLogger, getVoxrelayHome } from '../../src/main/logger';

describe('configureLogging', () => {
  it('shows warnings by default and everything when verbose', () => {
    configureLogging({ file: false });
    expect(log.transports.console.level).toBe('warn');
    expect(log.transports.file.level).toBe(false);

    configureLogging({ verbose: true });
    expect(log.transports.console.level).toBe('debug');
  });

  it('hands out scoped loggers', () => {
    createLogger('Orchestrator');

    expect(log.scope).toHaveBeenCalledWith('Orchestrator');
  });
});

describe('getVoxrelayHome', () => {
  const original = process.env.VOXRELAY_HOME;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.VOXRELAY_HOME;
    } else {
      process.env.VOXRELAY_HOME = original;
    }
  });

  it('prefers VOXRELAY_HOME', () => {
    process.env.VOXRELAY_HOME = '/tmp/voxrelay-home';

    expect(getVoxrelayHome()).toBe('/tmp/voxrelay-home');
  });
});
