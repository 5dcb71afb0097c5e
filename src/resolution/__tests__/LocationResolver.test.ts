/**
 * LocationResolver Tests
 * Priority order, validation of candidates, timeouts and attempt records
 */

import * as path from 'path';
import { LocationResolver } from '../LocationResolver';
import { PathValidator } from '../../security/PathValidator';
import type { LocationStrategy } from '../../types/index';
import { makeDirs, makeTempDir, removeDir } from '../../__tests__/helpers/fixtures';

function fixedStrategy(name: string, result: string | null): LocationStrategy & { detect: jest.Mock } {
  return { name, detect: jest.fn(async () => result) };
}

describe('LocationResolver', () => {
  let home: string;
  let work: string;
  let validator: PathValidator;

  beforeEach(() => {
    home = makeTempDir('afl-resolve-');
    [work = ''] = makeDirs(home, 'work');
    validator = new PathValidator({ homeDirectory: home, allowedRoots: [home] });
  });

  afterEach(() => {
    removeDir(home);
  });

  test('should stop at the first strategy that yields a valid directory', async () => {
    const bus = fixedStrategy('dbus', null);
    const active = fixedStrategy('active-window', work);
    const fallback = fixedStrategy('fallback', home);
    const resolver = new LocationResolver([bus, active, fallback], validator);

    const directory = await resolver.resolve();

    expect(directory?.path).toBe(work);
    expect(fallback.detect).not.toHaveBeenCalled();
    expect(resolver.getLastAttempts().map(attempt => attempt.outcome)).toEqual([
      { status: 'not_found' },
      { status: 'found', path: work }
    ]);
  });

  test('should reject candidates that fail validation and continue', async () => {
    const resolver = new LocationResolver(
      [fixedStrategy('dbus', '/etc'), fixedStrategy('fallback', home)],
      validator
    );

    const report = await resolver.resolveWithDiagnostics();

    expect(report.directory?.path).toBe(home);
    expect(report.attempts[0]?.outcome).toEqual({
      status: 'error',
      reason: 'InvalidPath: Access to system directory not allowed: /etc'
    });
  });

  test('should record a strategy that throws and move on', async () => {
    const failing: LocationStrategy = {
      name: 'dbus',
      detect: async () => {
        throw new Error('bus exploded');
      }
    };
    const resolver = new LocationResolver([failing, fixedStrategy('fallback', home)], validator);

    const report = await resolver.resolveWithDiagnostics();

    expect(report.directory?.path).toBe(home);
    expect(report.attempts[0]?.outcome).toEqual({ status: 'error', reason: 'bus exploded' });
  });

  test('should time out a strategy that never answers', async () => {
    const hung: LocationStrategy = { name: 'dbus', detect: () => new Promise<string | null>(() => undefined) };
    const resolver = new LocationResolver([hung, fixedStrategy('fallback', home)], validator, { strategyTimeoutMs: 20 });

    const report = await resolver.resolveWithDiagnostics();

    expect(report.directory?.path).toBe(home);
    expect(report.attempts[0]?.outcome).toEqual({ status: 'error', reason: 'Strategy dbus exceeded 20ms' });
  });

  test('should return null when every strategy fails', async () => {
    const resolver = new LocationResolver(
      [fixedStrategy('dbus', null), fixedStrategy('active-window', null), fixedStrategy('fallback', path.join(home, 'gone'))],
      validator
    );

    const report = await resolver.resolveWithDiagnostics();

    expect(report.directory).toBeNull();
    expect(report.attempts.map(attempt => attempt.strategy)).toEqual(['dbus', 'active-window', 'fallback']);
    expect(report.attempts[2]?.outcome).toEqual({ status: 'error', reason: 'InvalidPath: Path does not exist: ENOENT' });
  });

  test('should measure elapsed time with the injected clock', async () => {
    let now = 0;
    const clock = (): number => {
      now += 5;
      return now;
    };
    const resolver = new LocationResolver([fixedStrategy('fallback', home)], validator, { clock });

    const report = await resolver.resolveWithDiagnostics();

    expect(report.attempts[0]?.elapsedMs).toBe(5);
  });

  test('should expose its strategy order', () => {
    const resolver = new LocationResolver(
      [fixedStrategy('dbus', null), fixedStrategy('active-window', null), fixedStrategy('fallback', null)],
      validator
    );

    expect(resolver.getStrategyNames()).toEqual(['dbus', 'active-window', 'fallback']);
  });
});
