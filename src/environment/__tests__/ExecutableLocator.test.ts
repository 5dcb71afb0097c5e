/**
 * ExecutableLocator Tests
 */

import * as fs from 'fs';
import * as path from 'path';
import { ExecutableLocator } from '../ExecutableLocator';
import { makeDirs, makeTempDir, removeDir, writeExecutable } from '../../__tests__/helpers/fixtures';

describe('ExecutableLocator', () => {
  let base: string;
  let first: string;
  let second: string;

  beforeEach(() => {
    base = makeTempDir('afl-path-');
    [first = '', second = ''] = makeDirs(base, 'first', 'second');
  });

  afterEach(() => {
    removeDir(base);
  });

  test('should return the first executable match in PATH order', () => {
    writeExecutable(first, 'tool');
    writeExecutable(second, 'tool');

    const locator = new ExecutableLocator([first, second].join(path.delimiter));

    expect(locator.which('tool')).toBe(path.join(first, 'tool'));
  });

  test('should skip files without execute permission', () => {
    writeExecutable(first, 'tool', 0o644);
    writeExecutable(second, 'tool');

    const locator = new ExecutableLocator([first, second].join(path.delimiter));

    expect(locator.which('tool')).toBe(path.join(second, 'tool'));
  });

  test('should return null for names containing a separator', () => {
    writeExecutable(first, 'tool');
    const locator = new ExecutableLocator(base);

    expect(locator.which('first/tool')).toBeNull();
  });

  test('should ignore relative and empty PATH entries', () => {
    const locator = new ExecutableLocator(['', 'relative/bin', first].join(path.delimiter));

    expect(locator.getSearchDirectories()).toEqual([first]);
  });

  test('should memoize lookups for the lifetime of the locator', () => {
    const tool = writeExecutable(first, 'tool');
    const locator = new ExecutableLocator(first);

    expect(locator.which('tool')).toBe(tool);
    fs.rmSync(tool);
    expect(locator.which('tool')).toBe(tool);
    expect(locator.isAvailable('tool')).toBe(true);
  });

  test('should memoize misses as well', () => {
    const locator = new ExecutableLocator(first);

    expect(locator.isAvailable('tool')).toBe(false);
    writeExecutable(first, 'tool');
    expect(locator.isAvailable('tool')).toBe(false);
  });

  test('should not treat directories as executables', () => {
    expect(ExecutableLocator.isExecutableFile(first)).toBe(false);
  });
});
