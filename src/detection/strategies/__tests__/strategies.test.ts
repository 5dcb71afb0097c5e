/**
 * Location Strategy Tests
 * Bus query, active window title and filesystem fallback against scripted tools
 */

import * as path from 'path';
import { DbusLocationStrategy, parseBusLocation } from '../DbusLocationStrategy';
import { ActiveWindowStrategy, looksLikeFileManagerTitle } from '../ActiveWindowStrategy';
import { FallbackStrategy } from '../FallbackStrategy';
import { PathValidator } from '../../../security/PathValidator';
import { ToolRunner } from '../../../environment/ToolRunner';
import { WindowQueryTool } from '../../../desktop/WindowQueryTool';
import { MessageBusTool } from '../../../desktop/MessageBusTool';
import { WindowPropertyTool } from '../../../desktop/WindowPropertyTool';
import { TitleExtractor } from '../../TitleExtractor';
import { FolderNameSearch } from '../../FolderNameSearch';
import { WindowPropertyScanner } from '../../WindowPropertyScanner';
import type { AuxiliaryTool } from '../../../types/index';
import {
  ScriptedCommandRunner,
  makeDirs,
  makeTempDir,
  removeDir,
  snapshotWith
} from '../../../__tests__/helpers/fixtures';

const BUS_QUERY =
  'gdbus call --session --dest org.gnome.Nautilus --object-path /org/gnome/Nautilus/window/1 ' +
  '--method org.freedesktop.DBus.Properties.Get org.gnome.Nautilus.Window location';

describe('Location strategies', () => {
  let home: string;
  let commands: ScriptedCommandRunner;
  let runner: ToolRunner;
  let windowQuery: WindowQueryTool;

  beforeEach(() => {
    home = makeTempDir('afl-strat-');
    commands = new ScriptedCommandRunner();
    runner = new ToolRunner(commands);
    windowQuery = new WindowQueryTool(runner, { toolTimeoutMs: 2000, focusTimeoutMs: 1000 });
  });

  afterEach(() => {
    removeDir(home);
  });

  describe('DbusLocationStrategy', () => {
    const createStrategy = (tools: Partial<Record<AuxiliaryTool, boolean>>): DbusLocationStrategy =>
      new DbusLocationStrategy({
        environment: snapshotWith(tools),
        windowQuery,
        messageBus: new MessageBusTool(runner, 2000),
        fileManagerClass: 'nautilus'
      });

    test('should parse the location property reply', () => {
      expect(parseBusLocation("(<'file:///home/user/My%20Files'>,)")).toBe('/home/user/My Files');
      expect(parseBusLocation('()')).toBeNull();
    });

    test('should skip when the bus or window tool is missing', async () => {
      const strategy = createStrategy({ windowQuery: true });

      await expect(strategy.detect()).resolves.toBeNull();
      expect(commands.calls).toHaveLength(0);
    });

    test('should return the location of the focused file manager window', async () => {
      const [work = ''] = makeDirs(home, 'my work');
      commands
        .respond('xdotool search --class nautilus', '100\n200')
        .respond('xdotool getwindowfocus', '200')
        .respond(BUS_QUERY, `(<'file://${path.join(home, 'my%20work')}'>,)`);

      await expect(createStrategy({ windowQuery: true, messageBus: true }).detect()).resolves.toBe(work);
    });

    test('should not query the bus when another window has focus', async () => {
      commands
        .respond('xdotool search --class nautilus', '100')
        .respond('xdotool getwindowfocus', '300');

      await expect(createStrategy({ windowQuery: true, messageBus: true }).detect()).resolves.toBeNull();
      expect(commands.calls.some(call => call.command === 'gdbus')).toBe(false);
    });

    test('should return null when no file manager window exists', async () => {
      await expect(createStrategy({ windowQuery: true, messageBus: true }).detect()).resolves.toBeNull();
      expect(commands.calls).toHaveLength(1);
    });

    test('should reject a location that is not an existing directory', async () => {
      commands
        .respond('xdotool search --class nautilus', '100')
        .respond('xdotool getwindowfocus', '100')
        .respond(BUS_QUERY, `(<'file://${path.join(home, 'missing')}'>,)`);

      await expect(createStrategy({ windowQuery: true, messageBus: true }).detect()).resolves.toBeNull();
    });
  });

  describe('looksLikeFileManagerTitle', () => {
    test('should accept the application keyword', () => {
      expect(looksLikeFileManagerTitle('work - Nautilus')).toBe(true);
      expect(looksLikeFileManagerTitle('work - Thunar', 'thunar')).toBe(true);
    });

    test('should accept titles that are absolute paths', () => {
      expect(looksLikeFileManagerTitle('/srv/projects')).toBe(true);
    });

    test('should accept known folder names in either language', () => {
      expect(looksLikeFileManagerTitle('Documentos')).toBe(true);
      expect(looksLikeFileManagerTitle('Música')).toBe(true);
      expect(looksLikeFileManagerTitle('Desktop')).toBe(true);
    });

    test('should reject other application titles', () => {
      expect(looksLikeFileManagerTitle('README.md - Visual Studio Code')).toBe(false);
      expect(looksLikeFileManagerTitle('   ')).toBe(false);
    });
  });

  describe('ActiveWindowStrategy', () => {
    const createStrategy = (tools: Partial<Record<AuxiliaryTool, boolean>>): ActiveWindowStrategy => {
      const folderSearch = new FolderNameSearch({ homeDirectory: home });
      return new ActiveWindowStrategy({
        environment: snapshotWith(tools),
        windowQuery,
        titleExtractor: new TitleExtractor({ homeDirectory: home, folderSearch }),
        propertyScanner: new WindowPropertyScanner(new WindowPropertyTool(runner, 2000)),
        fileManagerClass: 'nautilus'
      });
    };

    test('should skip without the window-query tool', async () => {
      await expect(createStrategy({}).detect()).resolves.toBeNull();
      expect(commands.calls).toHaveLength(0);
    });

    test('should turn a file manager title into a directory', async () => {
      const [documents] = makeDirs(home, 'Documents');
      commands
        .respond('xdotool getactivewindow', '7')
        .respond('xdotool getwindowname 7', 'Documentos');

      await expect(createStrategy({ windowQuery: true }).detect()).resolves.toBe(documents);
    });

    test('should ignore windows that do not look like a file manager', async () => {
      makeDirs(home, 'Projects');
      commands
        .respond('xdotool getactivewindow', '7')
        .respond('xdotool getwindowname 7', 'Projects');

      await expect(createStrategy({ windowQuery: true }).detect()).resolves.toBeNull();
    });

    test('should fall back to the window properties', async () => {
      const [work] = makeDirs(home, 'work');
      commands
        .respond('xdotool getactivewindow', '7')
        .respond('xdotool getwindowname 7', 'Nautilus')
        .respond('xprop -id 7 WM_NAME _NET_WM_NAME', `_NET_WM_NAME(UTF8_STRING) = "${work}"`);

      await expect(createStrategy({ windowQuery: true, windowProperty: true }).detect()).resolves.toBe(work);
    });

    test('should not read properties when xprop is unavailable', async () => {
      commands
        .respond('xdotool getactivewindow', '7')
        .respond('xdotool getwindowname 7', 'Nautilus');

      await expect(createStrategy({ windowQuery: true }).detect()).resolves.toBeNull();
      expect(commands.calls.some(call => call.command === 'xprop')).toBe(false);
    });
  });

  describe('FallbackStrategy', () => {
    test('should prefer the working directory', async () => {
      const [cwd] = makeDirs(home, 'cwd');
      const strategy = new FallbackStrategy({ homeDirectory: home, getWorkingDirectory: () => cwd ?? '' });

      await expect(strategy.detect()).resolves.toBe(cwd);
    });

    test('should try localized special folders before home', async () => {
      const [escritorio] = makeDirs(home, 'Escritorio', 'Documents');
      const strategy = new FallbackStrategy({
        homeDirectory: home,
        getWorkingDirectory: () => '/',
        isUsable: candidate => candidate !== '/' && PathValidator.isExistingDirectory(candidate)
      });

      await expect(strategy.detect()).resolves.toBe(escritorio);
    });

    test('should fall back to home', async () => {
      const strategy = new FallbackStrategy({
        homeDirectory: home,
        getWorkingDirectory: () => {
          throw new Error('ENOENT: working directory removed');
        }
      });

      await expect(strategy.detect()).resolves.toBe(home);
    });

    test('should return null when nothing exists', async () => {
      const gone = path.join(home, 'gone');
      const strategy = new FallbackStrategy({ homeDirectory: gone, getWorkingDirectory: () => path.join(gone, 'cwd') });

      await expect(strategy.detect()).resolves.toBeNull();
    });

    test('should list candidates in priority order', () => {
      const strategy = new FallbackStrategy({ homeDirectory: '/home/user', getWorkingDirectory: () => '/work' });

      expect(strategy.candidates()).toEqual([
        '/work',
        '/home/user/Desktop',
        '/home/user/Escritorio',
        '/home/user/Documents',
        '/home/user/Documentos',
        '/home/user'
      ]);
    });
  });
});
