/**
 * OpenActiveFolderTool Tests
 */

import * as path from 'path';
import { OpenActiveFolderTool } from '../OpenActiveFolderTool';
import { createLauncherHarness, textOf } from '../../__tests__/helpers/launcherHarness';
import type { LauncherHarness } from '../../__tests__/helpers/launcherHarness';

describe('OpenActiveFolderTool', () => {
  let harness: LauncherHarness;
  let tool: OpenActiveFolderTool;

  beforeEach(() => {
    harness = createLauncherHarness();
    tool = new OpenActiveFolderTool(harness.editorLauncher);
  });

  afterEach(() => {
    harness.cleanup();
  });

  test('should have correct tool name', () => {
    expect(tool.name).toBe('open_active_folder');
    expect(tool.jsonSchema.required).toBeUndefined();
  });

  test('should open the detected folder with the configured editor', async () => {
    const text = textOf(await tool.handler(undefined));

    expect(text).toBe(`Opened ${harness.work} with ${path.join(harness.binDir, 'code')} (pid 4242)`);
    expect(harness.processLauncher.launches).toEqual([
      { command: path.join(harness.binDir, 'code'), directory: harness.work }
    ]);
  });

  test('should use an editor given in the arguments', async () => {
    const text = textOf(await tool.handler({ editor: 'codium' }));

    expect(text).toBe(`Opened ${harness.work} with ${path.join(harness.binDir, 'codium')} (pid 4242)`);
    expect(harness.settings.saved).toEqual([]);
  });

  test('should describe a fallback and the saved setting', async () => {
    harness.processLauncher.outcomes = { code: { success: false, reason: 'not_found', message: 'spawn ENOENT' } };

    const text = textOf(await tool.handler({}));

    expect(text).toBe([
      `Opened ${harness.work} with ${path.join(harness.binDir, 'codium')} (pid 4242)`,
      'Could not start code: not_found',
      'Fallback editor used: codium',
      'Editor setting updated for future launches'
    ].join('\n'));
    expect(harness.settings.getEditorCommand()).toBe('codium');
  });

  test('should say when the fallback could not be saved', async () => {
    harness.processLauncher.outcomes = { code: { success: false, reason: 'timeout', message: 'slow' } };
    harness.settings.saveSucceeds = false;

    const lines = textOf(await tool.handler({})).split('\n');

    expect(lines[lines.length - 1]).toBe('Editor setting could not be saved');
  });

  test('should report a detection failure', async () => {
    harness.setDetected(null);

    const lines = textOf(await tool.handler({})).split('\n');

    expect(lines.slice(0, 4)).toEqual([
      'Error opening active folder: No folder detected',
      'No valid folder could be detected.',
      'Open a file manager window, or open a saved favourite folder instead.',
      'Error Type: detection'
    ]);
    expect(harness.processLauncher.launches).toHaveLength(0);
  });

  test('should report an editor failure when nothing starts', async () => {
    harness.processLauncher.outcomes = {
      code: { success: false, reason: 'failed', message: 'exit' },
      codium: { success: false, reason: 'failed', message: 'exit' }
    };

    const lines = textOf(await tool.handler({})).split('\n');

    expect(lines[0]).toBe('Error opening active folder: Editor not found');
    expect(lines[3]).toBe('Error Type: editor');
  });

  test('should reject an empty editor argument', async () => {
    const lines = textOf(await tool.handler({ editor: '' })).split('\n');

    expect(lines[0]?.startsWith('Error opening active folder: editor: ')).toBe(true);
    expect(lines[1]).toBe('Error Type: validation');
  });
});
