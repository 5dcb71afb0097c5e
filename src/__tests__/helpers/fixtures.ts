/**
 * Shared test fixtures: neutral temp directories, executables and a scripted
 * stand-in for the desktop tools
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { AuxiliaryTool, EnvironmentSnapshot, ToolRunResult } from '../../types/index';
import type { CommandRunner } from '../../environment/ToolRunner';
import { KNOWN_SAFE_EDITORS } from '../../security/policy';

/**
 * Symlink-resolved temp directory whose path contains no editor name, so that
 * substring allow-list matches never happen by accident
 */
export function makeTempDir(prefix = 'afl-'): string {
  if (containsEditorName(prefix)) {
    throw new Error(`Temp directory prefix contains an editor name: ${prefix}`);
  }
  for (let attempt = 0; attempt < 50; attempt++) {
    const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
    if (!containsEditorName(dir)) {
      return dir;
    }
    removeDir(dir);
  }
  throw new Error('Could not create a neutral temp directory');
}

export function containsEditorName(candidate: string): boolean {
  const lowered = candidate.toLowerCase();
  return KNOWN_SAFE_EDITORS.some(editor => lowered.includes(editor));
}

/**
 * No-op for a directory that was never created, e.g. when beforeEach failed
 */
export function removeDir(dir: string | undefined): void {
  if (!dir) {
    return;
  }
  fs.rmSync(dir, { recursive: true, force: true });
}

export function tempRoot(): string {
  return fs.realpathSync(os.tmpdir());
}

export function makeDirs(base: string, ...relative: string[]): string[] {
  return relative.map(entry => {
    const full = path.join(base, entry);
    fs.mkdirSync(full, { recursive: true });
    return full;
  });
}

export function writeExecutable(dir: string, name: string, mode = 0o755): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, '#!/bin/sh\nexit 0\n');
  fs.chmodSync(file, mode);
  return file;
}

export function snapshotWith(tools: Partial<Record<AuxiliaryTool, boolean>> = {}): EnvironmentSnapshot {
  return {
    displayServer: 'x11',
    desktopSession: 'gnome',
    tools: {
      windowQuery: false,
      windowControl: false,
      windowProperty: false,
      messageBus: false,
      ...tools
    },
    capturedAt: new Date(0)
  };
}

export interface RecordedCall {
  command: string;
  args: string[];
  timeoutMs: number;
}

/**
 * CommandRunner answering from a script keyed by "command arg1 arg2".
 * Unscripted invocations exit with status 1.
 */
export class ScriptedCommandRunner implements CommandRunner {
  public readonly calls: RecordedCall[] = [];
  private readonly script = new Map<string, ToolRunResult | Error>();

  public respond(commandLine: string, stdout: string, exitCode = 0): this {
    this.script.set(commandLine, { exitCode, stdout, stderr: '' });
    return this;
  }

  public fail(commandLine: string, error: Error): this {
    this.script.set(commandLine, error);
    return this;
  }

  public async run(command: string, args: string[], timeoutMs: number): Promise<ToolRunResult> {
    this.calls.push({ command, args, timeoutMs });
    const entry = this.script.get([command, ...args].join(' '));
    if (entry instanceof Error) {
      throw entry;
    }
    return entry ?? { exitCode: 1, stdout: '', stderr: 'unscripted' };
  }
}
