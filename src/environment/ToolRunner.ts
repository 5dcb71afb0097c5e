/**
 * ToolRunner
 * Runs an auxiliary desktop tool with a hard timeout. A nonzero exit, a timeout,
 * a spawn failure or empty output all mean "unavailable" and yield null.
 */

import { execFile } from 'child_process';
import type { ToolRunResult } from '../types/index';
import { ExternalToolUnavailableError } from '../errors/LauncherErrors';
import { Logger } from '../logging/Logger';

export interface CommandRunner {
  run(command: string, args: string[], timeoutMs: number): Promise<ToolRunResult>;
}

const MAX_TOOL_OUTPUT_BYTES = 1024 * 1024;

/**
 * CommandRunner backed by child_process.execFile (no shell)
 */
export class ExecFileRunner implements CommandRunner {
  public run(command: string, args: string[], timeoutMs: number): Promise<ToolRunResult> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        { timeout: timeoutMs, maxBuffer: MAX_TOOL_OUTPUT_BYTES, encoding: 'utf8', windowsHide: true },
        (error, stdout, stderr) => {
          if (error) {
            if (typeof error.code === 'number') {
              resolve({ exitCode: error.code, stdout, stderr });
              return;
            }
            const reason = error.killed ? `timed out after ${timeoutMs}ms` : String(error.code ?? error.message);
            reject(new ExternalToolUnavailableError(command, reason));
            return;
          }
          resolve({ exitCode: 0, stdout, stderr });
        }
      );
    });
  }
}

export class ToolRunner {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(runner: CommandRunner = new ExecFileRunner(), logger?: Logger) {
    this.runner = runner;
    this.logger = logger ?? Logger.createDefault('ToolRunner');
  }

  /**
   * Trimmed stdout of a successful run, or null when the tool is unavailable
   */
  public async output(command: string, args: string[], timeoutMs: number): Promise<string | null> {
    try {
      const result = await this.runner.run(command, args, timeoutMs);
      if (result.exitCode !== 0) {
        this.logger.debug('Tool exited with nonzero status', { command, args, exitCode: result.exitCode });
        return null;
      }
      const stdout = result.stdout.trim();
      return stdout.length > 0 ? stdout : null;
    } catch (error) {
      this.logger.debug('Tool unavailable', { command, args, error });
      return null;
    }
  }
}
