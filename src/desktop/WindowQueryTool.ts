/**
 * WindowQueryTool
 * xdotool wrapper: window search by class, focused/active window and window titles
 */

import { ToolRunner } from '../environment/ToolRunner';
import { AUXILIARY_TOOL_COMMANDS } from '../environment/EnvironmentProbe';

export interface WindowQueryTimeouts {
  toolTimeoutMs: number;
  focusTimeoutMs: number;
}

export class WindowQueryTool {
  private readonly command = AUXILIARY_TOOL_COMMANDS.windowQuery;

  constructor(private readonly runner: ToolRunner, private readonly timeouts: WindowQueryTimeouts) {}

  public async searchByClass(windowClass: string): Promise<string[]> {
    const output = await this.runner.output(this.command, ['search', '--class', windowClass], this.timeouts.toolTimeoutMs);
    return output ? splitLines(output) : [];
  }

  public getFocusedWindow(): Promise<string | null> {
    return this.runner.output(this.command, ['getwindowfocus'], this.timeouts.focusTimeoutMs);
  }

  public getActiveWindow(): Promise<string | null> {
    return this.runner.output(this.command, ['getactivewindow'], this.timeouts.toolTimeoutMs);
  }

  public getWindowName(windowId: string): Promise<string | null> {
    return this.runner.output(this.command, ['getwindowname', windowId], this.timeouts.focusTimeoutMs);
  }
}

function splitLines(output: string): string[] {
  return output.split('\n').map(line => line.trim()).filter(line => line.length > 0);
}
