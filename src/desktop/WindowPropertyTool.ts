/**
 * WindowPropertyTool
 * xprop wrapper returning raw property text for a window
 */

import { ToolRunner } from '../environment/ToolRunner';
import { AUXILIARY_TOOL_COMMANDS } from '../environment/EnvironmentProbe';

export const WINDOW_NAME_PROPERTIES: readonly string[] = ['WM_NAME', '_NET_WM_NAME'];

export class WindowPropertyTool {
  private readonly command = AUXILIARY_TOOL_COMMANDS.windowProperty;

  constructor(private readonly runner: ToolRunner, private readonly timeoutMs: number) {}

  public readProperties(windowId: string, properties: readonly string[] = WINDOW_NAME_PROPERTIES): Promise<string | null> {
    return this.runner.output(this.command, ['-id', windowId, ...properties], this.timeoutMs);
  }
}
