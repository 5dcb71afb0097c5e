/**
 * EnvironmentProbe Class
 * Classifies the display server and checks which auxiliary tools are on PATH.
 * The snapshot is computed once and cached; call refresh() to recompute.
 */

import type { AuxiliaryTool, EnvironmentSnapshot } from '../types/index';
import { ExecutableLocator } from './ExecutableLocator';

/**
 * Executable behind each auxiliary tool role
 */
export const AUXILIARY_TOOL_COMMANDS: Readonly<Record<AuxiliaryTool, string>> = {
  windowQuery: 'xdotool',
  windowControl: 'wmctrl',
  windowProperty: 'xprop',
  messageBus: 'gdbus'
};

export const EDITOR_DIAGNOSTIC_COMMANDS: readonly string[] = ['code', 'code-insiders', 'codium'];

export class EnvironmentProbe {
  private readonly env: NodeJS.ProcessEnv;
  private readonly locator: ExecutableLocator;
  private cached: EnvironmentSnapshot | null = null;

  constructor(env: NodeJS.ProcessEnv = process.env, locator?: ExecutableLocator) {
    this.env = env;
    this.locator = locator ?? new ExecutableLocator(env.PATH ?? '');
  }

  public snapshot(): EnvironmentSnapshot {
    if (!this.cached) {
      this.cached = this.capture();
    }
    return this.cached;
  }

  public refresh(): EnvironmentSnapshot {
    this.cached = this.capture();
    return this.cached;
  }

  public getLocator(): ExecutableLocator {
    return this.locator;
  }

  /**
   * Human-readable startup report with recommendations
   */
  public generateReport(): string[] {
    const snapshot = this.snapshot();
    const lines = [
      `Display server: ${snapshot.displayServer.toUpperCase()}`,
      `Desktop: ${snapshot.desktopSession || 'unknown'}`
    ];

    for (const [role, command] of Object.entries(AUXILIARY_TOOL_COMMANDS)) {
      const location = this.locator.which(command);
      lines.push(`${command} (${role}): ${location ?? 'not found'}`);
    }

    for (const editor of EDITOR_DIAGNOSTIC_COMMANDS) {
      const location = this.locator.which(editor);
      lines.push(`${editor}: ${location ?? 'not found'}`);
    }

    lines.push(...this.generateRecommendations(snapshot));
    return lines;
  }

  public generateRecommendations(snapshot: EnvironmentSnapshot = this.snapshot()): string[] {
    const recommendations: string[] = [];

    if (snapshot.displayServer === 'wayland') {
      if (!snapshot.tools.messageBus) {
        recommendations.push('Wayland without gdbus: folder detection may fail (install libglib2.0-bin)');
      }
    } else if (!snapshot.tools.windowQuery) {
      recommendations.push('X11 without xdotool: folder detection is limited (install xdotool)');
    }

    if (!this.locator.isAvailable('code') && !this.locator.isAvailable('codium')) {
      recommendations.push('VSCode not found on PATH: common install locations will be searched');
    }

    return recommendations;
  }

  private capture(): EnvironmentSnapshot {
    const sessionType = (this.env.XDG_SESSION_TYPE ?? '').toLowerCase();
    const isWayland = Boolean(this.env.WAYLAND_DISPLAY) || sessionType === 'wayland';

    const tools: Record<AuxiliaryTool, boolean> = {
      windowQuery: this.locator.isAvailable(AUXILIARY_TOOL_COMMANDS.windowQuery),
      windowControl: this.locator.isAvailable(AUXILIARY_TOOL_COMMANDS.windowControl),
      windowProperty: this.locator.isAvailable(AUXILIARY_TOOL_COMMANDS.windowProperty),
      messageBus: this.locator.isAvailable(AUXILIARY_TOOL_COMMANDS.messageBus)
    };

    const snapshot: EnvironmentSnapshot = {
      displayServer: isWayland ? 'wayland' : 'x11',
      desktopSession: (this.env.XDG_CURRENT_DESKTOP ?? '').toLowerCase(),
      tools: Object.freeze(tools),
      capturedAt: new Date()
    };

    return Object.freeze(snapshot);
  }
}
