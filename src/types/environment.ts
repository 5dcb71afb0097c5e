/**
 * Desktop Environment Types
 */

export type DisplayServer = 'x11' | 'wayland';

/**
 * Auxiliary tools the detection strategies can use
 */
export type AuxiliaryTool = 'windowQuery' | 'windowControl' | 'windowProperty' | 'messageBus';

export interface EnvironmentSnapshot {
  readonly displayServer: DisplayServer;
  /** Lower-cased XDG_CURRENT_DESKTOP, empty when unset */
  readonly desktopSession: string;
  readonly tools: Readonly<Record<AuxiliaryTool, boolean>>;
  readonly capturedAt: Date;
}

export interface ToolRunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}
