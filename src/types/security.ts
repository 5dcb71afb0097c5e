/**
 * Security and Validation Types
 * Validated values handed to process launch, and the audit trail kept by validators
 */

/**
 * An absolute, symlink-resolved directory that existed, was readable and was not a
 * forbidden system directory when it was checked. Only PathValidator creates these.
 */
export interface ValidatedPath {
  readonly kind: 'directory';
  readonly path: string;
  readonly validatedAt: Date;
}

/**
 * An absolute, symlink-resolved executable that passed the editor policy.
 * Only CommandValidator creates these.
 */
export interface ValidatedCommand {
  readonly kind: 'command';
  readonly path: string;
  /** The setting or fallback entry the command was derived from */
  readonly source: string;
  readonly validatedAt: Date;
}

export type DirectoryValidationResult =
  | { isValid: true; validated: ValidatedPath }
  | { isValid: false; candidate: string; error: string; securityViolation: boolean };

export type CommandValidationResult =
  | { isValid: true; validated: ValidatedCommand }
  | { isValid: false; candidate: string; error: string; securityViolation: boolean };

export type SecurityEventType =
  | 'forbidden_directory'
  | 'outside_allowed_roots'
  | 'denied_command'
  | 'untrusted_executable';

export interface SecurityEvent {
  timestamp: Date;
  type: SecurityEventType;
  attemptedPath: string;
  resolvedPath?: string | undefined;
  clientInfo?: string | undefined;
}

/**
 * Directory policy options
 */
export interface DirectoryPolicyOptions {
  homeDirectory: string;
  allowedRoots?: string[] | undefined;
  forbiddenDirectories?: string[] | undefined;
  enableAuditLogging?: boolean | undefined;
}
