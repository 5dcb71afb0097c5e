/**
 * PathValidator Class
 * Decides whether a candidate directory may be handed to an editor.
 * Default-deny: the resolved directory must sit under an allowed root and must not
 * be one of the forbidden system directories.
 */

import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import {
  DirectoryPolicyOptions,
  DirectoryValidationResult,
  SecurityEvent,
  ValidatedPath
} from '../types/index';
import { FORBIDDEN_DIRECTORIES, SHARED_ALLOWED_ROOTS } from './policy';
import { Logger } from '../logging/Logger';
import { errorCode, errorMessage } from '../errors/LauncherErrors';

export class PathValidator {
  private readonly homeDirectory: string;
  private readonly allowedRoots: string[];
  private readonly forbiddenDirectories: Set<string>;
  private readonly enableAuditLogging: boolean;
  private readonly logger: Logger;
  private securityEvents: SecurityEvent[] = [];

  constructor(options: DirectoryPolicyOptions, logger?: Logger) {
    this.homeDirectory = path.resolve(options.homeDirectory);
    const roots = options.allowedRoots ?? [this.homeDirectory, ...SHARED_ALLOWED_ROOTS];
    this.allowedRoots = this.expandRoots(roots);
    this.forbiddenDirectories = new Set(
      (options.forbiddenDirectories ?? FORBIDDEN_DIRECTORIES).map(dir => path.resolve(dir))
    );
    this.enableAuditLogging = options.enableAuditLogging ?? true;
    this.logger = logger ?? Logger.createDefault('PathValidator');
  }

  /**
   * Validates a candidate directory through existence, type, permission and policy checks
   */
  public validateDirectory(candidate: string): DirectoryValidationResult {
    // Step 1: Basic input validation
    if (typeof candidate !== 'string' || candidate.trim().length === 0) {
      return this.reject(String(candidate), 'Empty path not allowed');
    }

    if (candidate.includes('\0')) {
      return this.reject(candidate, 'Path contains a null byte', true);
    }

    // Step 2: Resolve symlinks to the real absolute path
    let realPath: string;
    try {
      realPath = fs.realpathSync(this.resolveAbsolutePath(candidate.trim()));
    } catch (error) {
      return this.reject(candidate, `Path does not exist: ${this.describeError(error)}`);
    }

    // Step 3: Must be a readable directory
    try {
      if (!fs.statSync(realPath).isDirectory()) {
        return this.reject(candidate, 'Path is not a directory');
      }
      fs.accessSync(realPath, fs.constants.R_OK);
    } catch (error) {
      return this.reject(candidate, `Directory is not readable: ${this.describeError(error)}`);
    }

    // Step 4: Exact-match deny list
    if (this.forbiddenDirectories.has(realPath)) {
      this.logSecurityEvent('forbidden_directory', candidate, realPath);
      return this.reject(candidate, `Access to system directory not allowed: ${realPath}`, true);
    }

    // Step 5: Prefix-match allow list
    if (!this.isWithinAllowedRoots(realPath)) {
      this.logSecurityEvent('outside_allowed_roots', candidate, realPath);
      return this.reject(candidate, 'Path outside allowed directories', true);
    }

    const validated: ValidatedPath = Object.freeze({
      kind: 'directory',
      path: realPath,
      validatedAt: new Date()
    });

    return { isValid: true, validated };
  }

  /**
   * True when the candidate currently exists as a directory. Used by detection
   * strategies before they hand a candidate to the resolver.
   */
  public static isExistingDirectory(candidate: string): boolean {
    try {
      return candidate.length > 0 && fs.statSync(candidate).isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Resolves input path to absolute path, handling ~ expansion
   */
  private resolveAbsolutePath(inputPath: string): string {
    if (inputPath === '~') {
      return this.homeDirectory;
    }

    if (inputPath.startsWith('~/')) {
      return path.resolve(this.homeDirectory, inputPath.slice(2));
    }

    // Resolve relative paths relative to home directory for security
    if (!path.isAbsolute(inputPath)) {
      return path.resolve(this.homeDirectory, inputPath);
    }

    return path.resolve(inputPath);
  }

  /**
   * Checks if the resolved path is one of, or below, the allowed roots
   */
  private isWithinAllowedRoots(resolvedPath: string): boolean {
    return this.allowedRoots.some(root =>
      resolvedPath === root || resolvedPath.startsWith(root.endsWith(path.sep) ? root : root + path.sep)
    );
  }

  /**
   * Each root is compared both as written and symlink-resolved
   */
  private expandRoots(roots: readonly string[]): string[] {
    const expanded = new Set<string>();
    for (const root of roots) {
      const absolute = path.resolve(root);
      expanded.add(absolute);
      try {
        expanded.add(fs.realpathSync(absolute));
      } catch {
        // Missing roots (e.g. no /media) still match literally
      }
    }
    return [...expanded];
  }

  private reject(candidate: string, error: string, securityViolation = false): DirectoryValidationResult {
    this.logger.debug('Directory rejected', { candidate, error });
    return { isValid: false, candidate, error, securityViolation };
  }

  private describeError(error: unknown): string {
    return errorCode(error) ?? errorMessage(error);
  }

  /**
   * Logs security events for audit purposes
   */
  private logSecurityEvent(
    type: SecurityEvent['type'],
    attemptedPath: string,
    resolvedPath?: string
  ): void {
    if (!this.enableAuditLogging) {
      return;
    }

    const event: SecurityEvent = {
      timestamp: new Date(),
      type,
      attemptedPath,
      resolvedPath,
      clientInfo: 'PathValidator'
    };

    this.securityEvents.push(event);
    this.logger.warn(`[SECURITY] ${type}: ${attemptedPath}${resolvedPath ? ` -> ${resolvedPath}` : ''}`);
  }

  /**
   * Gets all security events (for testing and monitoring)
   */
  public getSecurityEvents(): SecurityEvent[] {
    return [...this.securityEvents];
  }

  /**
   * Clears security events (for testing)
   */
  public clearSecurityEvents(): void {
    this.securityEvents = [];
  }

  /**
   * Gets allowed roots (for testing and debugging)
   */
  public getAllowedRoots(): string[] {
    return [...this.allowedRoots];
  }

  public getHomeDirectory(): string {
    return this.homeDirectory;
  }

  /**
   * Static factory method for the current user's policy
   */
  public static createForCurrentUser(logger?: Logger, homeDirectory: string = os.homedir()): PathValidator {
    return new PathValidator({ homeDirectory }, logger);
  }
}
