/**
 * CommandValidator Class
 * Decides whether an editor setting may be executed. Only the first whitespace
 * token is considered; arguments are never accepted as part of the setting.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  CommandValidationResult,
  SecurityEvent,
  ValidatedCommand
} from '../types/index';
import {
  DENIED_COMMANDS,
  DENIED_COMMAND_PREFIXES,
  KNOWN_SAFE_EDITORS,
  MAX_EXECUTABLE_SIZE_BYTES,
  SYSTEM_BINARY_DIRECTORIES
} from './policy';
import { ExecutableLocator } from '../environment/ExecutableLocator';
import { Logger } from '../logging/Logger';

export interface CommandValidatorOptions {
  locator?: ExecutableLocator;
  /** Current user id; undefined disables the ownership route */
  getUid?: () => number | undefined;
  maxExecutableSize?: number;
  enableAuditLogging?: boolean;
}

export class CommandValidator {
  private readonly locator: ExecutableLocator;
  private readonly getUid: () => number | undefined;
  private readonly maxExecutableSize: number;
  private readonly enableAuditLogging: boolean;
  private readonly logger: Logger;
  private securityEvents: SecurityEvent[] = [];

  constructor(options: CommandValidatorOptions = {}, logger?: Logger) {
    this.locator = options.locator ?? new ExecutableLocator();
    this.getUid = options.getUid ?? (() => process.getuid?.());
    this.maxExecutableSize = options.maxExecutableSize ?? MAX_EXECUTABLE_SIZE_BYTES;
    this.enableAuditLogging = options.enableAuditLogging ?? true;
    this.logger = logger ?? Logger.createDefault('CommandValidator');
  }

  public validateCommand(candidate: string): CommandValidationResult {
    if (typeof candidate !== 'string' || candidate.trim().length === 0) {
      return this.reject(String(candidate), 'Empty editor command');
    }

    const token = CommandValidator.extractExecutableToken(candidate);
    const baseName = path.basename(token);

    if (CommandValidator.isDeniedName(baseName)) {
      this.logSecurityEvent('denied_command', candidate);
      return this.reject(candidate, `Command not allowed: ${baseName}`, true);
    }

    if (path.isAbsolute(token)) {
      return this.validateAbsolute(candidate, token, baseName);
    }

    if (token.includes('/')) {
      return this.reject(candidate, 'Relative command paths are not allowed', true);
    }

    return this.validateSearchPath(candidate, token, baseName);
  }

  /**
   * The part of an editor setting before the first whitespace
   */
  public static extractExecutableToken(candidate: string): string {
    const [token] = candidate.trim().split(/\s+/);
    return token ?? '';
  }

  public static isDeniedName(baseName: string): boolean {
    return DENIED_COMMANDS.has(baseName) ||
      DENIED_COMMAND_PREFIXES.some(prefix => baseName.startsWith(prefix));
  }

  /**
   * Known editor by basename, or a known editor identifier inside the resolved path
   */
  public static isKnownEditor(baseName: string, resolvedPath: string): boolean {
    const lowered = resolvedPath.toLowerCase();
    return KNOWN_SAFE_EDITORS.includes(baseName) ||
      KNOWN_SAFE_EDITORS.some(editor => lowered.includes(editor));
  }

  private validateAbsolute(candidate: string, token: string, baseName: string): CommandValidationResult {
    const inspected = this.inspectExecutable(candidate, token);
    if (!inspected.ok) {
      return inspected.result;
    }
    const { realPath, stats } = inspected;

    if (CommandValidator.isKnownEditor(baseName, realPath)) {
      return this.accept(candidate, realPath);
    }

    if (SYSTEM_BINARY_DIRECTORIES.some(dir => realPath.startsWith(dir))) {
      this.logSecurityEvent('untrusted_executable', candidate, realPath);
      return this.reject(candidate, 'System binary is not a known editor', true);
    }

    // Outside system directories: must belong to the current user and not be world-writable
    const uid = this.getUid();
    if (uid === undefined || stats.uid !== uid) {
      this.logSecurityEvent('untrusted_executable', candidate, realPath);
      return this.reject(candidate, 'Executable is not owned by the current user', true);
    }

    if (stats.mode & 0o002) {
      this.logSecurityEvent('untrusted_executable', candidate, realPath);
      return this.reject(candidate, 'Executable is world-writable', true);
    }

    return this.accept(candidate, realPath);
  }

  private validateSearchPath(candidate: string, token: string, baseName: string): CommandValidationResult {
    const located = this.locator.which(token);
    if (!located) {
      return this.reject(candidate, `Command not found on PATH: ${token}`);
    }

    const inspected = this.inspectExecutable(candidate, located);
    if (!inspected.ok) {
      return inspected.result;
    }

    if (!CommandValidator.isKnownEditor(baseName, inspected.realPath)) {
      this.logSecurityEvent('untrusted_executable', candidate, inspected.realPath);
      return this.reject(candidate, `Not a known editor: ${baseName}`, true);
    }

    return this.accept(candidate, inspected.realPath);
  }

  /**
   * Symlink resolution plus the existence, type, permission and size checks
   */
  private inspectExecutable(
    candidate: string,
    executablePath: string
  ): { ok: true; realPath: string; stats: fs.Stats } | { ok: false; result: CommandValidationResult } {
    let realPath: string;
    let stats: fs.Stats;

    try {
      realPath = fs.realpathSync(executablePath);
      stats = fs.statSync(realPath);
    } catch {
      return { ok: false, result: this.reject(candidate, `Executable does not exist: ${executablePath}`) };
    }

    if (!stats.isFile() || !ExecutableLocator.isExecutableFile(realPath)) {
      return { ok: false, result: this.reject(candidate, `Not an executable file: ${realPath}`) };
    }

    // A symlink named like an editor must not smuggle in a denied binary
    if (CommandValidator.isDeniedName(path.basename(realPath))) {
      this.logSecurityEvent('denied_command', candidate, realPath);
      return { ok: false, result: this.reject(candidate, `Command not allowed: ${path.basename(realPath)}`, true) };
    }

    if (stats.size > this.maxExecutableSize) {
      return { ok: false, result: this.reject(candidate, `Executable too large: ${stats.size} bytes`, true) };
    }

    return { ok: true, realPath, stats };
  }

  private accept(candidate: string, realPath: string): CommandValidationResult {
    const validated: ValidatedCommand = Object.freeze({
      kind: 'command',
      path: realPath,
      source: candidate,
      validatedAt: new Date()
    });
    return { isValid: true, validated };
  }

  private reject(candidate: string, error: string, securityViolation = false): CommandValidationResult {
    this.logger.debug('Editor command rejected', { candidate, error });
    return { isValid: false, candidate, error, securityViolation };
  }

  /**
   * Logs security events for audit purposes
   */
  private logSecurityEvent(type: SecurityEvent['type'], attemptedPath: string, resolvedPath?: string): void {
    if (!this.enableAuditLogging) {
      return;
    }

    this.securityEvents.push({
      timestamp: new Date(),
      type,
      attemptedPath,
      resolvedPath,
      clientInfo: 'CommandValidator'
    });

    this.logger.warn(`[SECURITY] ${type}: ${attemptedPath}${resolvedPath ? ` -> ${resolvedPath}` : ''}`);
  }

  public getSecurityEvents(): SecurityEvent[] {
    return [...this.securityEvents];
  }

  public clearSecurityEvents(): void {
    this.securityEvents = [];
  }
}
