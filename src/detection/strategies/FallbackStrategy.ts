/**
 * FallbackStrategy
 * Smart defaults when no file manager window can be read: the working directory,
 * then a localized special folder, then home.
 */

import * as path from 'path';
import type { LocationStrategy } from '../../types/index';
import { PathValidator } from '../../security/PathValidator';

export const FALLBACK_FOLDER_NAMES: readonly string[] = ['Desktop', 'Escritorio', 'Documents', 'Documentos'];

export interface FallbackStrategyOptions {
  homeDirectory: string;
  getWorkingDirectory?: () => string;
  /** Decides whether a candidate is usable; defaults to "exists as a directory" */
  isUsable?: (candidate: string) => boolean;
}

export class FallbackStrategy implements LocationStrategy {
  public readonly name = 'fallback';
  private readonly getWorkingDirectory: () => string;
  private readonly isUsable: (candidate: string) => boolean;

  constructor(private readonly options: FallbackStrategyOptions) {
    this.getWorkingDirectory = options.getWorkingDirectory ?? (() => process.cwd());
    this.isUsable = options.isUsable ?? PathValidator.isExistingDirectory;
  }

  public async detect(): Promise<string | null> {
    return this.candidates().find(candidate => this.isUsable(candidate)) ?? null;
  }

  public candidates(): string[] {
    const home = this.options.homeDirectory;
    const candidates: string[] = [];

    try {
      candidates.push(this.getWorkingDirectory());
    } catch {
      // process.cwd() throws when the working directory was deleted
    }

    candidates.push(...FALLBACK_FOLDER_NAMES.map(name => path.join(home, name)), home);
    return candidates;
  }
}
