/**
 * ExecutableLocator Class
 * PATH lookup memoized per command name. PATH is treated as stable for the
 * lifetime of the process, so entries are never invalidated.
 */

import * as fs from 'fs';
import * as path from 'path';

export class ExecutableLocator {
  private readonly searchDirectories: string[];
  private readonly cache = new Map<string, string | null>();

  constructor(pathEnv: string = process.env.PATH ?? '') {
    this.searchDirectories = pathEnv
      .split(path.delimiter)
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0 && path.isAbsolute(entry));
  }

  /**
   * Absolute path of the first executable regular file named `command` on PATH
   */
  public which(command: string): string | null {
    const cached = this.cache.get(command);
    if (cached !== undefined) {
      return cached;
    }

    const found = this.lookup(command);
    this.cache.set(command, found);
    return found;
  }

  public isAvailable(command: string): boolean {
    return this.which(command) !== null;
  }

  public getSearchDirectories(): string[] {
    return [...this.searchDirectories];
  }

  private lookup(command: string): string | null {
    // Bare names only; anything with a separator is not a PATH lookup
    if (command.length === 0 || command.includes('/') || command.includes('\0')) {
      return null;
    }

    for (const directory of this.searchDirectories) {
      const candidate = path.join(directory, command);
      if (ExecutableLocator.isExecutableFile(candidate)) {
        return candidate;
      }
    }

    return null;
  }

  public static isExecutableFile(candidate: string): boolean {
    try {
      if (!fs.statSync(candidate).isFile()) {
        return false;
      }
      fs.accessSync(candidate, fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }
}
