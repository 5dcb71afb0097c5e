/**
 * FolderNameSearch
 * Case-insensitive directory-name search below a few likely roots in the home
 * directory. Direct children of every root are checked first, then each root is
 * searched to a limited depth. Hidden entries, known noise directories and
 * symlinked directories are skipped. The whole search shares one deadline.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Deadline, Clock } from './Deadline';
import { Logger } from '../logging/Logger';

export const FOLDER_SEARCH_BUDGET_MS = 2000;
export const FOLDER_SEARCH_MAX_DEPTH = 2;

export const SEARCH_ROOT_SUBDIRECTORIES: readonly string[] = [
  'Documents', 'Documentos',
  'Desktop', 'Escritorio',
  'Downloads', 'Descargas'
];

export const EXCLUDED_DIRECTORY_NAMES: ReadonlySet<string> = new Set([
  'node_modules', '__pycache__', '.git', '.svn', '.hg',
  '.cache', '.config', '.local', '.npm', '.cargo', '.rustup',
  'venv', 'env', '.venv', '.env', 'virtualenv',
  'site-packages', 'dist', 'build', '.tox',
  'snap', 'flatpak', '.wine', '.steam',
  '.mozilla', '.thunderbird', '.var'
]);

export interface FolderSearchOptions {
  homeDirectory: string;
  budgetMs?: number;
  maxDepth?: number;
  clock?: Clock;
  logger?: Logger;
}

export class FolderNameSearch {
  private readonly homeDirectory: string;
  private readonly budgetMs: number;
  private readonly maxDepth: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: FolderSearchOptions) {
    this.homeDirectory = options.homeDirectory;
    this.budgetMs = options.budgetMs ?? FOLDER_SEARCH_BUDGET_MS;
    this.maxDepth = options.maxDepth ?? FOLDER_SEARCH_MAX_DEPTH;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? Logger.createDefault('FolderNameSearch');
  }

  public getSearchRoots(): string[] {
    return [
      this.homeDirectory,
      ...SEARCH_ROOT_SUBDIRECTORIES.map(name => path.join(this.homeDirectory, name))
    ];
  }

  /**
   * Path of the first directory named `folderName` (ignoring case), or null when
   * nothing matched before the deadline
   */
  public async search(folderName: string, deadline: Deadline = Deadline.after(this.budgetMs, this.clock)): Promise<string | null> {
    const target = folderName.trim().toLowerCase();
    if (target.length === 0 || target.includes('/')) {
      return null;
    }

    const roots = this.getSearchRoots();

    for (const root of roots) {
      if (deadline.expired()) {
        return this.timedOut(folderName);
      }
      const direct = await this.searchTree(root, target, 0, 1, deadline);
      if (direct) {
        return direct;
      }
    }

    for (const root of roots) {
      const nested = await this.searchTree(root, target, 0, this.maxDepth, deadline);
      if (nested) {
        return nested;
      }
      if (deadline.expired()) {
        return this.timedOut(folderName);
      }
    }

    return null;
  }

  private async searchTree(
    directory: string,
    target: string,
    depth: number,
    maxDepth: number,
    deadline: Deadline
  ): Promise<string | null> {
    if (depth >= maxDepth || deadline.expired()) {
      return null;
    }

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(directory, { withFileTypes: true });
    } catch (error) {
      this.logger.debug('Cannot read directory during folder search', { directory, error });
      return null;
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      if (deadline.expired()) {
        return null;
      }

      // Dirent.isDirectory() is false for symlinks, so links are never followed
      if (!entry.isDirectory() || FolderNameSearch.isSkipped(entry.name)) {
        continue;
      }

      const fullPath = path.join(directory, entry.name);
      if (entry.name.toLowerCase() === target) {
        return fullPath;
      }

      const found = await this.searchTree(fullPath, target, depth + 1, maxDepth, deadline);
      if (found) {
        return found;
      }
    }

    return null;
  }

  public static isSkipped(name: string): boolean {
    return name.startsWith('.') || EXCLUDED_DIRECTORY_NAMES.has(name);
  }

  private timedOut(folderName: string): null {
    this.logger.warn(`Folder search for "${folderName}" abandoned after ${this.budgetMs}ms`);
    return null;
  }
}
