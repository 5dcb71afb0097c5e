/**
 * TitleExtractor
 * Turns a file manager window title into a directory. Titles rarely carry a full
 * path, so after literal paths the extractor falls back to localized special
 * folder names and finally to a bounded search by folder name.
 */

import * as path from 'path';
import { PathValidator } from '../security/PathValidator';
import { FolderNameSearch } from './FolderNameSearch';

export const BRANDING_PREFIXES: readonly string[] = ['Files', 'Archivos', 'File Manager', 'Gestor de archivos'];

/**
 * Display name (English and Spanish) to the directory name under home
 */
export const SPECIAL_FOLDER_NAMES: ReadonlyArray<readonly [string, string]> = [
  ['Documents', 'Documents'], ['Documentos', 'Documents'],
  ['Downloads', 'Downloads'], ['Descargas', 'Downloads'],
  ['Pictures', 'Pictures'], ['Imágenes', 'Pictures'],
  ['Music', 'Music'], ['Música', 'Music'],
  ['Videos', 'Videos'], ['Vídeos', 'Videos'],
  ['Desktop', 'Desktop'], ['Escritorio', 'Desktop'],
  ['Public', 'Public'], ['Público', 'Public'],
  ['Templates', 'Templates'], ['Plantillas', 'Templates']
];

export const HOME_DISPLAY_NAMES: readonly string[] = ['carpeta personal', 'home', 'personal folder'];

const APPLICATION_TITLES: readonly string[] = ['org.gnome.Nautilus', 'Nautilus'];
const DECORATIVE_GLYPHS = /^[✳\s]+/u;
const PATH_PATTERN = /\/\S+/g;

export interface TitleExtractorOptions {
  homeDirectory: string;
  folderSearch: FolderNameSearch;
}

export class TitleExtractor {
  private readonly homeDirectory: string;
  private readonly folderSearch: FolderNameSearch;

  constructor(options: TitleExtractorOptions) {
    this.homeDirectory = options.homeDirectory;
    this.folderSearch = options.folderSearch;
  }

  /**
   * Strips branding prefixes and leading decorative glyphs
   */
  public static cleanTitle(title: string): string {
    let cleaned = title.trim();

    for (const prefix of BRANDING_PREFIXES) {
      if (cleaned.startsWith(prefix)) {
        cleaned = cleaned.slice(prefix.length).trim();
        if (cleaned.startsWith('-')) {
          cleaned = cleaned.slice(1).trim();
        }
      }
    }

    return cleaned.replace(DECORATIVE_GLYPHS, '').trim();
  }

  public async extract(title: string): Promise<string | null> {
    if (!title || title.trim().length === 0) {
      return null;
    }

    const cleaned = TitleExtractor.cleanTitle(title);

    // Full path after cleanup
    if (cleaned.startsWith('/') && PathValidator.isExistingDirectory(cleaned)) {
      return cleaned;
    }

    // Path-shaped substrings anywhere in the full title
    for (const match of title.match(PATH_PATTERN) ?? []) {
      if (PathValidator.isExistingDirectory(match)) {
        return match;
      }
    }

    if (cleaned.length === 0) {
      return null;
    }

    return this.fromFolderName(cleaned);
  }

  /**
   * Special folder names first (exact, then substring), then a same-name
   * subdirectory of home, then the bounded search
   */
  private async fromFolderName(name: string): Promise<string | null> {
    const lowered = name.toLowerCase();

    if (HOME_DISPLAY_NAMES.includes(lowered)) {
      return this.homeDirectory;
    }

    for (const [displayName, folder] of SPECIAL_FOLDER_NAMES) {
      if (lowered === displayName.toLowerCase()) {
        const candidate = path.join(this.homeDirectory, folder);
        if (PathValidator.isExistingDirectory(candidate)) {
          return candidate;
        }
      }
    }

    for (const [displayName, folder] of SPECIAL_FOLDER_NAMES) {
      if (lowered.includes(displayName.toLowerCase())) {
        const candidate = path.join(this.homeDirectory, folder);
        if (PathValidator.isExistingDirectory(candidate)) {
          return candidate;
        }
      }
    }

    if (name.includes('/')) {
      return null;
    }

    const sameName = path.join(this.homeDirectory, name);
    if (PathValidator.isExistingDirectory(sameName)) {
      return sameName;
    }

    if (APPLICATION_TITLES.includes(name)) {
      return null;
    }

    return this.folderSearch.search(name);
  }
}
