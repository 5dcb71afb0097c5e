/**
 * ActiveWindowStrategy
 * Reads the active window's title; when it looks like a file manager window the
 * title is turned into a directory, falling back to the window's name properties.
 */

import type { EnvironmentSnapshot, LocationStrategy } from '../../types/index';
import { WindowQueryTool } from '../../desktop/WindowQueryTool';
import { TitleExtractor } from '../TitleExtractor';
import { WindowPropertyScanner } from '../WindowPropertyScanner';
import { Logger } from '../../logging/Logger';

export const FOLDER_TITLE_KEYWORDS: readonly string[] = [
  'documents', 'documentos',
  'downloads', 'descargas',
  'pictures', 'imágenes',
  'music', 'música',
  'videos', 'vídeos',
  'desktop', 'escritorio'
];

/**
 * Heuristic: application keyword, an absolute path, or a special folder name
 */
export function looksLikeFileManagerTitle(title: string, fileManagerKeyword = 'nautilus'): boolean {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    return false;
  }

  const lowered = trimmed.toLowerCase();
  return lowered.includes(fileManagerKeyword.toLowerCase()) ||
    trimmed.startsWith('/') ||
    FOLDER_TITLE_KEYWORDS.some(keyword => lowered.includes(keyword));
}

export interface ActiveWindowStrategyOptions {
  environment: EnvironmentSnapshot;
  windowQuery: WindowQueryTool;
  titleExtractor: TitleExtractor;
  propertyScanner: WindowPropertyScanner;
  fileManagerClass: string;
  logger?: Logger;
}

export class ActiveWindowStrategy implements LocationStrategy {
  public readonly name = 'active-window';
  private readonly logger: Logger;

  constructor(private readonly options: ActiveWindowStrategyOptions) {
    this.logger = options.logger ?? Logger.createDefault('ActiveWindowStrategy');
  }

  public async detect(): Promise<string | null> {
    const { environment, windowQuery, titleExtractor, propertyScanner, fileManagerClass } = this.options;

    if (!environment.tools.windowQuery) {
      this.logger.debug('Skipping active window: window-query tool unavailable');
      return null;
    }

    try {
      const windowId = await windowQuery.getActiveWindow();
      if (!windowId) {
        return null;
      }

      const title = await windowQuery.getWindowName(windowId);
      if (!title || !looksLikeFileManagerTitle(title, fileManagerClass)) {
        return null;
      }

      const fromTitle = await titleExtractor.extract(title);
      if (fromTitle) {
        return fromTitle;
      }

      if (!environment.tools.windowProperty) {
        return null;
      }

      return await propertyScanner.directoryForWindow(windowId);
    } catch (error) {
      this.logger.debug('Active window inspection failed', { error });
      return null;
    }
  }
}
