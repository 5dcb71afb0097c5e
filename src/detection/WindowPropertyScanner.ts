/**
 * WindowPropertyScanner
 * Finds a directory in raw window property text: file:// URIs first, then any
 * quoted absolute path that exists as a directory.
 */

import { PathValidator } from '../security/PathValidator';
import { WindowPropertyTool } from '../desktop/WindowPropertyTool';
import { decodeFileUri, findQuotedFileUris } from './fileUri';

const QUOTED_PATH_PATTERN = /["']([^"']*(?:\/[^/"'\s]+)+)["']/g;

export function extractDirectoryFromProperties(output: string): string | null {
  for (const uri of findQuotedFileUris(output)) {
    const decoded = decodeFileUri(uri);
    if (decoded && PathValidator.isExistingDirectory(decoded)) {
      return decoded;
    }
  }

  let match: RegExpExecArray | null;
  const pattern = new RegExp(QUOTED_PATH_PATTERN.source, 'g');
  while ((match = pattern.exec(output)) !== null) {
    const candidate = match[1] ?? '';
    if (candidate.startsWith('/') && PathValidator.isExistingDirectory(candidate)) {
      return candidate;
    }
  }

  return null;
}

export class WindowPropertyScanner {
  constructor(private readonly propertyTool: WindowPropertyTool) {}

  public async directoryForWindow(windowId: string): Promise<string | null> {
    const output = await this.propertyTool.readProperties(windowId);
    return output ? extractDirectoryFromProperties(output) : null;
  }
}
