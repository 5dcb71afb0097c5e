/**
 * DbusLocationStrategy
 * Asks the focused file manager window for its location over the session bus.
 * Only runs when a file manager window currently has focus.
 */

import type { EnvironmentSnapshot, LocationStrategy } from '../../types/index';
import { WindowQueryTool } from '../../desktop/WindowQueryTool';
import { MessageBusTool } from '../../desktop/MessageBusTool';
import type { BusPropertyQuery } from '../../desktop/MessageBusTool';
import { PathValidator } from '../../security/PathValidator';
import { decodeFileUri, findQuotedFileUris } from '../fileUri';
import { Logger } from '../../logging/Logger';

export const FILE_MANAGER_LOCATION_QUERY: BusPropertyQuery = {
  service: 'org.gnome.Nautilus',
  objectPath: '/org/gnome/Nautilus/window/1',
  interfaceName: 'org.gnome.Nautilus.Window',
  property: 'location'
};

/**
 * Decoded path from a property reply such as (<'file:///home/user/My%20Files'>,)
 */
export function parseBusLocation(output: string): string | null {
  const [uri] = findQuotedFileUris(output);
  return uri ? decodeFileUri(uri) : null;
}

export interface DbusLocationStrategyOptions {
  environment: EnvironmentSnapshot;
  windowQuery: WindowQueryTool;
  messageBus: MessageBusTool;
  fileManagerClass: string;
  logger?: Logger;
}

export class DbusLocationStrategy implements LocationStrategy {
  public readonly name = 'dbus';
  private readonly logger: Logger;

  constructor(private readonly options: DbusLocationStrategyOptions) {
    this.logger = options.logger ?? Logger.createDefault('DbusLocationStrategy');
  }

  public async detect(): Promise<string | null> {
    const { environment, windowQuery, messageBus, fileManagerClass } = this.options;

    if (!environment.tools.windowQuery || !environment.tools.messageBus) {
      this.logger.debug('Skipping bus query: window-query or bus tool unavailable');
      return null;
    }

    try {
      const windowIds = await windowQuery.searchByClass(fileManagerClass);
      if (windowIds.length === 0) {
        return null;
      }

      const focused = await windowQuery.getFocusedWindow();
      if (!focused || !windowIds.includes(focused)) {
        return null;
      }

      const reply = await messageBus.getProperty(FILE_MANAGER_LOCATION_QUERY);
      if (!reply) {
        return null;
      }

      const location = parseBusLocation(reply);
      return location && PathValidator.isExistingDirectory(location) ? location : null;
    } catch (error) {
      this.logger.debug('Bus location query failed', { error });
      return null;
    }
  }
}
