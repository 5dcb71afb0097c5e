/**
 * MessageBusTool
 * gdbus wrapper for reading a property of an object on the session bus
 */

import { ToolRunner } from '../environment/ToolRunner';
import { AUXILIARY_TOOL_COMMANDS } from '../environment/EnvironmentProbe';

export interface BusPropertyQuery {
  service: string;
  objectPath: string;
  interfaceName: string;
  property: string;
}

export class MessageBusTool {
  private readonly command = AUXILIARY_TOOL_COMMANDS.messageBus;

  constructor(private readonly runner: ToolRunner, private readonly timeoutMs: number) {}

  /**
   * Textual representation of the property, e.g. (<'file:///home/user'>,)
   */
  public getProperty(query: BusPropertyQuery): Promise<string | null> {
    return this.runner.output(this.command, [
      'call', '--session',
      '--dest', query.service,
      '--object-path', query.objectPath,
      '--method', 'org.freedesktop.DBus.Properties.Get',
      query.interfaceName, query.property
    ], this.timeoutMs);
  }
}
