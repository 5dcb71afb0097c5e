/**
 * ManageFavoritesTool Class
 * Lists, adds and removes saved favourite folders
 */

import { z } from 'zod';
import type { JsonSchemaObject, LauncherTool, McpContent, ValidatedPath } from '../types/index';
import { PathValidator } from '../security/PathValidator';
import { createErrorResponse, formatIssues, textResponse } from './responses';

const manageFavoritesSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('list') }),
  z.object({ action: z.literal('add'), path: z.string().min(1, 'Folder path is required') }),
  z.object({ action: z.literal('remove'), path: z.string().min(1, 'Folder path is required') })
]);

export interface FavoritesStore {
  getFavoriteFolders(): string[];
  addFavoriteFolder(folder: ValidatedPath): boolean;
  removeFavoriteFolder(folderPath: string): boolean;
}

export class ManageFavoritesTool implements LauncherTool {
  public readonly name = 'manage_favorites';
  public readonly description = 'List, add or remove favourite folders';
  public readonly inputSchema = manageFavoritesSchema;
  public readonly jsonSchema: JsonSchemaObject = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    type: 'object',
    properties: {
      action: {
        type: 'string',
        enum: ['list', 'add', 'remove']
      },
      path: {
        type: 'string',
        minLength: 1,
        description: 'Folder to add or remove'
      }
    },
    required: ['action'],
    additionalProperties: false
  };

  constructor(
    private readonly store: FavoritesStore,
    private readonly pathValidator: PathValidator
  ) {}

  public async handler(args: unknown): Promise<McpContent[]> {
    const parsed = this.inputSchema.safeParse(args);
    if (!parsed.success) {
      return createErrorResponse('managing favourites', formatIssues(parsed.error.issues), 'validation');
    }

    const request = parsed.data;
    switch (request.action) {
      case 'list':
        return this.list();
      case 'add':
        return this.add(request.path);
      case 'remove':
        return this.remove(request.path);
    }
  }

  private list(): McpContent[] {
    const favorites = this.store.getFavoriteFolders();
    if (favorites.length === 0) {
      return textResponse('No favourite folders saved.');
    }
    return textResponse(`Favourite folders (${favorites.length}):\n${favorites.map(entry => `- ${entry}`).join('\n')}`);
  }

  private add(candidate: string): McpContent[] {
    const result = this.pathValidator.validateDirectory(candidate);
    if (!result.isValid) {
      return createErrorResponse(
        'adding favourite',
        result.error,
        result.securityViolation ? 'security' : 'validation'
      );
    }

    const folder = result.validated.path;
    if (this.store.getFavoriteFolders().includes(folder)) {
      return textResponse(`Already a favourite: ${folder}`);
    }

    if (!this.store.addFavoriteFolder(result.validated)) {
      return createErrorResponse('adding favourite', `Could not save favourite ${folder}`, 'system');
    }
    return textResponse(`Added favourite: ${folder}`);
  }

  private remove(candidate: string): McpContent[] {
    const favorites = this.store.getFavoriteFolders();
    // Stored entries are resolved paths; accept either form
    const resolved = this.pathValidator.validateDirectory(candidate);
    const target = favorites.includes(candidate) || !resolved.isValid ? candidate : resolved.validated.path;

    if (!favorites.includes(target)) {
      return textResponse(`Not a favourite: ${candidate}`);
    }

    if (!this.store.removeFavoriteFolder(target)) {
      return createErrorResponse('removing favourite', `Could not save favourites after removing ${target}`, 'system');
    }
    return textResponse(`Removed favourite: ${target}`);
  }
}
