#!/usr/bin/env node

/**
 * Active Folder Launcher Entry Point
 * Starts the MCP server over stdio
 */

import { ActiveFolderLauncherServer } from './server/ActiveFolderLauncherServer';

async function main(): Promise<void> {
  const server = new ActiveFolderLauncherServer();
  server.setupGracefulShutdown();
  await server.start();
}

// Only run if this file is executed directly
if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error starting active folder launcher:', error);
    process.exit(1);
  });
}

export { ActiveFolderLauncherServer } from './server/ActiveFolderLauncherServer';
export { ConfigurationManager } from './config/ConfigurationManager';
export { PathValidator } from './security/PathValidator';
export { CommandValidator } from './security/CommandValidator';
export { EnvironmentProbe } from './environment/EnvironmentProbe';
export { LocationResolver } from './resolution/LocationResolver';
export { ResolutionService, FALLBACK_EDITORS } from './resolution/ResolutionService';
export { EditorLauncher } from './launcher/EditorLauncher';
export { ProcessLauncher } from './launcher/ProcessLauncher';
export * from './errors/LauncherErrors';
