/**
 * ActiveFolderLauncherServer Class
 * MCP stdio server exposing folder detection and editor launching as tools
 */

import * as os from 'os';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { EditorProcessLauncher, LauncherTool, McpContent, McpServerConfig } from '../types/index';
import { ConfigurationManager } from '../config/ConfigurationManager';
import { Logger } from '../logging/Logger';
import { PathValidator } from '../security/PathValidator';
import { CommandValidator } from '../security/CommandValidator';
import { EnvironmentProbe } from '../environment/EnvironmentProbe';
import { ToolRunner } from '../environment/ToolRunner';
import type { CommandRunner } from '../environment/ToolRunner';
import { WindowQueryTool } from '../desktop/WindowQueryTool';
import { MessageBusTool } from '../desktop/MessageBusTool';
import { WindowPropertyTool } from '../desktop/WindowPropertyTool';
import { FolderNameSearch } from '../detection/FolderNameSearch';
import { TitleExtractor } from '../detection/TitleExtractor';
import { WindowPropertyScanner } from '../detection/WindowPropertyScanner';
import { DbusLocationStrategy } from '../detection/strategies/DbusLocationStrategy';
import { ActiveWindowStrategy } from '../detection/strategies/ActiveWindowStrategy';
import { FallbackStrategy } from '../detection/strategies/FallbackStrategy';
import { LocationResolver } from '../resolution/LocationResolver';
import { ResolutionService } from '../resolution/ResolutionService';
import { ProcessLauncher } from '../launcher/ProcessLauncher';
import { EditorLauncher } from '../launcher/EditorLauncher';
import { DetectActiveFolderTool } from '../tools/DetectActiveFolderTool';
import { ValidateEditorCommandTool } from '../tools/ValidateEditorCommandTool';
import { OpenActiveFolderTool } from '../tools/OpenActiveFolderTool';
import { OpenFolderTool } from '../tools/OpenFolderTool';
import { ManageFavoritesTool } from '../tools/ManageFavoritesTool';
import { EnvironmentReportTool } from '../tools/EnvironmentReportTool';
import { createErrorResponse } from '../tools/responses';
import { errorMessage } from '../errors/LauncherErrors';

export const SERVER_INFO: McpServerConfig = {
  name: 'active-folder-launcher',
  version: '1.0.0',
  transport: 'stdio'
};

/**
 * Collaborators that tests replace with in-process fakes
 */
export interface ServerDependencies {
  configManager?: ConfigurationManager;
  env?: NodeJS.ProcessEnv;
  homeDirectory?: string;
  commandRunner?: CommandRunner;
  processLauncher?: EditorProcessLauncher;
  pathValidator?: PathValidator;
  commandValidator?: CommandValidator;
  getWorkingDirectory?: () => string;
}

export class ActiveFolderLauncherServer {
  private readonly server: Server;
  private readonly configManager: ConfigurationManager;
  private readonly logger: Logger;
  private readonly probe: EnvironmentProbe;
  private readonly pathValidator: PathValidator;
  private readonly commandValidator: CommandValidator;
  private readonly resolutionService: ResolutionService;
  private readonly editorLauncher: EditorLauncher;
  private readonly tools: Map<string, LauncherTool>;

  constructor(dependencies: ServerDependencies = {}) {
    this.configManager = dependencies.configManager ?? ConfigurationManager.getInstance();
    const config = this.configManager.getConfiguration();
    this.logger = Logger.fromConfiguration(config, 'Server');

    const env = dependencies.env ?? process.env;
    const homeDirectory = dependencies.homeDirectory ?? os.homedir();

    this.server = new Server(
      {
        name: SERVER_INFO.name,
        version: SERVER_INFO.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    // Security components
    this.probe = new EnvironmentProbe(env);
    this.pathValidator = dependencies.pathValidator ??
      new PathValidator({ homeDirectory }, this.logger.child('PathValidator'));
    this.commandValidator = dependencies.commandValidator ??
      new CommandValidator({ locator: this.probe.getLocator() }, this.logger.child('CommandValidator'));

    // Desktop tool wrappers
    const toolRunner = new ToolRunner(dependencies.commandRunner, this.logger.child('ToolRunner'));
    const windowQuery = new WindowQueryTool(toolRunner, {
      toolTimeoutMs: config.toolTimeoutMs,
      focusTimeoutMs: config.focusTimeoutMs
    });
    const messageBus = new MessageBusTool(toolRunner, config.toolTimeoutMs);
    const propertyTool = new WindowPropertyTool(toolRunner, config.toolTimeoutMs);

    // Detection strategies, in priority order
    const environment = this.probe.snapshot();
    const folderSearch = new FolderNameSearch({ homeDirectory, logger: this.logger.child('FolderNameSearch') });
    const strategies = [
      new DbusLocationStrategy({
        environment,
        windowQuery,
        messageBus,
        fileManagerClass: config.fileManagerClass,
        logger: this.logger.child('DbusLocationStrategy')
      }),
      new ActiveWindowStrategy({
        environment,
        windowQuery,
        titleExtractor: new TitleExtractor({ homeDirectory, folderSearch }),
        propertyScanner: new WindowPropertyScanner(propertyTool),
        fileManagerClass: config.fileManagerClass,
        logger: this.logger.child('ActiveWindowStrategy')
      }),
      new FallbackStrategy({
        homeDirectory,
        getWorkingDirectory: dependencies.getWorkingDirectory,
        isUsable: candidate => this.pathValidator.validateDirectory(candidate).isValid
      })
    ];

    const resolver = new LocationResolver(
      strategies,
      this.pathValidator,
      { strategyTimeoutMs: config.strategyTimeoutMs },
      this.logger.child('LocationResolver')
    );
    this.resolutionService = new ResolutionService({
      resolver,
      pathValidator: this.pathValidator,
      commandValidator: this.commandValidator,
      logger: this.logger.child('ResolutionService')
    });

    const processLauncher = dependencies.processLauncher ??
      new ProcessLauncher({ timeoutMs: config.launchTimeoutMs }, this.logger.child('ProcessLauncher'));
    this.editorLauncher = new EditorLauncher(
      this.resolutionService,
      processLauncher,
      this.configManager,
      this.logger.child('EditorLauncher')
    );

    const tools: LauncherTool[] = [
      new DetectActiveFolderTool(this.resolutionService),
      new ValidateEditorCommandTool(this.commandValidator),
      new OpenActiveFolderTool(this.editorLauncher),
      new OpenFolderTool(this.editorLauncher),
      new ManageFavoritesTool(this.configManager, this.pathValidator),
      new EnvironmentReportTool(this.probe)
    ];
    this.tools = new Map(tools.map(tool => [tool.name, tool]));

    this.setupHandlers();
  }

  /**
   * Set up MCP request handlers
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [...this.tools.values()].map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.jsonSchema
      }))
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return { content: await this.callTool(name, args) };
    });
  }

  /**
   * Dispatches a tool call; unknown tools and unexpected failures come back as text
   */
  public async callTool(name: string, args: unknown): Promise<McpContent[]> {
    const tool = this.tools.get(name);
    if (!tool) {
      return createErrorResponse('calling tool', `Unknown tool: ${name}`, 'validation');
    }

    try {
      return await tool.handler(args ?? {});
    } catch (error) {
      this.logger.error(`Tool ${name} failed`, { error });
      return createErrorResponse(`running ${name}`, errorMessage(error), 'system');
    } finally {
      this.flushSecurityEvents();
    }
  }

  private flushSecurityEvents(): void {
    const events = [...this.pathValidator.getSecurityEvents(), ...this.commandValidator.getSecurityEvents()];
    if (events.length > 0) {
      this.logger.warn('Security events during tool call', { events });
      this.pathValidator.clearSecurityEvents();
      this.commandValidator.clearSecurityEvents();
    }
  }

  /**
   * Set up graceful shutdown handling
   */
  public setupGracefulShutdown(): void {
    const shutdown = async (signal: string): Promise<void> => {
      this.logger.info(`Received ${signal}, shutting down gracefully...`);

      try {
        await this.server.close();
        this.logger.info('Server closed successfully');
        process.exit(0);
      } catch (error) {
        this.logger.error('Error during shutdown', { error });
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  }

  /**
   * Logs configuration problems and the environment report
   */
  public logStartupDiagnostics(): void {
    const metadata = this.configManager.getConfigurationWithMetadata();

    for (const error of metadata.errors) {
      this.logger.error(`Configuration error: ${error}`);
    }
    for (const warning of metadata.warnings) {
      this.logger.warn(`Configuration warning: ${warning}`);
    }
    if (metadata.configFileLoaded) {
      this.logger.info(`Configuration loaded from: ${metadata.configFile}`);
    }

    // The report ends with the recommendations; those are logged as warnings
    const recommendations = new Set(this.probe.generateRecommendations());
    for (const line of this.probe.generateReport()) {
      if (recommendations.has(line)) {
        this.logger.warn(line);
      } else {
        this.logger.info(line);
      }
    }
  }

  /**
   * Start the MCP server with stdio transport
   */
  public async start(): Promise<void> {
    this.logStartupDiagnostics();

    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    this.logger.info(`${SERVER_INFO.name} started`, { tools: this.getToolNames() });
  }

  public getServer(): Server {
    return this.server;
  }

  public getToolNames(): string[] {
    return [...this.tools.keys()];
  }

  public getResolutionService(): ResolutionService {
    return this.resolutionService;
  }
}
