import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from './logger/index.js';
import type { Config } from './config/schema.js';
import { LifecycleManager, type LifecycleOptions } from './lifecycle/index.js';
import { HealthManager, registerServerChecks } from './health/index.js';
import { ErrorCode, MCPError, toError } from './errors/index.js';
import type { PriceTable } from './pricing/price-table.js';
import type { ServerIdentity, TopologyServerCapabilities } from './types/mcp.js';
import { listAllResources, readResource, type ResourceContext } from './resources/index.js';
import { listAllTools, callTool, createToolContext, type ToolContext } from './tools/index.js';

/**
 * Topology Cost MCP Server
 * Main server class that coordinates all MCP protocol operations
 */
export class TopologyCostMCPServer {
  private server: Server;
  private logger: Logger;
  private config: Config;
  private lifecycle: LifecycleManager;
  private health: HealthManager;
  private toolContext: ToolContext;
  private resourceContext: ResourceContext;
  private transport?: Transport;

  constructor(config: Config, logger: Logger, priceTable: PriceTable, lifecycleOptions: LifecycleOptions = {}) {
    this.config = config;
    this.logger = logger;
    this.toolContext = createToolContext(priceTable, config, logger);
    this.health = new HealthManager(logger);
    this.resourceContext = { priceTable, config, health: this.health };

    const identity: ServerIdentity = {
      name: config.mcp.serverName,
      version: config.mcp.serverVersion,
    };
    const capabilities: TopologyServerCapabilities = {
      resources: {
        listChanged: false,
      },
      tools: {
        listChanged: false,
      },
    };
    this.server = new Server(identity, { capabilities });

    this.lifecycle = new LifecycleManager(logger, lifecycleOptions);
    registerServerChecks(this.health, config, priceTable);

    this.setupLifecycleHooks();
    this.setupMCPHandlers();
  }

  /**
   * Setup lifecycle hooks
   */
  private setupLifecycleHooks(): void {
    this.lifecycle.onStartup('initialize-server', async () => {
      this.logger.info('Initializing MCP server', {
        name: this.config.mcp.serverName,
        version: this.config.mcp.serverVersion,
        machineTypes: this.toolContext.priceTable.size,
        region: this.toolContext.priceTable.metadata.region,
      });
    });

    this.lifecycle.onStartup('start-health-checks', async () => {
      if (this.config.performance.enableHealthChecks) {
        this.health.startPeriodicChecks(this.config.performance.healthCheckInterval);
      }
    });

    this.lifecycle.onShutdown('stop-health-checks', async () => {
      this.health.stopPeriodicChecks();
    });

    this.lifecycle.onShutdown('close-transport', async () => {
      if (this.transport) {
        this.logger.info('Closing MCP transport');
        await this.server.close();
      }
    });
  }

  /**
   * Setup MCP protocol handlers
   */
  private setupMCPHandlers(): void {
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      this.logger.debug('Received list_resources request');
      return { resources: listAllResources() };
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const uri = request.params.uri;
      this.logger.debug('Received read_resource request', { uri });

      try {
        const contents = await readResource(uri, this.resourceContext);
        return { contents };
      } catch (error) {
        const cause = toError(error);
        this.logger.error('Failed to read resource', cause, { uri });
        throw new MCPError(`Failed to read resource ${uri}: ${cause.message}`, ErrorCode.MCP_INVALID_PARAMS, { uri }, cause);
      }
    });

    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      this.logger.debug('Received list_tools request');
      return { tools: listAllTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const toolName = request.params.name;
      const args = request.params.arguments;

      this.logger.debug('Received call_tool request', { tool: toolName });

      try {
        return await callTool(toolName, args, this.toolContext);
      } catch (error) {
        const cause = toError(error);
        this.logger.error('Failed to call tool', cause, { tool: toolName });
        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify({
              error: `Failed to execute tool ${toolName}`,
              message: cause.message,
            }, null, 2),
          }],
          isError: true,
        };
      }
    });
  }

  /**
   * Connect the MCP server to a transport
   */
  async connect(transport: Transport): Promise<void> {
    this.transport = transport;
    await this.server.connect(transport);
  }

  /**
   * Start the MCP server
   */
  async start(): Promise<void> {
    try {
      await this.lifecycle.startup();

      if (this.config.mcp.transport === 'stdio') {
        this.logger.info('Starting MCP server with stdio transport');
        await this.connect(new StdioServerTransport());
        this.logger.info('MCP server started successfully');
      } else {
        throw new MCPError(`Unsupported transport: ${String(this.config.mcp.transport)}`, ErrorCode.INITIALIZATION_ERROR);
      }
    } catch (error) {
      this.logger.error('Failed to start MCP server', toError(error));
      throw error;
    }
  }

  /**
   * Get server instance
   */
  getServer(): Server {
    return this.server;
  }

  /**
   * Get health manager
   */
  getHealth(): HealthManager {
    return this.health;
  }

  /**
   * Get lifecycle manager
   */
  getLifecycle(): LifecycleManager {
    return this.lifecycle;
  }
}
