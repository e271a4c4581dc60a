import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  CancelledNotificationSchema
} from '@modelcontextprotocol/sdk/types.js';
import { ServerConfig } from './config.js';
import { HealthMonitor } from './services/health.js';
import { LokiIntegration, LokiIntegrationOptions } from './services/loki-integration.js';
import { Logger } from './services/logger.js';
import { RequestTracker } from './services/request-tracker.js';
import { LokiTools } from './tools/loki-tools.js';

export const SERVER_NAME = 'loki-mcp';
export const SERVER_VERSION = '1.0.0';

export class LokiMcpServer {
  private server: Server;
  private integration: LokiIntegration;
  private logger: Logger;
  private requestTracker: RequestTracker;
  private lokiTools: LokiTools;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private stopped = false;

  constructor(config: ServerConfig, options: LokiIntegrationOptions = {}) {
    // Logging first: everything below logs through the shipper
    this.integration = new LokiIntegration(config, options).initialize();
    this.logger = this.integration.createLogger('server');

    this.logger.info('SERVER_INIT', 'MCP server initializing', {
      serverName: SERVER_NAME,
      lokiUrl: config.loki.url,
      logShippingEnabled: config.shipping.enabled,
      logLevel: config.logLevel
    });

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION
      },
      {
        capabilities: {
          tools: {}
        }
      }
    );

    this.requestTracker = new RequestTracker(this.logger);

    const health = new HealthMonitor({
      lokiUrl: config.loki.url,
      grafanaUrl: config.grafana.url,
      grafanaUser: config.grafana.adminUser,
      grafanaPassword: config.grafana.adminPassword,
      timeout: config.loki.healthTimeout,
      logger: this.logger.child('health')
    });
    this.lokiTools = new LokiTools(this.integration, health, this.logger.child('tools'), config.labels.service);

    this.setupHandlers();
    this.setupNotificationHandlers();
  }

  getIntegration(): LokiIntegration {
    return this.integration;
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.lokiTools.getToolDefinitions() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name, arguments: args } = request.params;
      const requestId = extra.requestId;

      if (!this.lokiTools.canHandle(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      const context = this.requestTracker.registerRequest(requestId, name);

      try {
        return await this.lokiTools.executeTool(name, args, context);
      } catch (error) {
        if (context.abortController.signal.aborted) {
          throw new McpError(ErrorCode.InternalError, 'Request was cancelled');
        }
        if (error instanceof McpError) {
          throw error;
        }
        throw new McpError(
          ErrorCode.InternalError,
          `Tool execution failed: ${error instanceof Error ? error.message : String(error)}`
        );
      } finally {
        this.requestTracker.cleanup(requestId);
      }
    });
  }

  private setupNotificationHandlers() {
    this.server.setNotificationHandler(CancelledNotificationSchema, async notification => {
      const { requestId, reason } = notification.params;

      if (requestId === undefined) {
        this.logger.debug('CANCELLATION_IGNORED', 'Cancellation without a request id', { reason });
        return;
      }

      this.logger.info('CANCELLATION_RECEIVED', 'Received cancellation notification', {
        requestId,
        reason
      });

      if (!this.requestTracker.cancelRequest(requestId, reason)) {
        this.logger.debug('CANCELLATION_IGNORED', 'Cancellation ignored - request not found or already completed', {
          requestId
        });
      }
    });
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);

    this.cleanupTimer = setInterval(() => {
      this.requestTracker.cleanupStaleRequests();
    }, 60000);
    this.cleanupTimer.unref();
  }

  async run(): Promise<void> {
    await this.connect(new StdioServerTransport());

    this.logger.info('SERVER_START', 'MCP server started successfully', {
      serverName: SERVER_NAME,
      transport: 'stdio'
    });

    const shutdown = async () => {
      await this.shutdown();
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch(error => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  }

  /**
   * Stop tracking requests, close the transport, then flush and release the
   * Loki pipeline
   */
  async shutdown(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    this.logger.info('SERVER_SHUTDOWN', 'MCP server shutting down', {
      serverName: SERVER_NAME
    });

    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.requestTracker.shutdown();
    await this.server.close();
    await this.integration.shutdown();
  }
}
