import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { Logger } from '../services/logger.js';
import { HealthMonitor } from '../services/health.js';
import { LokiIntegration } from '../services/loki-integration.js';
import { RequestContext } from '../services/request-tracker.js';
import { recordFromPayload } from '../services/log-record.js';
import { COMMON_PATTERNS, LOGQL_GUIDE_URL, exampleQueries } from './query-examples.js';

export interface ToolResult {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
}

const isoDate = z
  .string()
  .refine(value => !Number.isNaN(Date.parse(value)), { message: 'Expected an ISO 8601 date' })
  .transform(value => new Date(value));

const queryLogsArgs = z.object({
  query: z.string().min(1),
  start: isoDate.optional(),
  end: isoDate.optional(),
  limit: z.number().int().min(1).max(5000).default(100),
  direction: z.enum(['forward', 'backward']).default('backward')
});

const queryRecentArgs = z.object({
  query: z.string().min(1),
  hours: z.number().int().min(1).max(168).default(1),
  limit: z.number().int().min(1).max(1000).default(100)
});

const pushLogsArgs = z.object({
  logs: z.array(z.record(z.unknown())).min(1),
  labels: z.record(z.string()).optional()
});

const SUPPORTED_TOOLS = [
  'loki_query_logs',
  'loki_query_recent',
  'loki_push_logs',
  'loki_list_labels',
  'loki_health',
  'loki_test_integration',
  'loki_query_examples'
] as const;

type LokiToolName = (typeof SUPPORTED_TOOLS)[number];

export class LokiTools {
  private integration: LokiIntegration;
  private health: HealthMonitor;
  private logger: Logger;
  private serviceName: string;

  constructor(integration: LokiIntegration, health: HealthMonitor, logger: Logger, serviceName: string) {
    this.integration = integration;
    this.health = health;
    this.logger = logger;
    this.serviceName = serviceName;
  }

  getToolDefinitions(): Tool[] {
    return [
      {
        name: 'loki_query_logs',
        description: 'Query logs from Loki with a LogQL expression over an optional time range',
        inputSchema: {
          type: 'object',
          properties: {
            query: {
              type: 'string',
              description: 'LogQL query, e.g. {service="api"} |= "ERROR"'
            },
            start: {
              type: 'string',
              description: 'Range start (ISO 8601). Loki applies its default window when omitted'
            },
            end: {
              type: 'string',
              description: 'Range end (ISO 8601)'
            },
            limit: {
              type: 'number',
              description: 'Maximum number of entries to return (1-5000, default 100)'
            },
            direction: {
              type: 'string',
              enum: ['forward', 'backward'],
              description: 'Sort order for entries (default backward)'
            }
          },
          required: ['query']
        }
      },
      {
        name: 'loki_query_recent',
        description: 'Query logs from the last N hours',
        inputSchema: {
          type: 'object',
          properties: {
            query: {
              type: 'string',
              description: 'LogQL query string'
            },
            hours: {
              type: 'number',
              description: 'Number of hours to look back (1-168, default 1)'
            },
            limit: {
              type: 'number',
              description: 'Maximum number of entries (1-1000, default 100)'
            }
          },
          required: ['query']
        }
      },
      {
        name: 'loki_push_logs',
        description: 'Push log entries to Loki. Each entry takes a message and an optional timestamp',
        inputSchema: {
          type: 'object',
          properties: {
            logs: {
              type: 'array',
              items: { type: 'object' },
              description: 'Entries such as {"message": "...", "timestamp": "2024-01-01T00:00:00Z", "level": "INFO"}'
            },
            labels: {
              type: 'object',
              additionalProperties: { type: 'string' },
              description: 'Stream labels added to the default service/environment/instance labels'
            }
          },
          required: ['logs']
        }
      },
      {
        name: 'loki_list_labels',
        description: 'List label names known to Loki',
        inputSchema: { type: 'object', properties: {} }
      },
      {
        name: 'loki_health',
        description: 'Check the health of Loki and Grafana',
        inputSchema: { type: 'object', properties: {} }
      },
      {
        name: 'loki_test_integration',
        description: 'Run a health check and push a test log entry',
        inputSchema: { type: 'object', properties: {} }
      },
      {
        name: 'loki_query_examples',
        description: 'Example LogQL queries for common use cases',
        inputSchema: { type: 'object', properties: {} }
      }
    ];
  }

  canHandle(toolName: string): toolName is LokiToolName {
    return SUPPORTED_TOOLS.some(tool => tool === toolName);
  }

  async executeTool(name: string, args: unknown, context?: RequestContext): Promise<ToolResult> {
    const startTime = Date.now();

    if (!this.canHandle(name)) {
      this.logger.error('TOOL_ERROR', 'Unknown tool requested', {
        tool: name,
        supportedTools: SUPPORTED_TOOLS
      });
      throw new Error(`Unknown tool: ${name}`);
    }

    this.logger.logToolStart(name, args);

    try {
      const result = await this.run(name, args ?? {}, context?.abortController.signal);
      this.logger.logToolSuccess(name, Date.now() - startTime, result);
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }]
      };
    } catch (error) {
      const duration = Date.now() - startTime;
      if (context?.abortController.signal.aborted) {
        this.logger.info('TOOL_CANCELLED', 'Tool execution cancelled', {
          tool: name,
          duration_ms: duration,
          requestId: context.requestId
        });
      } else {
        this.logger.logToolError(name, error, duration, args);
      }
      throw error;
    }
  }

  private async run(name: LokiToolName, args: unknown, signal?: AbortSignal): Promise<unknown> {
    switch (name) {
      case 'loki_query_logs': {
        const { query, start, end, limit, direction } = parseArgs(queryLogsArgs, args);
        const result = await this.integration.getClient().queryLogs(query, { start, end, limit, direction, signal });
        if (result === null) {
          throw new Error('Failed to query logs from Loki');
        }
        return result;
      }

      case 'loki_query_recent': {
        const { query, hours, limit } = parseArgs(queryRecentArgs, args);
        const end = new Date();
        const start = new Date(end.getTime() - hours * 3600 * 1000);
        const result = await this.integration
          .getClient()
          .queryLogs(query, { start, end, limit, direction: 'backward', signal });
        if (result === null) {
          throw new Error('Failed to query logs from Loki');
        }
        return result;
      }

      case 'loki_push_logs': {
        const { logs, labels } = parseArgs(pushLogsArgs, args);
        const now = new Date();
        const records = logs.map(log => recordFromPayload('timestamp' in log ? log : { ...log, timestamp: now }));
        const pushed = await this.integration.getClient().pushLogs(records, labels);
        if (!pushed) {
          throw new Error('Failed to push logs to Loki');
        }
        return { status: 'success', logs_pushed: records.length };
      }

      case 'loki_list_labels': {
        const labels = await this.integration.getClient().getLabels();
        if (labels === null) {
          throw new Error('Failed to retrieve labels from Loki');
        }
        return { labels };
      }

      case 'loki_health':
        return this.health.checkAll();

      case 'loki_test_integration': {
        const client = this.integration.getClient();
        const healthy = await client.healthCheck();
        const now = new Date();
        const pushed = await client.pushLogs(
          [
            recordFromPayload({
              timestamp: now,
              message: `Test log from loki_test_integration - ${now.toISOString()}`,
              level: 'INFO',
              source: 'loki_tools_test'
            })
          ],
          { test: 'mcp', source: 'integration_test' }
        );
        return {
          loki_healthy: healthy,
          test_log_pushed: pushed,
          test_timestamp: now.toISOString(),
          message: 'Loki integration test completed'
        };
      }

      case 'loki_query_examples':
        return {
          examples: exampleQueries(this.serviceName),
          documentation: {
            logql_guide: LOGQL_GUIDE_URL,
            common_patterns: COMMON_PATTERNS
          }
        };
    }
  }
}

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
    throw new Error(`Invalid arguments: ${details.join('; ')}`);
  }
  return parsed.data;
}
