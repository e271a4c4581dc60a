import nock from 'nock';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { LokiMcpServer } from '../server.js';
import { Logger } from '../services/logger.js';
import { TEST_LOKI_URL, testConfig } from './helpers/test-config.js';

describe('LokiMcpServer', () => {
  let server: LokiMcpServer;
  let client: Client;
  let mockConsoleError: jest.SpyInstance;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(async () => {
    mockConsoleError = jest.spyOn(console, 'error').mockImplementation(() => {});
    server = new LokiMcpServer(testConfig({ enabled: false }), {
      diagnostics: new Logger({ logLevel: 'DEBUG', component: 'test', enableConsole: false })
    });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.shutdown();
    nock.cleanAll();
    mockConsoleError.mockRestore();
  });

  it('should list the Loki tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map(tool => tool.name)).toContain('loki_query_logs');
    expect(tools).toHaveLength(7);
  });

  it('should call a tool and return its result as text', async () => {
    nock(TEST_LOKI_URL).get('/loki/api/v1/labels').reply(200, { status: 'success', data: ['service', 'level'] });

    const result = await client.callTool({ name: 'loki_list_labels', arguments: {} });

    expect(result.content).toEqual([{ type: 'text', text: JSON.stringify({ labels: ['service', 'level'] }, null, 2) }]);
  });

  it('should answer an unknown tool with a method-not-found error', async () => {
    await expect(client.callTool({ name: 'missing_tool', arguments: {} })).rejects.toThrow('Unknown tool: missing_tool');
  });

  it('should turn tool failures into internal errors', async () => {
    nock(TEST_LOKI_URL).post('/loki/api/v1/push').reply(500, 'boom');

    await expect(
      client.callTool({ name: 'loki_push_logs', arguments: { logs: [{ message: 'x' }] } })
    ).rejects.toThrow('Tool execution failed: Failed to push logs to Loki');
  });

  it('should ignore cancellations that name no request', async () => {
    await expect(
      client.notification({ method: 'notifications/cancelled', params: { reason: 'user aborted' } })
    ).resolves.toBeUndefined();
    await client.notification({ method: 'notifications/cancelled', params: { requestId: 'unknown', reason: 'late' } });

    const { tools } = await client.listTools();
    expect(tools).toHaveLength(7);
  });

  it('should shut the pipeline down with the server', async () => {
    const integration = server.getIntegration();

    await server.shutdown();

    expect(integration.isInitialized).toBe(false);
  });
});
