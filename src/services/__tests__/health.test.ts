import nock from 'nock';
import { HealthMonitor } from '../health.js';
import { Logger } from '../logger.js';

const LOKI_URL = 'http://loki.test:3100';
const GRAFANA_URL = 'http://grafana.test:3000';

describe('HealthMonitor', () => {
  let monitor: HealthMonitor;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    monitor = new HealthMonitor({
      lokiUrl: `${LOKI_URL}/`,
      grafanaUrl: GRAFANA_URL,
      grafanaUser: 'admin',
      grafanaPassword: 'test-secret',
      timeout: 200,
      logger: new Logger({ logLevel: 'DEBUG', component: 'test', enableConsole: false })
    });
  });

  afterEach(() => {
    nock.cleanAll();
  });

  describe('checkLoki', () => {
    it('should report a ready Loki as up', async () => {
      nock(LOKI_URL).get('/ready').reply(200, 'ready\n');

      expect(await monitor.checkLoki()).toEqual({
        service: 'loki',
        status: 'up',
        statusCode: 200,
        details: { response: 'ready' }
      });
    });

    it('should report a starting Loki as down', async () => {
      nock(LOKI_URL).get('/ready').reply(503, 'Ingester not ready');

      expect(await monitor.checkLoki()).toEqual({
        service: 'loki',
        status: 'down',
        statusCode: 503,
        details: { response: 'Ingester not ready' }
      });
    });

    it('should report a timeout as down', async () => {
      nock(LOKI_URL).get('/ready').delay(1000).reply(200, 'ready');

      expect(await monitor.checkLoki()).toEqual({
        service: 'loki',
        status: 'down',
        error: 'Request timed out after 200ms'
      });
    });

    it('should report a connection failure as down', async () => {
      nock(LOKI_URL).get('/ready').replyWithError('connect ECONNREFUSED');

      const health = await monitor.checkLoki();
      expect(health.status).toBe('down');
      expect(health.error).toBe('connect ECONNREFUSED');
    });
  });

  describe('checkGrafana', () => {
    it('should send basic auth and parse JSON details', async () => {
      nock(GRAFANA_URL)
        .get('/api/health')
        .basicAuth({ user: 'admin', pass: 'test-secret' })
        .reply(200, { database: 'ok', version: '10.0.0' }, { 'Content-Type': 'application/json' });

      expect(await monitor.checkGrafana()).toEqual({
        service: 'grafana',
        status: 'up',
        statusCode: 200,
        details: { database: 'ok', version: '10.0.0' }
      });
    });

    it('should keep a non-JSON body as text', async () => {
      nock(GRAFANA_URL).get('/api/health').reply(401, 'Unauthorized', { 'Content-Type': 'text/plain' });

      expect(await monitor.checkGrafana()).toEqual({
        service: 'grafana',
        status: 'down',
        statusCode: 401,
        details: { response: 'Unauthorized' }
      });
    });
  });

  it('should check both services', async () => {
    nock(LOKI_URL).get('/ready').reply(200, 'ready');
    nock(GRAFANA_URL).get('/api/health').reply(200, '{}', { 'Content-Type': 'application/json' });

    const results = await monitor.checkAll();

    expect(results.map(result => [result.service, result.status])).toEqual([
      ['loki', 'up'],
      ['grafana', 'up']
    ]);
  });
});
