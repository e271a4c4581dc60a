import { LogShipper } from '../log-shipper.js';
import { LogBatcher } from '../log-batcher.js';
import { Logger } from '../logger.js';
import type { LogPusher } from '../../clients/loki-client.js';

const silentLogger = new Logger({ logLevel: 'DEBUG', component: 'test', enableConsole: false });

describe('LogShipper', () => {
  let pusher: LogPusher;
  let batcher: LogBatcher;
  let mockConsoleError: jest.SpyInstance;

  beforeEach(() => {
    pusher = { pushLogs: jest.fn().mockResolvedValue(true) };
    batcher = new LogBatcher(pusher, { maxBatchSize: 2, flushInterval: 60000, logger: silentLogger });
    mockConsoleError = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await batcher.shutdown();
    mockConsoleError.mockRestore();
  });

  it('should enqueue emitted events', () => {
    const shipper = new LogShipper(batcher, { enabled: true, minLevel: 'INFO' });

    shipper.emit({ message: 'hello', level: 'INFO' });

    expect(batcher.getBatchStatus().queueSize).toBe(1);
    expect(shipper.getHealthStatus().emitted).toBe(1);
  });

  it('should flush when an emit reaches capacity', async () => {
    const shipper = new LogShipper(batcher, { enabled: true, minLevel: 'INFO' });

    shipper.emit({ message: 'one' });
    shipper.emit({ message: 'two' });
    await batcher.drain();

    expect(pusher.pushLogs).toHaveBeenCalledTimes(1);
    expect(batcher.getBatchStatus().queueSize).toBe(0);
  });

  it('should skip events below the minimum level', () => {
    const shipper = new LogShipper(batcher, { enabled: true, minLevel: 'WARN' });

    shipper.emit({ message: 'chatty', level: 'DEBUG' });
    shipper.emit({ message: 'fine', level: 'INFO' });
    shipper.emit({ message: 'careful', level: 'WARN' });

    expect(batcher.getBatchStatus().queueSize).toBe(1);
  });

  it('should do nothing when disabled', () => {
    const shipper = new LogShipper(batcher, { enabled: false, minLevel: 'DEBUG' });

    shipper.emit({ message: 'ignored', level: 'ERROR' });

    expect(batcher.getBatchStatus().queueSize).toBe(0);
    expect(shipper.getHealthStatus().enabled).toBe(false);
  });

  it('should report a failing emit on stderr instead of throwing', () => {
    const shipper = new LogShipper(batcher, { enabled: true, minLevel: 'INFO' });
    jest.spyOn(batcher, 'enqueue').mockImplementation(() => {
      throw new Error('buffer exploded');
    });

    expect(() => shipper.emit({ message: 'boom' })).not.toThrow();
    expect(mockConsoleError).toHaveBeenCalledWith('Error in Loki handler: buffer exploded');
    expect(shipper.getHealthStatus().failures).toBe(1);
  });

  it('should emit asynchronously on a later turn', async () => {
    const shipper = new LogShipper(batcher, { enabled: true, minLevel: 'INFO' });

    shipper.emitAsync({ message: 'later' });
    expect(batcher.getBatchStatus().queueSize).toBe(0);

    await new Promise(resolve => setImmediate(resolve));
    expect(batcher.getBatchStatus().queueSize).toBe(1);
  });

  it('should flush explicitly', async () => {
    const shipper = new LogShipper(batcher, { enabled: true, minLevel: 'INFO' });
    shipper.emit({ message: 'single' });

    shipper.flush();
    await batcher.drain();

    expect(pusher.pushLogs).toHaveBeenCalledTimes(1);
  });

  it('should stop accepting events and drain on shutdown', async () => {
    const shipper = new LogShipper(batcher, { enabled: true, minLevel: 'INFO' });
    shipper.emit({ message: 'last' });

    await shipper.shutdown();
    shipper.emit({ message: 'after' });

    const status = shipper.getHealthStatus();
    expect(status.enabled).toBe(false);
    expect(status.batcher.deliveredRecords).toBe(1);
    expect(status.batcher.queueSize).toBe(0);
  });
});
