import { describe, test, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { PageDistillServer } from '../../src/server';
import { InitializationService } from '../../src/services/initialization';
import { TransportManager } from '../../src/transport/manager';

// Mock dependencies
jest.mock('../../src/services/initialization');
jest.mock('../../src/transport/manager');

describe('PageDistillServer', () => {
  let server: PageDistillServer;
  const mockInitService = {
    initialize: jest.fn<() => Promise<void>>(),
  };
  const mockTransportManager = {
    connect: jest.fn<TransportManager['connect']>(),
    close: jest.fn<() => Promise<void>>(),
  };

  beforeEach(() => {
    jest.clearAllMocks();

    jest.mocked(InitializationService).mockImplementation(() => mockInitService);
    jest.mocked(TransportManager).mockImplementation(() => mockTransportManager);

    server = new PageDistillServer();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should initialize successfully', async () => {
    mockInitService.initialize.mockResolvedValue(undefined);
    await expect(server.initialize()).resolves.toBeUndefined();
    expect(mockInitService.initialize).toHaveBeenCalledTimes(1);
  });

  test('should connect successfully', async () => {
    mockTransportManager.connect.mockResolvedValue(undefined);
    await server.connect();
    expect(mockTransportManager.connect).toHaveBeenCalledTimes(1);
  });

  test('should close the transport', async () => {
    mockTransportManager.close.mockResolvedValue(undefined);
    await server.close();
    expect(mockTransportManager.close).toHaveBeenCalledTimes(1);
  });

  test('should initialize before connecting on start', async () => {
    const order: string[] = [];
    mockInitService.initialize.mockImplementation(async () => {
      order.push('initialize');
    });
    mockTransportManager.connect.mockImplementation(async () => {
      order.push('connect');
    });

    await server.start();

    expect(order).toEqual(['initialize', 'connect']);
  });

  test('should exit when start fails', async () => {
    mockInitService.initialize.mockRejectedValue(new Error('Environment validation failed'));
    const exitSpy = jest.spyOn(process, 'exit').mockImplementation(code => {
      throw new Error(`process.exit(${String(code)})`);
    });

    await expect(server.start()).rejects.toThrow('process.exit(1)');
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(mockTransportManager.connect).not.toHaveBeenCalled();
  });
});
