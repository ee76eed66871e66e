/**
 * Unit tests for Graceful Shutdown Handler
 */

import http from 'http';
import { ShutdownHandler } from '../../../src/server/shutdown';
import { HealthCheck } from '../../../src/monitoring/health';
import { getLogger } from '../../../src/monitoring/logger';

function listening(): Promise<http.Server> {
  const server = http.createServer((_req, res) => {
    res.end('ok');
  });
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve(server));
  });
}

describe('ShutdownHandler', () => {
  const logger = getLogger();

  it('should drain health, close the server and release resources', async () => {
    const server = await listening();
    const healthCheck = new HealthCheck();
    const resource = { destroy: jest.fn() };
    const handler = new ShutdownHandler({ server, logger, healthCheck, resources: [resource] });

    await handler.shutdown();

    expect(handler.isShuttingDown()).toBe(true);
    expect(healthCheck.isServiceShuttingDown()).toBe(true);
    expect(server.listening).toBe(false);
    expect(resource.destroy).toHaveBeenCalledTimes(1);
  });

  it('should ignore a second shutdown request', async () => {
    const server = await listening();
    const resource = { destroy: jest.fn() };
    const handler = new ShutdownHandler({ server, logger, resources: [resource] });

    await Promise.all([handler.shutdown(), handler.shutdown()]);

    expect(resource.destroy).toHaveBeenCalledTimes(1);
  });

  it('should keep releasing resources when one fails', async () => {
    const server = await listening();
    const failing = {
      destroy: jest.fn(() => {
        throw new Error('already destroyed');
      }),
    };
    const healthy = { destroy: jest.fn() };
    const handler = new ShutdownHandler({ server, logger, resources: [failing, healthy] });

    await expect(handler.shutdown()).resolves.toBeUndefined();
    expect(healthy.destroy).toHaveBeenCalledTimes(1);
  });

  it('should release resources even when the server was not running', async () => {
    const server = http.createServer();
    const resource = { destroy: jest.fn() };
    const handler = new ShutdownHandler({ server, logger, resources: [resource] });

    await expect(handler.shutdown()).rejects.toThrow();
    expect(resource.destroy).toHaveBeenCalledTimes(1);
  });

  it('should default to a 30 second timeout', () => {
    expect(ShutdownHandler.getShutdownTimeout()).toBe(30000);
  });
});
