import express from 'express';
import request from 'supertest';
import { HealthCheck } from '../../../src/monitoring/health';
import { InMemoryDynamoDB } from '../../helpers/in-memory-dynamodb';

describe('HealthCheck', () => {
  let healthCheck: HealthCheck;

  beforeEach(() => {
    healthCheck = new HealthCheck();
  });

  describe('performHealthChecks', () => {
    it('should return healthy status when all checks pass', async () => {
      const result = await healthCheck.performHealthChecks();

      expect(result.status).toBe('healthy');
      expect(result.checks).toEqual({ server: { status: 'pass' } });
    });

    it('should return unhealthy status when service is shutting down', async () => {
      healthCheck.markShuttingDown();

      const result = await healthCheck.performHealthChecks();

      expect(result.status).toBe('unhealthy');
      expect(result.checks).toEqual({
        shutdown: { status: 'fail', message: 'Service is shutting down' },
      });
    });

    it('should report a check that throws', async () => {
      healthCheck.registerCheck('error-check', async () => {
        throw new Error('Check failed');
      });

      const result = await healthCheck.performHealthChecks();

      expect(result.status).toBe('unhealthy');
      expect(result.checks['error-check']).toEqual({ status: 'fail', message: 'Check failed' });
    });
  });

  describe('registerDynamoDBCheck', () => {
    it('should pass while the store answers', async () => {
      healthCheck.registerDynamoDBCheck(new InMemoryDynamoDB());

      const result = await healthCheck.performHealthChecks();

      expect(result.checks.dynamodb).toEqual({ status: 'pass' });
    });

    it('should fail when the store is unreachable', async () => {
      const db = new InMemoryDynamoDB();
      db.failOn('getItem', new Error('connect ECONNREFUSED'));
      healthCheck.registerDynamoDBCheck(db);

      const result = await healthCheck.performHealthChecks();

      expect(result.status).toBe('unhealthy');
      expect(result.checks.dynamodb).toEqual({ status: 'fail' });
    });
  });

  describe('handleHealthCheck', () => {
    function appFor(check: HealthCheck) {
      const app = express();
      app.get('/health', (req, res) => check.handleHealthCheck(req, res));
      return app;
    }

    it('should return 200 when healthy', async () => {
      const response = await request(appFor(healthCheck)).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
    });

    it('should return 503 when shutting down', async () => {
      healthCheck.markShuttingDown();

      const response = await request(appFor(healthCheck)).get('/health');

      expect(response.status).toBe(503);
      expect(response.body.checks.shutdown).toEqual({
        status: 'fail',
        message: 'Service is shutting down',
      });
    });
  });
});
