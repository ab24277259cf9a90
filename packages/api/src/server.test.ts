import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { DEFAULT_CONFIG } from './config.js';
import { createServer } from './server.js';

const customer = (name: string, idType: string) => ({
  name,
  version: '1.0',
  entities: [{ name: 'Customer', properties: [{ name: 'CustomerId', data_type: idType }] }],
});

describe('API server', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = createServer({
      config: {
        ...DEFAULT_CONFIG,
        server: { ...DEFAULT_CONFIG.server, log_level: 'silent' },
        merge: { default_strategy: 'theirs' },
      },
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('GET /health', () => {
    it('should report ok', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('ok');
    });

    it('should echo the correlation id', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-correlation-id': 'corr-123' },
      });

      expect(response.headers['x-correlation-id']).toBe('corr-123');
    });
  });

  describe('POST /diff', () => {
    it('should return the report with its renderings', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/diff',
        payload: {
          source: customer('Sales', 'Integer'),
          target: { ...customer('Sales', 'String'), version: '1.1' },
        },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.has_changes).toBe(true);
      expect(body.report.summary.total_changes).toBe(1);
      expect(body.report.changes[0]).toEqual({
        change_type: 'modified',
        element_type: 'property',
        element_name: 'CustomerId',
        path: 'Customer.CustomerId.data_type',
        old_value: 'Integer',
        new_value: 'String',
        details: 'Data type changed',
      });
      expect(body.changelog).toContain('# Changelog: Sales → Sales');
      expect(body.unified_diff).toContain('+property: Customer.CustomerId.data_type = String');
    });

    it('should report no changes for identical models', async () => {
      const model = customer('Sales', 'Integer');
      const response = await app.inject({ method: 'POST', url: '/diff', payload: { source: model, target: model } });

      expect(response.statusCode).toBe(200);
      expect(response.json().has_changes).toBe(false);
      expect(response.json().unified_diff).toBe('');
    });

    it('should reject a body without a target', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/diff',
        payload: { source: customer('Sales', 'Integer') },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('Validation Error');
    });

    it('should name the model that failed validation', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/diff',
        payload: { source: customer('Sales', 'Integer'), target: { entities: [] } },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().field).toBe('target/name');
    });
  });

  describe('POST /merge', () => {
    const base = { name: 'Base', version: '1.0', entities: [{ name: 'Customer', description: 'Buyer' }] };
    const ours = { name: 'Ours', version: '1.0', entities: [{ name: 'Customer', description: 'Paying buyer' }] };
    const theirs = { name: 'Theirs', version: '1.0', entities: [{ name: 'Customer', description: 'Account holder' }] };

    it('should use the configured default strategy', async () => {
      const response = await app.inject({ method: 'POST', url: '/merge', payload: { base, ours, theirs } });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.new_version).toBe('1.1');
      expect(body.conflicts_count).toBe(1);
      expect(body.conflicts[0]).toEqual({
        path: 'Customer.description',
        element_type: 'entity',
        resolution: 'theirs',
        ours_value: 'Paying buyer',
        theirs_value: 'Account holder',
      });
      expect(body.merged.entities[0].description).toBe('Account holder');
      expect(body.merged.metadata.merged_from).toEqual(['Ours', 'Theirs']);
    });

    it('should honor an explicit strategy', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/merge',
        payload: { base, ours, theirs, strategy: 'ours' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().merged.entities[0].description).toBe('Paying buyer');
    });

    it('should reject an unknown strategy', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/merge',
        payload: { base, ours, theirs, strategy: 'manual' },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('POST /analyze', () => {
    it('should return the semantic debt report', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/analyze',
        payload: {
          models: { Sales: customer('Sales', 'Integer'), Finance: customer('Finance', 'String') },
        },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.report.models_analyzed).toEqual(['Sales', 'Finance']);
      expect(body.report.summary.critical).toBe(1);
      expect(body.report.conflicts[0].name).toBe('Customer.CustomerId');
      expect(body.markdown).toContain('## Critical Conflicts');
    });

    it('should answer 422 for a single model', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/analyze',
        payload: { models: { Sales: customer('Sales', 'Integer') } },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        error: 'Insufficient Input',
        message: 'Need at least 2 models for comparison, received 1',
        required: 2,
        received: 1,
      });
    });

    it('should reject a threshold above 1', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/analyze',
        payload: {
          models: { Sales: customer('Sales', 'Integer'), Finance: customer('Finance', 'String') },
          similarity_threshold: 2,
        },
      });

      expect(response.statusCode).toBe(400);
    });
  });
});
