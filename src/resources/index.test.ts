/**
 * Unit tests for resources registry
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { listAllResources, readResource, isValidResourceURI, type ResourceContext } from './index.js';
import { ResourceError, ErrorCode } from '../errors/index.js';
import { HealthManager, HealthStatus } from '../health/index.js';
import { Logger } from '../logger/index.js';
import { bundledPriceTable, createTestConfig } from '../__tests__/utils.js';

async function readJson(uri: string, context: ResourceContext) {
  const [content] = await readResource(uri, context);
  return JSON.parse(content?.text ?? 'null');
}

describe('Resources Registry', () => {
  let context: ResourceContext;

  beforeEach(() => {
    const config = createTestConfig();
    context = { priceTable: bundledPriceTable(), config, health: new HealthManager(new Logger(config.logging)) };
  });

  it('should list the three resources', () => {
    expect(listAllResources().map(r => r.uri)).toEqual([
      'topology://server/info',
      'topology://pricing/table',
      'topology://catalog/node-kinds',
    ]);
  });

  it('should describe the server', async () => {
    const info = await readJson('topology://server/info', context);

    expect(info.name).toBe('topology-cost-mcp');
    expect(info.version).toBe('0.1.0');
    expect(info.tools).toHaveLength(10);
    expect(info.priceTable).toEqual({ provider: 'gcp', region: 'us-east4', offers: 29 });
    expect(info.health).toMatchObject({ status: 'healthy', ready: true, checks: {} });
  });

  it('should report failing health checks in the server info', async () => {
    context.health.registerCheck('price-table', async () => ({ status: HealthStatus.UNHEALTHY }), true);
    context.health.registerCheck('cache', async () => ({ status: HealthStatus.DEGRADED }));

    const info = await readJson('topology://server/info', context);

    expect(info.health.status).toBe('unhealthy');
    expect(info.health.ready).toBe(false);
    expect(info.health.checks).toEqual({ 'price-table': 'unhealthy', cache: 'degraded' });
  });

  it('should serve the price table', async () => {
    const table = await readJson('topology://pricing/table', context);

    expect(table.metadata.discountRate).toBe(0.7);
    expect(table.offers).toHaveLength(29);
    expect(table.offers[0].name).toBe('n2-highcpu-2');
  });

  it('should serve the node kind catalog', async () => {
    const catalog = await readJson('topology://catalog/node-kinds', context);

    expect(catalog.defaultKind).toBe('linux');
    expect(catalog.kinds.find((k: { kind: string }) => k.kind === 'nokia_srlinux').types).toEqual({
      ixrd3: { cpu: 4, memoryGB: 8 },
    });
    expect(catalog.components[0]).toEqual({ prefix: 'cpm', resources: { cpu: 2, memoryGB: 4 } });
  });

  it('should return JSON content with the requested URI', async () => {
    const [content] = await readResource('topology://pricing/table', context);

    expect(content?.uri).toBe('topology://pricing/table');
    expect(content?.mimeType).toBe('application/json');
  });

  it('should reject unknown URIs', async () => {
    expect(isValidResourceURI('topology://nope')).toBe(false);
    await expect(readResource('topology://nope', context)).rejects.toThrow(ResourceError);
    await expect(readResource('topology://nope', context)).rejects.toMatchObject({ code: ErrorCode.RESOURCE_NOT_FOUND });
  });
});
