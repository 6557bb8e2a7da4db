/**
 * Unit tests for health checks and lifecycle hooks
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { HealthManager, HealthStatus, registerServerChecks, summarizeHealth } from './index.js';
import { LifecycleManager } from '../lifecycle/index.js';
import { Logger } from '../logger/index.js';
import { bundledPriceTable, createTestConfig } from '../__tests__/utils.js';

describe('HealthManager', () => {
  let logger: Logger;
  let health: HealthManager;

  beforeEach(() => {
    logger = new Logger(createTestConfig().logging);
    health = new HealthManager(logger);
  });

  it('should be healthy when every check passes', async () => {
    health.registerCheck('a', async () => ({ status: HealthStatus.HEALTHY }), true);

    const result = await health.check();

    expect(result.status).toBe(HealthStatus.HEALTHY);
    expect(summarizeHealth(result).ready).toBe(true);
  });

  it('should be degraded by a degraded check', async () => {
    health.registerCheck('a', async () => ({ status: HealthStatus.HEALTHY }), true);
    health.registerCheck('b', async () => ({ status: HealthStatus.DEGRADED, message: 'slow' }));

    expect((await health.check()).status).toBe(HealthStatus.DEGRADED);
  });

  it('should be unhealthy when a critical check throws', async () => {
    health.registerCheck('broken', async () => {
      throw new Error('price table missing');
    }, true);

    const result = await health.check();

    expect(result.status).toBe(HealthStatus.UNHEALTHY);
    expect(result.checks['broken']).toEqual({ status: HealthStatus.UNHEALTHY, message: 'price table missing' });
    expect(summarizeHealth(result)).toMatchObject({ status: HealthStatus.UNHEALTHY, ready: false, checks: { broken: 'unhealthy' } });
  });

  it('should ignore an unhealthy non-critical check', async () => {
    health.registerCheck('optional', async () => ({ status: HealthStatus.UNHEALTHY }));

    expect((await health.check()).status).toBe(HealthStatus.HEALTHY);
  });
});

describe('registerServerChecks', () => {
  const config = createTestConfig();
  const logger = new Logger(config.logging);

  it('should report a loaded price table', async () => {
    const health = new HealthManager(logger);
    registerServerChecks(health, config, bundledPriceTable());

    const summary = summarizeHealth(await health.check());

    expect(summary.status).toBe(HealthStatus.HEALTHY);
    expect(summary.checks).toEqual({ configuration: 'healthy', 'price-table': 'healthy' });
  });
});

describe('LifecycleManager', () => {
  let lifecycle: LifecycleManager;

  beforeEach(() => {
    lifecycle = new LifecycleManager(new Logger(createTestConfig().logging), {
      handleSignals: false,
      exitOnShutdown: false,
    });
  });

  it('should run startup hooks in order', async () => {
    const calls: string[] = [];
    lifecycle.onStartup('first', async () => {
      calls.push('first');
    });
    lifecycle.onStartup('second', async () => {
      calls.push('second');
    });

    await lifecycle.startup();

    expect(calls).toEqual(['first', 'second']);
  });

  it('should propagate a failing startup hook', async () => {
    lifecycle.onStartup('fail', async () => {
      throw new Error('boom');
    });

    await expect(lifecycle.startup()).rejects.toThrow('boom');
  });

  it('should run shutdown hooks in reverse order and continue past failures', async () => {
    const calls: string[] = [];
    lifecycle.onShutdown('first', async () => {
      calls.push('first');
    });
    lifecycle.onShutdown('failing', async () => {
      throw new Error('close failed');
    });
    lifecycle.onShutdown('last', async () => {
      calls.push('last');
    });

    await lifecycle.shutdown('SIGTERM');

    expect(calls).toEqual(['last', 'first']);
    expect(lifecycle.isShuttingDownStatus()).toBe(true);
  });

  it('should ignore a second shutdown', async () => {
    const calls: string[] = [];
    lifecycle.onShutdown('only', async () => {
      calls.push('only');
    });

    await lifecycle.shutdown();
    await lifecycle.shutdown();

    expect(calls).toEqual(['only']);
  });
});
