import type { Logger } from '../logger/index.js';
import type { Config } from '../config/schema.js';
import type { PriceTable } from '../pricing/price-table.js';
import { toError } from '../errors/index.js';

/**
 * Health check system
 * Tracks whether the configuration and price table the tools depend on are usable
 */

export enum HealthStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNHEALTHY = 'unhealthy',
}

export interface HealthCheck {
  name: string;
  checker: () => Promise<HealthCheckResult>;
  critical: boolean; // If true, failure marks entire system as unhealthy
}

export interface HealthCheckResult {
  status: HealthStatus;
  message?: string;
  metadata?: Record<string, unknown>;
}

export interface SystemHealth {
  status: HealthStatus;
  timestamp: number;
  uptime: number;
  checks: Record<string, HealthCheckResult>;
}

/**
 * Compact view of a health run, as published in the server info resource
 */
export interface HealthSummary {
  status: HealthStatus;
  ready: boolean;
  uptime: number;
  checks: Record<string, HealthStatus>;
}

export function summarizeHealth(health: SystemHealth): HealthSummary {
  return {
    status: health.status,
    ready: health.status !== HealthStatus.UNHEALTHY,
    uptime: health.uptime,
    checks: Object.fromEntries(Object.entries(health.checks).map(([name, result]) => [name, result.status])),
  };
}

export class HealthManager {
  private logger: Logger;
  private checks: Map<string, HealthCheck> = new Map();
  private startTime: number;
  private checkInterval?: NodeJS.Timeout;

  constructor(logger: Logger) {
    this.logger = logger;
    this.startTime = Date.now();
  }

  /**
   * Register a health check
   */
  registerCheck(name: string, checker: () => Promise<HealthCheckResult>, critical = false): void {
    this.checks.set(name, { name, checker, critical });
    this.logger.debug(`Registered health check: ${name} (critical: ${critical})`);
  }

  /**
   * Execute all health checks
   */
  async check(): Promise<SystemHealth> {
    const results: Record<string, HealthCheckResult> = {};
    let overallStatus = HealthStatus.HEALTHY;

    for (const [name, check] of this.checks) {
      try {
        const result = await check.checker();
        results[name] = result;

        // Update overall status based on check result
        if (check.critical && result.status === HealthStatus.UNHEALTHY) {
          overallStatus = HealthStatus.UNHEALTHY;
        } else if (result.status === HealthStatus.DEGRADED && overallStatus === HealthStatus.HEALTHY) {
          overallStatus = HealthStatus.DEGRADED;
        }
      } catch (error) {
        const cause = toError(error);
        const errorResult: HealthCheckResult = {
          status: HealthStatus.UNHEALTHY,
          message: cause.message,
        };
        results[name] = errorResult;

        if (check.critical) {
          overallStatus = HealthStatus.UNHEALTHY;
        }

        this.logger.error(`Health check failed: ${name}`, cause);
      }
    }

    return {
      status: overallStatus,
      timestamp: Date.now(),
      uptime: Date.now() - this.startTime,
      checks: results,
    };
  }

  /**
   * Start periodic health checks
   */
  startPeriodicChecks(interval: number): void {
    if (this.checkInterval) {
      this.logger.warn('Periodic health checks already running');
      return;
    }

    this.logger.info(`Starting periodic health checks (interval: ${interval}ms)`);

    this.checkInterval = setInterval(() => {
      this.check()
        .then((health) => {
          if (health.status !== HealthStatus.HEALTHY) {
            this.logger.warn('System health degraded', { health });
          }
        })
        .catch((error: unknown) => {
          this.logger.error('Periodic health check failed', toError(error));
        });
    }, interval);
    this.checkInterval.unref();
  }

  /**
   * Stop periodic health checks
   */
  stopPeriodicChecks(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = undefined;
      this.logger.info('Stopped periodic health checks');
    }
  }

}

/**
 * Register the checks for the configuration and price table the server was built with
 */
export function registerServerChecks(health: HealthManager, config: Config, priceTable: PriceTable): void {
  health.registerCheck(
    'configuration',
    async () => ({
      status: HealthStatus.HEALTHY,
      message: 'Configuration loaded',
      metadata: {
        serverName: config.mcp.serverName,
        serverVersion: config.mcp.serverVersion,
        priceTablePath: config.pricing.priceTablePath ?? 'bundled',
      },
    }),
    true
  );

  health.registerCheck(
    'price-table',
    async () => ({
      status: HealthStatus.HEALTHY,
      message: 'Price table loaded',
      metadata: { offers: priceTable.size, region: priceTable.metadata.region, version: priceTable.metadata.version },
    }),
    true
  );
}
