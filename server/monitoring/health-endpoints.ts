/**
 * Health and Status Endpoints
 * Reports whether the data directories are writable, which runs hold locks
 * and how often LLM calls needed a retry
 */

import { Request, Response } from 'express';
import { access, constants } from 'fs/promises';
import { pathFor, PathKey } from '../../config/paths.js';
import { errorMessage } from '../../content-engine/utils/errors.js';
import { ProjectLockManager } from '../concurrency/lock-manager.js';
import { RetryPolicyManager } from '../resilience/retry-policies.js';

export type HealthState = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  component: string;
  status: HealthState;
  message?: string;
  metrics?: Record<string, unknown>;
  lastChecked: string;
}

export interface HealthStatus {
  status: HealthState;
  timestamp: string;
  uptime: number;
  components: ComponentHealth[];
}

const CHECKED_DIRS: PathKey[] = ['DATA_DIR', 'TEMPLATES_DIR', 'VENDOR_DIR', 'RESOURCES_DIR'];

/**
 * Health monitoring service
 */
export class HealthMonitor {
  private startTime: number = Date.now();

  constructor(
    private locks: ProjectLockManager,
    private retries: RetryPolicyManager,
    private llmConfigured: boolean,
    private dirs: Partial<Record<PathKey, string>> = {}
  ) {}

  async getHealth(): Promise<HealthStatus> {
    const components = await Promise.all([this.checkFileSystem(), this.checkLockManager(), this.checkLLM()]);

    let status: HealthState = 'healthy';
    if (components.some(c => c.status === 'unhealthy')) {
      status = 'unhealthy';
    } else if (components.some(c => c.status === 'degraded')) {
      status = 'degraded';
    }

    return {
      status,
      timestamp: new Date().toISOString(),
      uptime: Date.now() - this.startTime,
      components
    };
  }

  private async checkFileSystem(): Promise<ComponentHealth> {
    const inaccessible: string[] = [];
    for (const key of CHECKED_DIRS) {
      const dir = this.dirs[key] ?? pathFor(key);
      try {
        await access(dir, key === 'DATA_DIR' ? constants.W_OK : constants.R_OK);
      } catch {
        inaccessible.push(key);
      }
    }

    let status: HealthState = 'healthy';
    if (inaccessible.length === CHECKED_DIRS.length) {
      status = 'unhealthy';
    } else if (inaccessible.length > 0) {
      status = 'degraded';
    }

    return {
      component: 'filesystem',
      status,
      message: inaccessible.length === 0 ? 'All paths accessible' : `Inaccessible: ${inaccessible.join(', ')}`,
      lastChecked: new Date().toISOString()
    };
  }

  private async checkLockManager(): Promise<ComponentHealth> {
    try {
      const locks = await this.locks.getActiveLocks();
      return {
        component: 'locks',
        status: 'healthy',
        message: 'Lock manager operational',
        metrics: {
          activeLocks: locks.length,
          runs: locks.map(lock => ({ kind: lock.kind, projectId: lock.projectId, since: new Date(lock.acquiredAt).toISOString() }))
        },
        lastChecked: new Date().toISOString()
      };
    } catch (error) {
      return {
        component: 'locks',
        status: 'unhealthy',
        message: `Lock manager error: ${errorMessage(error)}`,
        lastChecked: new Date().toISOString()
      };
    }
  }

  private async checkLLM(): Promise<ComponentHealth> {
    return {
      component: 'llm',
      status: this.llmConfigured ? 'healthy' : 'degraded',
      message: this.llmConfigured ? 'Default credentials configured' : 'No default API key; users must configure their own',
      metrics: { retries: this.retries.getRetryStats() },
      lastChecked: new Date().toISOString()
    };
  }
}

/**
 * Express route handlers
 */
export class HealthEndpoints {
  constructor(private monitor: HealthMonitor) {}

  health = async (_req: Request, res: Response): Promise<void> => {
    try {
      const health = await this.monitor.getHealth();
      res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        error: errorMessage(error),
        timestamp: new Date().toISOString()
      });
    }
  };

  live = async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json({
      alive: true,
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  };
}
