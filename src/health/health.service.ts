import { Injectable, Logger } from '@nestjs/common';
import { Sequelize } from 'sequelize-typescript';

export const READINESS_TIMEOUT_MS = 2000;

export type CheckStatus = 'up' | 'down';

export interface DependencyCheck {
  status: CheckStatus;
  latencyMs: number;
  error?: string;
}

export interface HealthReport {
  status: 'ok' | 'degraded';
  timestamp: string;
  checks: { database: DependencyCheck };
}

const withDeadline = <T>(work: Promise<T>, timeoutMs: number): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
};

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(private readonly sequelize: Sequelize) {}

  async checkDatabase(timeoutMs: number = READINESS_TIMEOUT_MS): Promise<DependencyCheck> {
    const started = Date.now();
    try {
      await withDeadline(this.sequelize.authenticate({ logging: false }), timeoutMs);
      return { status: 'up', latencyMs: Date.now() - started };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Database health check failed: ${message}`);
      return { status: 'down', latencyMs: Date.now() - started, error: message };
    }
  }

  async report(timeoutMs?: number): Promise<HealthReport> {
    const database = await this.checkDatabase(timeoutMs);
    return {
      status: database.status === 'up' ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks: { database },
    };
  }
}
