/**
 * ServiceRegistry - lifecycle management for the services a MapControlContext owns
 *
 * Provides:
 * - Initialization in registration order
 * - Shutdown in reverse order, bounded by a timeout per service
 * - Health checks for monitoring
 */

import { createLogger } from '../shared/logger';

const logger = createLogger('ServiceRegistry');

const SHUTDOWN_TIMEOUT_MS = 5000;

/**
 * Service lifecycle interface
 * Services can optionally implement these methods for managed lifecycle
 */
export interface Service {
  /** Service name for logging and identification */
  readonly name: string;

  /** Initialize the service (called during startup) */
  initialize?(): Promise<void>;

  /** Shutdown the service gracefully */
  shutdown?(): Promise<void>;

  /** Health check - returns true if service is healthy */
  isHealthy?(): boolean;

  /** Get service statistics for monitoring */
  getStats?(): unknown;
}

export interface HealthCheckResult {
  healthy: boolean;
  services: Record<string, {
    healthy: boolean;
    stats?: unknown;
  }>;
  uptime: number;
}

export class ServiceRegistry {
  private services: Map<string, Service> = new Map();
  private initialized: boolean = false;
  private shuttingDown: boolean = false;
  private startTime: number = 0;

  register(service: Service): void {
    const { name } = service;

    if (this.initialized) {
      throw new Error(`Cannot register service '${name}' after initialization`);
    }

    if (this.services.has(name)) {
      throw new Error(`Service '${name}' is already registered`);
    }

    this.services.set(name, service);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      throw new Error('ServiceRegistry is already initialized');
    }

    this.startTime = Date.now();

    for (const [name, service] of this.services) {
      if (!service.initialize) {
        continue;
      }

      const start = Date.now();
      try {
        await service.initialize();
        logger.debug(`${name} initialized (${Date.now() - start}ms)`);
      } catch (error: unknown) {
        logger.error(`Failed to initialize ${name}`, error);
        throw error;
      }
    }

    this.initialized = true;
    logger.info(`All services initialized (${Date.now() - this.startTime}ms)`);
  }

  /**
   * Shutdown all services, last registered first; errors are logged and do
   * not stop the others
   */
  async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      return;
    }

    this.shuttingDown = true;

    for (const service of Array.from(this.services.values()).reverse()) {
      if (!service.shutdown) {
        continue;
      }

      let timer: NodeJS.Timeout | undefined;
      try {
        await Promise.race([
          service.shutdown(),
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new Error('Shutdown timeout')), SHUTDOWN_TIMEOUT_MS);
          }),
        ]);
        logger.debug(`${service.name} shut down`);
      } catch (error: unknown) {
        logger.error(`Error shutting down ${service.name}`, error);
      } finally {
        clearTimeout(timer);
      }
    }
  }

  healthCheck(): HealthCheckResult {
    const result: HealthCheckResult = {
      healthy: true,
      services: {},
      uptime: this.initialized ? Date.now() - this.startTime : 0,
    };

    for (const [name, service] of this.services) {
      const isHealthy = service.isHealthy ? service.isHealthy() : true;

      result.services[name] = {
        healthy: isHealthy,
        stats: service.getStats?.(),
      };

      if (!isHealthy) {
        result.healthy = false;
      }
    }

    return result;
  }
}
