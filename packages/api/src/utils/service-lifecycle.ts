import { getErrorMessage } from '@market-terminal/shared';
import { logger } from '@market-terminal/shared/utils/logger';

/**
 * Anything holding a connection or session that must be released on shutdown
 */
export interface CleanupableService {
  close(): void | Promise<void>;
}

const serviceRegistry = new Map<string, CleanupableService>();

let handlersRegistered = false;

const CLEANUP_TIMEOUT_MS = 5000;

/**
 * Close every registered service; one failing close does not stop the rest
 */
export async function cleanupAllServices(): Promise<void> {
  if (serviceRegistry.size === 0) {
    return;
  }

  const services = [...serviceRegistry];
  serviceRegistry.clear();
  logger.info(`Cleaning up ${services.length} services...`);

  for (const [name, service] of services) {
    try {
      logger.info(`Closing ${name}...`);
      await service.close();
    } catch (error) {
      logger.error(`Failed to close ${name}`, { error: getErrorMessage(error) });
    }
  }
  logger.info('All services cleaned up');
}

function ensureHandlersRegistered(): void {
  if (handlersRegistered) return;

  const handleShutdown = (signal: string) => {
    logger.info(`Received ${signal}, cleaning up services...`);

    const forceExitTimeout = setTimeout(() => {
      logger.warn(`Cleanup timeout (${CLEANUP_TIMEOUT_MS}ms) exceeded, forcing exit`);
      process.exit(1);
    }, CLEANUP_TIMEOUT_MS);
    forceExitTimeout.unref();

    void cleanupAllServices().finally(() => {
      clearTimeout(forceExitTimeout);
      logger.info('Shutdown complete');
      process.exit(0);
    });
  };

  process.on('SIGINT', () => handleShutdown('SIGINT'));
  process.on('SIGTERM', () => handleShutdown('SIGTERM'));

  handlersRegistered = true;
}

/**
 * Register a service to be closed on SIGINT or SIGTERM.
 * Registering the same name again replaces the previous service.
 */
export function registerServiceForCleanup(name: string, service: CleanupableService): void {
  ensureHandlersRegistered();
  serviceRegistry.set(name, service);
}

export interface ManagedServiceConfig<T extends CleanupableService> {
  factory: () => Promise<T>;
  /** Runs once, right after the instance is created and registered */
  setup?: (service: T) => Promise<void>;
}

/**
 * Lazily-opened singleton, registered for cleanup on first use.
 * Concurrent first callers share the same opening promise.
 *
 * @example
 * ```typescript
 * const getWatchlistService = createManagedService('WatchlistService', {
 *   factory: () => WatchlistService.open(config.database.path),
 * });
 * ```
 */
export function createManagedService<T extends CleanupableService>(
  name: string,
  config: ManagedServiceConfig<T>
): () => Promise<T> {
  let instance: Promise<T> | null = null;

  const open = async (): Promise<T> => {
    const service = await config.factory();
    registerServiceForCleanup(name, service);
    await config.setup?.(service);
    return service;
  };

  return () => {
    if (!instance) {
      instance = open();
    }
    return instance;
  };
}
