/**
 * Shared-state container handed to every request.
 *
 * Holds the connection pool and anything else the caller registers while
 * configuring routes.
 */

import type { ServiceKey } from './tokens';

/**
 * Factory function for lazy service creation.
 */
export type ServiceFactory<T> = (container: ServiceContainer) => T;

type ServiceEntry = {
  instance?: unknown;
  factory?: ServiceFactory<unknown>;
  singleton: boolean;
};

/**
 * @example
 * ```typescript
 * const container = new ServiceContainer();
 * container.registerInstance(ServiceTokens.DatabasePool, pool);
 *
 * const pool = container.resolve(ServiceTokens.DatabasePool);
 * ```
 */
export class ServiceContainer {
  private services = new Map<symbol, ServiceEntry>();

  /**
   * Register a service instance.
   */
  registerInstance<T>(key: ServiceKey<T>, instance: T): this {
    this.services.set(key.id, { instance, singleton: true });
    return this;
  }

  /**
   * Register a service factory, created on first resolve.
   *
   * @param singleton - Whether to cache the instance (default: true)
   */
  registerFactory<T>(key: ServiceKey<T>, factory: ServiceFactory<T>, singleton = true): this {
    this.services.set(key.id, { factory, singleton });
    return this;
  }

  /**
   * Resolve a service.
   *
   * @throws Error if the service is not registered
   */
  resolve<T>(key: ServiceKey<T>): T {
    const entry = this.services.get(key.id);
    if (!entry) {
      throw new Error(`Service not registered: ${String(key.id)}. Did you forget to register it?`);
    }

    if (entry.instance !== undefined) {
      return entry.instance as T;
    }

    if (!entry.factory) {
      throw new Error(`Service ${String(key.id)} has no instance or factory`);
    }

    const instance = entry.factory(this);
    if (entry.singleton) {
      entry.instance = instance;
    }
    return instance as T;
  }

  has<T>(key: ServiceKey<T>): boolean {
    return this.services.has(key.id);
  }

  /**
   * Resolve a service, or undefined if it is not registered.
   */
  tryResolve<T>(key: ServiceKey<T>): T | undefined {
    return this.has(key) ? this.resolve(key) : undefined;
  }
}
