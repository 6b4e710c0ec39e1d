/**
 * Simple dependency injection container.
 *
 * Provides a lightweight way to register and resolve services. The service
 * map `S` types every token, so `resolve` returns the registered type.
 */

import type { PlantGateServices } from './tokens';

/**
 * Factory function for lazy service creation.
 */
export type ServiceFactory<T, S = PlantGateServices> = (container: ServiceContainer<S>) => T;

type Factories<S> = { [K in keyof S]?: { create: ServiceFactory<S[K], S>; singleton: boolean } };

/**
 * Simple dependency injection container.
 *
 * @example
 * ```typescript
 * const container = new ServiceContainer();
 *
 * // Register a singleton instance
 * container.registerInstance(ServiceTokens.PlantRegistry, registry);
 *
 * // Register a factory (lazy creation)
 * container.registerFactory(ServiceTokens.HealthAggregator, (c) =>
 *   new HealthAggregator({
 *     registry: c.resolve(ServiceTokens.PlantRegistry),
 *     pools: c.resolve(ServiceTokens.PoolProvider),
 *   })
 * );
 *
 * // Resolve a service
 * const health = container.resolve(ServiceTokens.HealthAggregator);
 * ```
 */
export class ServiceContainer<S = PlantGateServices> {
  private instances: Partial<S> = {};
  private factories: Factories<S> = {};

  /**
   * Register a service instance (eager registration).
   */
  registerInstance<K extends keyof S>(token: K, instance: S[K]): this {
    this.instances[token] = instance;
    return this;
  }

  /**
   * Register a service factory (lazy registration).
   *
   * @param singleton - Whether to cache the instance (default: true)
   */
  registerFactory<K extends keyof S>(token: K, factory: ServiceFactory<S[K], S>, singleton = true): this {
    delete this.instances[token];
    this.factories[token] = { create: factory, singleton };
    return this;
  }

  /**
   * Resolve a service by token.
   *
   * @throws Error if service not registered
   */
  resolve<K extends keyof S>(token: K): S[K] {
    const instance: S[K] | undefined = this.instances[token];
    if (instance !== undefined) {
      return instance;
    }

    const entry = this.factories[token];
    if (!entry) {
      throw new Error(`Service not registered: ${String(token)}. Did you forget to register it?`);
    }

    const created = entry.create(this);
    if (entry.singleton) {
      this.instances[token] = created;
    }
    return created;
  }

  /**
   * Check if a service is registered.
   */
  has(token: keyof S): boolean {
    return this.instances[token] !== undefined || this.factories[token] !== undefined;
  }

  /**
   * Try to resolve a service, returning undefined if not registered.
   */
  tryResolve<K extends keyof S>(token: K): S[K] | undefined {
    if (!this.has(token)) {
      return undefined;
    }
    return this.resolve(token);
  }

  /**
   * Clear all registered services.
   */
  clear(): void {
    this.instances = {};
    this.factories = {};
  }
}
