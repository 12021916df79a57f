/**
 * Context manager drivers
 *
 * Maps a driver name from configuration to the constructor that builds it.
 */

import { ConfigurationError } from '../errors.js';
import type { ContextManagerOptions, IContextManager } from '../interfaces/context-manager.js';
import { ContextManager } from './context-manager.js';
import { PooledContextManager } from './pooled-context-manager.js';

export type ContextManagerDriver = (options: ContextManagerOptions) => IContextManager;

const drivers = new Map<string, ContextManagerDriver>([
  ['standard', (options) => new ContextManager(options)],
  ['pooled', (options) => new PooledContextManager(options)],
]);

export function registerContextManagerDriver(name: string, driver: ContextManagerDriver): void {
  drivers.set(name, driver);
}

export function getContextManagerDrivers(): string[] {
  return [...drivers.keys()];
}

/**
 * @throws {ConfigurationError} If no driver is registered under `name`
 */
export function createContextManager(
  name: string,
  options: ContextManagerOptions = {}
): IContextManager {
  const driver = drivers.get(name);
  if (!driver) {
    throw new ConfigurationError(
      `Unknown context manager driver '${name}'. Registered: ${getContextManagerDrivers().join(', ')}`
    );
  }
  return driver(options);
}
