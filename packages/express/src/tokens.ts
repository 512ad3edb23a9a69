/**
 * Service keys for the shared-state container.
 *
 * A key carries the type of the service it identifies, so resolving a key
 * yields a value of that type.
 */

import type { Application } from 'express';
import type { DatabaseConnectionData, SqlPool } from '@database-common/core';

export interface ServiceKey<T> {
  readonly id: symbol;
  /** Phantom marker tying the key to its service type */
  readonly __service?: T;
}

/**
 * Create a key for a service of type T.
 */
export function serviceKey<T>(name: string): ServiceKey<T> {
  return { id: Symbol.for(name) };
}

export const ServiceTokens = {
  // Database
  DatabasePool: serviceKey<SqlPool>('dbc:DatabasePool'),
  ConnectionData: serviceKey<DatabaseConnectionData>('dbc:ConnectionData'),

  // Express
  ExpressApp: serviceKey<Application>('dbc:ExpressApp'),
} as const;
