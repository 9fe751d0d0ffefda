import { performance } from 'node:perf_hooks';

import type { Pool } from 'pg';

import { recordDbQuery } from './metrics.js';

export type StoreName = 'accounts' | 'usage';

type Queryable = {
  query: (...args: unknown[]) => unknown;
};

function record(store: StoreName, startedAt: number, failed: boolean): void {
  recordDbQuery({ store, success: failed ? 'false' : 'true' }, performance.now() - startedAt);
}

function wrapQuery(target: Queryable, store: StoreName): void {
  const originalQuery = target.query.bind(target);

  target.query = (...args: unknown[]): unknown => {
    const startedAt = performance.now();
    const callback = args[args.length - 1];

    // pool.query() drives clients in callback style.
    if (typeof callback === 'function') {
      args[args.length - 1] = (error: unknown, result: unknown): void => {
        record(store, startedAt, error !== null && error !== undefined);
        Reflect.apply(callback, undefined, [error, result]);
      };
      return originalQuery(...args);
    }

    return Promise.resolve(originalQuery(...args)).then(
      (result) => {
        record(store, startedAt, false);
        return result;
      },
      (error: unknown) => {
        record(store, startedAt, true);
        throw error;
      }
    );
  };
}

/**
 * Records duration and failures of every query run on the pool's clients,
 * labelled with the store the pool serves. pool.query() checks out a client
 * too, so wrapping clients once on connect covers both paths.
 */
export function instrumentPgPool(pool: Pool, store: StoreName): void {
  pool.on('connect', (client) => {
    wrapQuery(client as unknown as Queryable, store);
  });
}
