/**
 * PostgreSQL adapter for {@link ConnectionGuard}.
 *
 * @module connectors/pg
 */

import pg from 'pg';
import type { Pool } from 'pg';
import {
  PermanentUpstreamError,
  TRANSIENT_NETWORK_CODES,
  TransientUpstreamError,
  errorCodeOf,
  isGovernorError,
} from '../errors/index.js';
import type { GovernorError } from '../errors/index.js';
import { ConnectionGuard } from './connection-guard.js';
import type { ConnectionGuardOptions } from './connection-guard.js';

/**
 * SQLSTATE codes outside class 08 that mean "try again shortly".
 */
export const TRANSIENT_SQLSTATES: ReadonlySet<string> = new Set([
  '53300', // too_many_connections
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
]);

const TRANSIENT_MESSAGES = ['timeout exceeded when trying to connect', 'Connection terminated'];

/**
 * Classifies pg and socket errors raised while connecting.
 *
 * Transient: SQLSTATE class 08, the codes in {@link TRANSIENT_SQLSTATES},
 * socket errors and pg's connect timeout. Everything else, such as bad
 * credentials or an unknown database, is permanent.
 */
export function classifyPgError(error: unknown): GovernorError {
  if (isGovernorError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = errorCodeOf(error);

  if (code !== undefined && (code.startsWith('08') || TRANSIENT_SQLSTATES.has(code))) {
    return new TransientUpstreamError(`Database connection failed: ${message}`, {
      cause: error,
      details: { sqlState: code },
    });
  }

  if (code !== undefined && TRANSIENT_NETWORK_CODES.has(code)) {
    return new TransientUpstreamError(`Database unreachable: ${message}`, { cause: error, details: { code } });
  }

  if (TRANSIENT_MESSAGES.some(fragment => message.includes(fragment))) {
    return new TransientUpstreamError(`Database connection failed: ${message}`, { cause: error });
  }

  return new PermanentUpstreamError(`Database connection rejected: ${message}`, {
    cause: error,
    details: code !== undefined ? { sqlState: code } : undefined,
  });
}

/**
 * The part of `pg.Pool` the guard needs.
 */
export interface PgPoolLike<C extends { release(err?: Error | boolean): void }> {
  connect(): Promise<C>;
}

/**
 * Guards `pool.connect()` and returns clients to the pool on release.
 */
export function createPgConnectionGuard<C extends { release(err?: Error | boolean): void }>(
  pool: PgPoolLike<C>,
  connectionString: string,
  options: ConnectionGuardOptions = {}
): ConnectionGuard<C> {
  return new ConnectionGuard<C>(
    {
      connect: () => pool.connect(),
      release: (client, error) => client.release(error),
    },
    connectionString,
    { classifyError: classifyPgError, ...options }
  );
}

export interface PgPoolOptions {
  max?: number;
  connectionTimeoutMillis?: number;
  idleTimeoutMillis?: number;
}

/**
 * Creates a `pg.Pool` for a connection string. No connection is opened
 * until the first `connect()`.
 */
export function createPgPool(connectionString: string, options: PgPoolOptions = {}): Pool {
  return new pg.Pool({
    connectionString,
    max: options.max ?? 10,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? 10_000,
    idleTimeoutMillis: options.idleTimeoutMillis ?? 30_000,
  });
}
