/**
 * Database connection module.
 *
 * @module connectors
 */

export {
  ConnectionGuard,
  redactConnectionString,
  type ConnectionErrorClassifier,
  type ConnectionGuardOptions,
  type ConnectionSource,
} from './connection-guard.js';
export {
  TRANSIENT_SQLSTATES,
  classifyPgError,
  createPgConnectionGuard,
  createPgPool,
  type PgPoolLike,
  type PgPoolOptions,
} from './pg.js';
