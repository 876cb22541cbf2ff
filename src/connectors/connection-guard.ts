/**
 * Circuit breaking and retry around opening database connections.
 *
 * @module connectors/connection-guard
 */

import { classifyUpstreamError } from '../errors/index.js';
import type { GovernorError } from '../errors/index.js';
import { createNoopObservability } from '../observability/index.js';
import type { Logger, Observability } from '../observability/index.js';
import { CircuitBreaker } from '../resilience/circuit-breaker.js';
import type { CircuitSnapshot } from '../resilience/circuit-breaker.js';
import { RetryExecutor } from '../resilience/retry.js';

/**
 * Anything that hands out and takes back connections.
 */
export interface ConnectionSource<C> {
  connect(): Promise<C>;
  release(client: C, error?: Error): void;
}

export type ConnectionErrorClassifier = (error: unknown) => GovernorError;

export interface ConnectionGuardOptions {
  circuitBreaker?: CircuitBreaker;
  retryExecutor?: RetryExecutor;
  /** Maps driver errors into the governor taxonomy */
  classifyError?: ConnectionErrorClassifier;
  observability?: Observability;
}

/**
 * Hides the password of a connection string. URLs keep everything but the
 * password; strings `URL` cannot parse lose everything between the first
 * `:` after the user and the last `@`. `password=` keywords are masked too.
 */
export function redactConnectionString(connectionString: string): string {
  const url = parseAuthorityUrl(connectionString);
  if (url) {
    if (url.password === '') {
      return connectionString;
    }
    url.password = '***';
    return url.toString();
  }
  return connectionString
    .replace(/^((?:[a-z][a-z0-9+.-]*:\/\/)?[^:@/]*):.*@/i, '$1:***@')
    .replace(/(password\s*=\s*)\S+/gi, '$1***');
}

function parseAuthorityUrl(value: string): URL | undefined {
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) {
    return undefined;
  }
  try {
    const url = new URL(value);
    return url.host === '' ? undefined : url;
  } catch {
    return undefined;
  }
}

/**
 * Guards connection acquisition for one database.
 *
 * The breaker key is the redacted connection string, so credentials never
 * reach logs or metric tags. Transient connection errors are retried;
 * every failed connect counts towards opening the circuit.
 */
export class ConnectionGuard<C> {
  readonly key: string;
  private readonly source: ConnectionSource<C>;
  private readonly breaker: CircuitBreaker;
  private readonly retry: RetryExecutor;
  private readonly classify: ConnectionErrorClassifier;
  private readonly logger: Logger;

  constructor(source: ConnectionSource<C>, connectionString: string, options: ConnectionGuardOptions = {}) {
    const observability = options.observability ?? createNoopObservability();
    this.key = redactConnectionString(connectionString);
    this.source = source;
    this.breaker = options.circuitBreaker ?? new CircuitBreaker(undefined, { observability });
    this.retry = options.retryExecutor ?? new RetryExecutor(undefined, { observability });
    this.classify = options.classifyError ?? classifyUpstreamError;
    this.logger = observability.logger.child({ component: 'connection-guard', endpoint: this.key });
  }

  /**
   * Opens a connection.
   * @throws {CircuitOpenError} While the database is suspended
   * @throws {GovernorError} The classified connect failure once retries are exhausted
   */
  async acquire(signal?: AbortSignal): Promise<C> {
    return this.retry.execute(
      async attempt => {
        this.breaker.checkAdmission(this.key);
        try {
          const client = await this.source.connect();
          this.breaker.recordSuccess(this.key);
          return client;
        } catch (error) {
          this.breaker.recordFailure(this.key);
          const failure = this.classify(error);
          this.logger.warn('Connection attempt failed', { attempt, code: failure.code, error: failure.message });
          throw failure;
        }
      },
      { signal, tags: { endpoint: this.key } }
    );
  }

  release(client: C, error?: Error): void {
    this.source.release(client, error);
  }

  getCircuitSnapshot(): CircuitSnapshot {
    return this.breaker.getSnapshot(this.key);
  }
}
