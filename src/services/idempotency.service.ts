import { createHash } from 'crypto';
import { SqliteIdempotencyStore } from '../db/sqlite.js';
import { ApiResponse } from '../types/index.js';

export type IdempotencyCheck =
  | { found: false }
  | { found: true; mismatch: true }
  | { found: true; mismatch: false; status: number; response: ApiResponse };

export class IdempotencyService {
  constructor(private readonly store: SqliteIdempotencyStore) {}

  /**
   * Generate a hash of the request for idempotency comparison
   */
  private hashRequest(scope: string, request: unknown): string {
    return createHash('sha256').update(JSON.stringify({ scope, request })).digest('hex');
  }

  /**
   * Look up a previously used key. A key reused with a different request
   * is reported as a mismatch instead of replayed.
   */
  check(idempotencyKey: string, scope: string, request: unknown): IdempotencyCheck {
    const row = this.store.find(idempotencyKey);
    if (!row) {
      return { found: false };
    }

    if (row.request_hash !== this.hashRequest(scope, request)) {
      return { found: true, mismatch: true };
    }

    const response: ApiResponse = JSON.parse(row.response_body);
    return { found: true, mismatch: false, status: row.response_status, response };
  }

  /**
   * Store idempotency key with response for future duplicate detection.
   * Write failures are logged, not raised.
   */
  remember(
    idempotencyKey: string,
    scope: string,
    request: unknown,
    responseStatus: number,
    responseBody: ApiResponse
  ): void {
    try {
      this.store.save(
        idempotencyKey,
        this.hashRequest(scope, request),
        responseStatus,
        JSON.stringify(responseBody)
      );
    } catch (error) {
      console.error('Failed to store idempotency key:', error);
    }
  }
}
