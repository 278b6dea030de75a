import { AuditStore, AuditQueryOptions, CreateAuditRecordParams } from '../db/interfaces/store.interfaces';
import { AuditAction, AuditRecord, Clock, systemClock } from '../types';
import { AuditWriteFailed, errorMessage } from '../utils/errors';
import { Result, createError, createSuccess } from '../utils/result';
import { HOUR_IN_MS } from '../utils';
import defaultLogger, { Logger } from '../utils/logger';

export interface AuditRefs {
  sellerId?: string;
  listingId?: string;
  interestId?: string;
  data?: Record<string, unknown>;
  ipAddress?: string;
  userAgent?: string;
  externalMessageId?: string;
}

export interface AuditTrailOptions {
  retryCapacity?: number;
  logger?: Logger;
  clock?: Clock;
}

const DEFAULT_RETRY_CAPACITY = 500;

/**
 * Append-only log of domain events. `record` never throws: a failed write is
 * logged, counted and parked in a bounded queue for `retryPending`.
 */
export class AuditTrailService {
  private readonly pending: CreateAuditRecordParams[] = [];
  private failures = 0;
  private readonly retryCapacity: number;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly store: AuditStore,
    options: AuditTrailOptions = {}
  ) {
    this.retryCapacity = options.retryCapacity ?? DEFAULT_RETRY_CAPACITY;
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? systemClock;
  }

  async record(action: AuditAction, refs: AuditRefs = {}): Promise<Result<AuditRecord, AuditWriteFailed>> {
    const params: CreateAuditRecordParams = {
      action,
      sellerId: refs.sellerId,
      listingId: refs.listingId,
      interestId: refs.interestId,
      data: refs.data ?? {},
      ipAddress: refs.ipAddress,
      userAgent: refs.userAgent,
      externalMessageId: refs.externalMessageId
    };

    try {
      const record = await this.store.insert(params);
      return createSuccess(record);
    } catch (error) {
      const failure = new AuditWriteFailed(action, error);
      this.failures++;
      this.logger.error(failure.message, {
        action,
        sellerId: refs.sellerId,
        listingId: refs.listingId,
        interestId: refs.interestId
      });
      this.enqueue(params);
      return createError(failure);
    }
  }

  async recordError(
    message: string,
    refs: Omit<AuditRefs, 'data'> = {},
    details: Record<string, unknown> = {}
  ): Promise<Result<AuditRecord, AuditWriteFailed>> {
    return await this.record(AuditAction.ERROR, {
      ...refs,
      data: { ...details, error: message }
    });
  }

  /**
   * Replays queued records in order. Records that fail again go back on the
   * queue; returns how many were written.
   */
  async retryPending(): Promise<number> {
    if (this.pending.length === 0) {
      return 0;
    }

    const batch = this.pending.splice(0, this.pending.length);
    let written = 0;

    for (let i = 0; i < batch.length; i++) {
      try {
        await this.store.insert(batch[i]);
        written++;
      } catch (error) {
        this.logger.warn(`Audit retry failed, ${batch.length - i} record(s) requeued: ${errorMessage(error)}`);
        for (const params of batch.slice(i)) {
          this.enqueue(params);
        }
        break;
      }
    }

    if (written > 0) {
      this.logger.info(`Replayed ${written} pending audit record(s)`);
    }

    return written;
  }

  get failureCount(): number {
    return this.failures;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  async forSeller(sellerId: string, options: AuditQueryOptions = {}): Promise<AuditRecord[]> {
    return await this.store.findBySeller(sellerId, options);
  }

  async forListing(listingId: string, limit: number = 50): Promise<AuditRecord[]> {
    return await this.store.findByListing(listingId, limit);
  }

  async recent(hours: number = 24, action?: AuditAction): Promise<AuditRecord[]> {
    const since = new Date(this.clock.now().getTime() - hours * HOUR_IN_MS);
    return await this.store.findSince(since, action);
  }

  async countForSeller(sellerId: string, action: AuditAction): Promise<number> {
    return await this.store.countBySellerAndAction(sellerId, action);
  }

  private enqueue(params: CreateAuditRecordParams): void {
    if (this.retryCapacity === 0) {
      this.logger.error(`Audit retry queue disabled, dropping ${params.action} record`);
      return;
    }

    if (this.pending.length >= this.retryCapacity) {
      const dropped = this.pending.shift();
      this.logger.error(`Audit retry queue full, dropping oldest ${dropped?.action ?? 'unknown'} record`);
    }

    this.pending.push(params);
  }
}
