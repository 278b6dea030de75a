import { AccountStore } from '../db/interfaces/store.interfaces';
import { Account, AuditAction, Clock, Notification, systemClock } from '../types';
import { ConflictError, SlugAllocationError, errorMessage } from '../utils/errors';
import { buildCatalogUrl, generateCatalogSlug } from '../utils';
import defaultLogger, { Logger } from '../utils/logger';
import { AuditTrailService } from './audit-trail.service';
import { NotificationDispatcher } from './notifications/notification-dispatcher.service';
import * as templates from './notifications/templates';

export const MAX_SLUG_ATTEMPTS = 5;

/**
 * `always`: welcome a new seller, welcome back a known one.
 * `on-create`: welcome a new seller, stay quiet for a known one.
 */
export type GreetingMode = 'always' | 'on-create';

export interface GetOrCreateOptions {
  greeting?: GreetingMode;
  name?: string;
}

export interface ProvisionResult {
  account: Account;
  created: boolean;
  notifications: Notification[];
}

export interface AccountProvisionerOptions {
  catalogBaseUrl: string;
  generateSlug?: () => string;
  maxSlugAttempts?: number;
  logger?: Logger;
  clock?: Clock;
}

type InsertOutcome =
  | { kind: 'created'; account: Account }
  | { kind: 'exists'; account: Account };

export class AccountProvisioner {
  private readonly generateSlug: () => string;
  private readonly maxSlugAttempts: number;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly accounts: AccountStore,
    private readonly auditTrail: AuditTrailService,
    private readonly dispatcher: NotificationDispatcher,
    private readonly options: AccountProvisionerOptions
  ) {
    this.generateSlug = options.generateSlug ?? generateCatalogSlug;
    this.maxSlugAttempts = options.maxSlugAttempts ?? MAX_SLUG_ATTEMPTS;
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? systemClock;
  }

  catalogUrl(account: Account): string {
    return buildCatalogUrl(this.options.catalogBaseUrl, account.catalogSlug);
  }

  /**
   * Idempotent lookup-or-create keyed by phone number. Safe under concurrent
   * calls for the same number: exactly one caller sees `created: true`.
   */
  async getOrCreate(phoneNumber: string, options: GetOrCreateOptions = {}): Promise<ProvisionResult> {
    const greeting = options.greeting ?? 'always';
    const existing = await this.accounts.findByPhone(phoneNumber);

    const outcome: InsertOutcome = existing
      ? { kind: 'exists', account: existing }
      : await this.insertWithFreshSlug(phoneNumber, options.name);

    const notifications: Notification[] = [];
    const { account } = outcome;

    if (outcome.kind === 'created') {
      notifications.push(
        await this.dispatcher.dispatch(
          templates.welcome(account.phoneNumber, this.catalogUrl(account), account.name),
          { sellerId: account.id }
        )
      );
    } else if (greeting === 'always') {
      notifications.push(
        await this.dispatcher.dispatch(
          templates.welcomeBack(account.phoneNumber, this.catalogUrl(account)),
          { sellerId: account.id }
        )
      );
    }

    return { account, created: outcome.kind === 'created', notifications };
  }

  /** Explicit registration: fails with ConflictError when the phone number is taken. */
  async register(phoneNumber: string, name?: string): Promise<Account> {
    const existing = await this.accounts.findByPhone(phoneNumber);
    if (existing) {
      throw new ConflictError('Seller already registered with this phone number', { phoneNumber });
    }

    const outcome = await this.insertWithFreshSlug(phoneNumber, name);
    if (outcome.kind === 'exists') {
      throw new ConflictError('Seller already registered with this phone number', { phoneNumber });
    }

    return outcome.account;
  }

  async touch(accountId: string): Promise<void> {
    try {
      await this.accounts.touch(accountId, this.clock.now());
    } catch (error) {
      this.logger.warn(`Failed to update last seen for seller ${accountId}: ${errorMessage(error)}`);
    }
  }

  private async insertWithFreshSlug(phoneNumber: string, name?: string): Promise<InsertOutcome> {
    for (let attempt = 1; attempt <= this.maxSlugAttempts; attempt++) {
      const catalogSlug = this.generateSlug();
      const account = await this.accounts.insertIfAbsent({ phoneNumber, catalogSlug, name });

      if (account) {
        this.logger.info(`Registered seller ${account.id} with catalog ${catalogSlug}`);
        await this.auditTrail.record(AuditAction.ACCOUNT_REGISTERED, {
          sellerId: account.id,
          data: { phoneNumber, name: name ?? null, catalogSlug }
        });
        return { kind: 'created', account };
      }

      // Nothing inserted: either someone registered this phone number
      // concurrently or the slug is taken.
      const winner = await this.accounts.findByPhone(phoneNumber);
      if (winner) {
        return { kind: 'exists', account: winner };
      }

      this.logger.debug(`Catalog slug ${catalogSlug} already taken (attempt ${attempt})`);
    }

    this.logger.error(`Could not allocate a catalog slug for ${phoneNumber} after ${this.maxSlugAttempts} attempts`);
    throw new SlugAllocationError(undefined, { phoneNumber, attempts: this.maxSlugAttempts });
  }
}
