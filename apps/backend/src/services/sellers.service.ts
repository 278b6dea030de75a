import { validate as isUuid } from 'uuid';
import {
  AccountStore,
  AuditQueryOptions,
  InterestStore,
  ListingStore,
  UpdateAccountParams
} from '../db/interfaces/store.interfaces';
import { Account, AuditAction, AuditRecord, Clock, systemClock } from '../types';
import { NotFoundError } from '../utils/errors';
import { buildCatalogUrl } from '../utils';
import { AuditTrailService } from './audit-trail.service';

const RECENT_INTEREST_DAYS = 7;
const DAY_IN_MS = 24 * 60 * 60 * 1000;

export interface SellerStats {
  totalProducts: number;
  draftProducts: number;
  activeProducts: number;
  removedProducts: number;
  totalInterests: number;
  recentInterests: number;
  catalogViews: number;
}

export interface CatalogLink {
  catalogUrl: string;
  catalogSlug: string;
}

export class SellersService {
  constructor(
    private readonly accounts: AccountStore,
    private readonly listings: ListingStore,
    private readonly interests: InterestStore,
    private readonly auditTrail: AuditTrailService,
    private readonly catalogBaseUrl: string,
    private readonly clock: Clock = systemClock
  ) {}

  async getById(sellerId: string): Promise<Account> {
    const seller = isUuid(sellerId) ? await this.accounts.findById(sellerId) : null;

    if (!seller) {
      throw new NotFoundError('Seller not found', { sellerId });
    }

    return seller;
  }

  async getByPhone(phoneNumber: string): Promise<Account> {
    const seller = await this.accounts.findByPhone(phoneNumber);

    if (!seller) {
      throw new NotFoundError('Seller not found', { phoneNumber });
    }

    return seller;
  }

  async update(sellerId: string, params: UpdateAccountParams): Promise<Account> {
    await this.getById(sellerId);
    const updated = await this.accounts.update(sellerId, params);

    if (!updated) {
      throw new NotFoundError('Seller not found', { sellerId });
    }

    return updated;
  }

  async getStats(sellerId: string): Promise<SellerStats> {
    await this.getById(sellerId);

    const since = new Date(this.clock.now().getTime() - RECENT_INTEREST_DAYS * DAY_IN_MS);
    const [counts, totalInterests, recentInterests, catalogViews] = await Promise.all([
      this.listings.countBySeller(sellerId),
      this.interests.countForSeller(sellerId),
      this.interests.countForSeller(sellerId, since),
      this.auditTrail.countForSeller(sellerId, AuditAction.CATALOG_VIEWED)
    ]);

    return {
      totalProducts: counts.total,
      draftProducts: counts.draft,
      activeProducts: counts.active,
      removedProducts: counts.removed,
      totalInterests,
      recentInterests,
      catalogViews
    };
  }

  async getCatalogLink(sellerId: string): Promise<CatalogLink> {
    const seller = await this.getById(sellerId);

    return {
      catalogUrl: buildCatalogUrl(this.catalogBaseUrl, seller.catalogSlug),
      catalogSlug: seller.catalogSlug
    };
  }

  async getAuditTrail(sellerId: string, options: AuditQueryOptions = {}): Promise<AuditRecord[]> {
    await this.getById(sellerId);
    return await this.auditTrail.forSeller(sellerId, options);
  }
}
