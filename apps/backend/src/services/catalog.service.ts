import { validate as isUuid } from 'uuid';
import { AccountStore, InterestStore, ListingStore } from '../db/interfaces/store.interfaces';
import { Account, AuditAction, InterestSignal, Listing, ListingState } from '../types';
import { NotFoundError } from '../utils/errors';
import { buildDeepLink, buildInterestMessage } from '../utils';
import defaultLogger, { Logger } from '../utils/logger';
import { AuditTrailService } from './audit-trail.service';
import { NotificationDispatcher } from './notifications/notification-dispatcher.service';
import * as templates from './notifications/templates';

export interface RequestContext {
  ipAddress?: string;
  userAgent?: string;
}

export interface CatalogProduct {
  id: string;
  name: string;
  description?: string;
  price?: number;
  currency: string;
  imageUrl: string;
  sellerName?: string;
  whatsappLink: string;
  createdAt: Date;
}

export interface CatalogView {
  sellerName?: string;
  sellerPhone: string;
  catalogSlug: string;
  products: CatalogProduct[];
  totalProducts: number;
}

export interface InterestRequest {
  productId: string;
  buyerName?: string;
  buyerPhone?: string;
}

export interface InterestReceipt {
  interest: InterestSignal;
  whatsappLink: string;
}

/** Public, buyer-facing read side of a seller's catalog. */
export class CatalogService {
  constructor(
    private readonly accounts: AccountStore,
    private readonly listings: ListingStore,
    private readonly interests: InterestStore,
    private readonly auditTrail: AuditTrailService,
    private readonly dispatcher: NotificationDispatcher,
    private readonly defaultCountryCode: string,
    private readonly logger: Logger = defaultLogger
  ) {}

  async viewCatalog(catalogSlug: string, context: RequestContext = {}): Promise<CatalogView> {
    const seller = await this.findActiveSeller(catalogSlug);
    const listings = await this.listings.findBySeller(seller.id, [ListingState.ACTIVE]);

    await this.auditTrail.record(AuditAction.CATALOG_VIEWED, {
      sellerId: seller.id,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      data: { catalogSlug, productCount: listings.length }
    });

    const products = listings.map((listing) => this.toCatalogProduct(seller, listing));

    return {
      sellerName: seller.name,
      sellerPhone: seller.phoneNumber,
      catalogSlug: seller.catalogSlug,
      products,
      totalProducts: products.length
    };
  }

  async getProduct(catalogSlug: string, productId: string): Promise<CatalogProduct> {
    const seller = await this.findActiveSeller(catalogSlug);
    const listing = await this.findActiveListing(seller, productId);
    return this.toCatalogProduct(seller, listing);
  }

  /**
   * Records a buyer's interest in an ACTIVE listing and tells the seller.
   * `messageSent` reflects whether that notification went out.
   */
  async registerInterest(
    catalogSlug: string,
    request: InterestRequest,
    context: RequestContext = {}
  ): Promise<InterestReceipt> {
    const seller = await this.findActiveSeller(catalogSlug);
    const listing = await this.findActiveListing(seller, request.productId);

    const created = await this.interests.create({
      listingId: listing.id,
      buyerName: request.buyerName,
      buyerPhone: request.buyerPhone,
      buyerIp: context.ipAddress,
      userAgent: context.userAgent
    });

    const notification = await this.dispatcher.dispatch(
      templates.interestNotification(seller.phoneNumber, listing, {
        name: request.buyerName,
        phone: request.buyerPhone
      }),
      { sellerId: seller.id, listingId: listing.id, interestId: created.id }
    );

    const interest = notification.delivery.success
      ? (await this.interests.setMessageSent(created.id, true)) ?? { ...created, messageSent: true }
      : created;

    await this.auditTrail.record(AuditAction.INTEREST_SIGNALED, {
      sellerId: seller.id,
      listingId: listing.id,
      interestId: interest.id,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      data: {
        productName: listing.name,
        buyerName: request.buyerName ?? null,
        buyerPhone: request.buyerPhone ?? null,
        messageSent: interest.messageSent
      }
    });

    this.logger.info(`Interest ${interest.id} registered for listing ${listing.id}`);

    return { interest, whatsappLink: this.deepLinkFor(seller, listing) };
  }

  private async findActiveSeller(catalogSlug: string): Promise<Account> {
    const seller = await this.accounts.findBySlug(catalogSlug);

    if (!seller || !seller.isActive) {
      throw new NotFoundError('Catalog not found or unavailable', { catalogSlug });
    }

    return seller;
  }

  private async findActiveListing(seller: Account, productId: string): Promise<Listing> {
    const listing = isUuid(productId) ? await this.listings.findById(productId) : null;

    if (!listing || listing.sellerId !== seller.id || listing.state !== ListingState.ACTIVE) {
      throw new NotFoundError('Product not found or no longer available', { productId });
    }

    return listing;
  }

  private deepLinkFor(seller: Account, listing: Listing): string {
    return buildDeepLink(
      seller.phoneNumber,
      buildInterestMessage(listing.name, listing.price, listing.currency),
      this.defaultCountryCode
    );
  }

  private toCatalogProduct(seller: Account, listing: Listing): CatalogProduct {
    return {
      id: listing.id,
      name: listing.name,
      description: listing.description,
      price: listing.price,
      currency: listing.currency,
      imageUrl: listing.imageUrl,
      sellerName: seller.name,
      whatsappLink: this.deepLinkFor(seller, listing),
      createdAt: listing.createdAt
    };
  }
}
