import { validate as isUuid } from 'uuid';
import {
  AccountStore,
  ListingCounts,
  ListingStore,
  StateChange,
  UpdateListingParams
} from '../../db/interfaces/store.interfaces';
import { ImageStore, MediaResolver, DownloadedMedia, StoredImage } from '../../interfaces/messaging.interfaces';
import {
  Account,
  AuditAction,
  Clock,
  Listing,
  ListingState,
  Notification,
  RawImageRef,
  StoredListingState,
  systemClock
} from '../../types';
import {
  AppError,
  ConflictError,
  GoneError,
  InvalidInputError,
  NotFoundError,
  PayloadTooLargeError,
  UpstreamFailureError,
  errorMessage
} from '../../utils/errors';
import { buildCatalogUrl, roundPrice } from '../../utils';
import defaultLogger, { Logger } from '../../utils/logger';
import { AuditTrailService } from '../audit-trail.service';
import { NotificationDispatcher } from '../notifications/notification-dispatcher.service';
import * as templates from '../notifications/templates';
import { parseCaption } from './caption-parser';
import {
  DeleteTransition,
  RejectedTransition,
  TransitionOutcome,
  UpdateTransition,
  cancelTransition,
  confirmTransition,
  purgeTransition,
  removeTransition,
  restoreTransition
} from './transitions';

export interface LifecycleOptions {
  defaultCurrency: string;
  catalogBaseUrl: string;
  undoWindowMs: number;
  assetRetentionMs: number;
  maxUploadSize: number;
  allowedTypes: string[];
  logger?: Logger;
  clock?: Clock;
}

export interface OwnerScope {
  /** When set, listings owned by anyone else are reported as not found. */
  sellerId?: string;
}

export interface LifecycleResult {
  listing: Listing;
  notifications: Notification[];
}

export interface RemoveResult {
  removed: Listing[];
  undoUntil: Date;
}

export interface SellerListings {
  listings: Listing[];
  counts: ListingCounts;
}

const RECLAIM_BATCH_SIZE = 100;

export class ListingLifecycleService {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly listings: ListingStore,
    private readonly accounts: AccountStore,
    private readonly auditTrail: AuditTrailService,
    private readonly dispatcher: NotificationDispatcher,
    private readonly media: MediaResolver,
    private readonly images: ImageStore,
    private readonly options: LifecycleOptions
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? systemClock;
  }

  get undoWindowMs(): number {
    return this.options.undoWindowMs;
  }

  /**
   * Downloads, validates and stores the image, then creates a DRAFT listing
   * and asks the seller to confirm it. Nothing is written when the image
   * cannot be fetched or is rejected.
   */
  async intake(account: Account, imageRef: RawImageRef, caption?: string): Promise<LifecycleResult> {
    const downloaded = await this.fetchImage(imageRef);
    this.validateImage(downloaded);

    const stored = await this.images.save(downloaded.data, this.normalizeContentType(downloaded.contentType));
    const parsed = parseCaption(caption, this.options.defaultCurrency);

    let listing: Listing;
    try {
      listing = await this.listings.create({
        sellerId: account.id,
        name: parsed.name,
        description: parsed.description,
        price: parsed.price,
        currency: parsed.currency,
        imageUrl: stored.url,
        imagePath: stored.path
      });
    } catch (error) {
      await this.deleteAsset(stored);
      throw error;
    }

    this.logger.info(`Listing ${listing.id} drafted for seller ${account.id}`);

    await this.auditTrail.record(AuditAction.PRODUCT_UPLOADED, {
      sellerId: account.id,
      listingId: listing.id,
      data: {
        productName: listing.name,
        price: listing.price ?? null,
        currency: listing.currency,
        source: imageRef.kind
      }
    });

    const prompt = await this.dispatcher.dispatch(
      templates.uploadPrompt(account.phoneNumber, listing),
      { sellerId: account.id, listingId: listing.id }
    );

    return { listing, notifications: [prompt] };
  }

  async confirm(listingId: string, scope: OwnerScope = {}): Promise<LifecycleResult> {
    const current = await this.load(listingId, scope);
    const listing = await this.applyUpdate(current, confirmTransition(current), confirmTransition);

    await this.auditTrail.record(AuditAction.PRODUCT_CONFIRMED, {
      sellerId: listing.sellerId,
      listingId: listing.id,
      data: { productName: listing.name }
    });

    const notifications: Notification[] = [];
    const seller = await this.accounts.findById(listing.sellerId);

    if (seller) {
      const catalogUrl = buildCatalogUrl(this.options.catalogBaseUrl, seller.catalogSlug);
      notifications.push(
        await this.dispatcher.dispatch(
          templates.productAdded(seller.phoneNumber, listing, catalogUrl),
          { sellerId: seller.id, listingId: listing.id }
        )
      );
    }

    return { listing, notifications };
  }

  async cancel(listingId: string, scope: OwnerScope = {}): Promise<LifecycleResult> {
    const current = await this.load(listingId, scope);
    const listing = await this.applyDelete(current, cancelTransition(current), cancelTransition);

    await this.deleteAsset({ url: listing.imageUrl, path: listing.imagePath });

    await this.auditTrail.record(AuditAction.PRODUCT_CANCELLED, {
      sellerId: listing.sellerId,
      listingId: listing.id,
      data: { productName: listing.name }
    });

    const notifications: Notification[] = [];
    const seller = await this.accounts.findById(listing.sellerId);

    if (seller) {
      notifications.push(
        await this.dispatcher.dispatch(templates.productCancelled(seller.phoneNumber), {
          sellerId: seller.id,
          listingId: listing.id
        })
      );
    }

    return { listing, notifications };
  }

  /**
   * Soft-removes every listing that is currently ACTIVE; other ids are
   * skipped without error.
   */
  async remove(listingIds: string[], scope: OwnerScope = {}): Promise<RemoveResult> {
    const now = this.clock.now();
    const undoUntil = new Date(now.getTime() + this.options.undoWindowMs);

    const ids: string[] = [];
    let change: StateChange | null = null;

    for (const id of new Set(listingIds.filter((candidate) => isUuid(candidate)))) {
      const listing = await this.listings.findById(id);
      if (!listing || (scope.sellerId !== undefined && listing.sellerId !== scope.sellerId)) {
        continue;
      }

      const outcome = removeTransition(listing, now, this.options.undoWindowMs);
      if (outcome.kind === 'update') {
        ids.push(id);
        change = outcome.change;
      }
    }

    if (!change) {
      this.logger.info(`Removed 0 of ${listingIds.length} listing(s)`);
      return { removed: [], undoUntil };
    }

    const removed = await this.listings.applyStateChangeMany(ids, change);

    for (const listing of removed) {
      await this.auditTrail.record(AuditAction.PRODUCT_REMOVED, {
        sellerId: listing.sellerId,
        listingId: listing.id,
        data: { productName: listing.name, undoUntil: undoUntil.toISOString() }
      });
    }

    this.logger.info(`Removed ${removed.length} of ${listingIds.length} listing(s)`);

    return { removed, undoUntil };
  }

  async restore(listingId: string, scope: OwnerScope = {}): Promise<Listing> {
    const now = this.clock.now();
    const current = await this.load(listingId, scope);
    const listing = await this.applyUpdate(
      current,
      restoreTransition(current, now),
      (fresh) => restoreTransition(fresh, now)
    );

    await this.auditTrail.record(AuditAction.PRODUCT_RESTORED, {
      sellerId: listing.sellerId,
      listingId: listing.id,
      data: { productName: listing.name }
    });

    return listing;
  }

  /** Administrative hard delete from any state. */
  async purge(listingId: string): Promise<Listing> {
    const current = await this.load(listingId);
    const listing = await this.applyDelete(current, purgeTransition(current), purgeTransition);

    await this.deleteAsset({ url: listing.imageUrl, path: listing.imagePath });

    await this.auditTrail.record(AuditAction.PRODUCT_REMOVED, {
      sellerId: listing.sellerId,
      listingId: listing.id,
      data: { productName: listing.name, permanent: true, previousState: current.state }
    });

    return listing;
  }

  async getListing(listingId: string, scope: OwnerScope = {}): Promise<Listing> {
    return await this.load(listingId, scope);
  }

  async listForSeller(sellerId: string, options: { includeInactive?: boolean } = {}): Promise<SellerListings> {
    const states: StoredListingState[] = options.includeInactive
      ? [ListingState.DRAFT, ListingState.ACTIVE, ListingState.REMOVED]
      : [ListingState.ACTIVE];

    const [listings, counts] = await Promise.all([
      this.listings.findBySeller(sellerId, states),
      this.listings.countBySeller(sellerId)
    ]);

    return { listings, counts };
  }

  async updateDetails(listingId: string, params: UpdateListingParams): Promise<Listing> {
    await this.load(listingId);

    if (params.price !== undefined && (!Number.isFinite(params.price) || params.price < 0)) {
      throw new InvalidInputError('Price must be a non-negative number', { price: params.price });
    }

    if (params.name !== undefined && params.name.trim().length === 0) {
      throw new InvalidInputError('Name must not be empty');
    }

    const updated = await this.listings.updateDetails(listingId, {
      name: params.name?.trim(),
      description: params.description,
      price: params.price !== undefined ? roundPrice(params.price) : undefined,
      currency: params.currency?.toUpperCase()
    });

    if (!updated) {
      throw new NotFoundError(`Listing ${listingId} not found`);
    }

    return updated;
  }

  /**
   * Deletes the image files of listings whose undo window closed more than
   * the retention period ago. Listing state is left untouched.
   */
  async reclaimAssets(limit: number = RECLAIM_BATCH_SIZE): Promise<number> {
    const now = this.clock.now();
    const cutoff = new Date(now.getTime() - this.options.assetRetentionMs);
    const candidates = await this.listings.findReclaimable(cutoff, limit);
    let reclaimed = 0;

    for (const listing of candidates) {
      try {
        await this.images.delete(listing.imagePath);
        await this.listings.markAssetReclaimed(listing.id, now);
        reclaimed++;
      } catch (error) {
        this.logger.warn(`Failed to reclaim image for listing ${listing.id}: ${errorMessage(error)}`);
      }
    }

    if (reclaimed > 0) {
      this.logger.info(`Reclaimed ${reclaimed} image(s) of removed listings`);
    }

    return reclaimed;
  }

  private async load(listingId: string, scope: OwnerScope = {}): Promise<Listing> {
    const listing = isUuid(listingId) ? await this.listings.findById(listingId) : null;

    if (!listing || (scope.sellerId !== undefined && listing.sellerId !== scope.sellerId)) {
      throw new NotFoundError(`Listing ${listingId} not found`);
    }

    return listing;
  }

  private async applyUpdate(
    current: Listing,
    outcome: TransitionOutcome,
    transitionFor: (fresh: Listing) => TransitionOutcome
  ): Promise<Listing> {
    const transition = this.accept(outcome);
    if (transition.kind !== 'update') {
      throw new AppError(`Unexpected ${transition.kind} transition for listing ${current.id}`);
    }

    const updated = await this.listings.applyStateChange(current.id, transition.change);
    if (!updated) {
      return await this.classifyMiss(current.id, transitionFor);
    }

    this.logger.info(`Listing ${current.id} ${transition.change.from} -> ${transition.change.to}`);
    return updated;
  }

  private async applyDelete(
    current: Listing,
    outcome: TransitionOutcome,
    transitionFor: (fresh: Listing) => TransitionOutcome
  ): Promise<Listing> {
    const transition: UpdateTransition | DeleteTransition = this.accept(outcome);
    if (transition.kind !== 'delete') {
      throw new AppError(`Unexpected ${transition.kind} transition for listing ${current.id}`);
    }

    const deleted = await this.listings.deleteById(current.id, transition.from);
    if (!deleted) {
      return await this.classifyMiss(current.id, transitionFor);
    }

    this.logger.info(`Listing ${current.id} ${deleted.state} -> ${transition.terminal}`);
    return { ...deleted, state: transition.terminal };
  }

  private accept(outcome: TransitionOutcome): UpdateTransition | DeleteTransition {
    if (outcome.kind === 'rejected') {
      throw this.rejectionError(outcome);
    }
    return outcome;
  }

  /** A conditional write matched nothing: work out what changed underneath. */
  private async classifyMiss(
    listingId: string,
    transitionFor: (fresh: Listing) => TransitionOutcome
  ): Promise<never> {
    const fresh = await this.listings.findById(listingId);

    if (!fresh) {
      throw new NotFoundError(`Listing ${listingId} not found`);
    }

    const outcome = transitionFor(fresh);
    if (outcome.kind === 'rejected') {
      throw this.rejectionError(outcome);
    }

    throw new ConflictError(`Listing ${listingId} changed concurrently`, { state: fresh.state });
  }

  private rejectionError(rejection: RejectedTransition): AppError {
    if (rejection.reason === 'expired') {
      return new GoneError('Undo window has expired');
    }
    return new ConflictError(`Listing is already ${rejection.state}`, { state: rejection.state });
  }

  private async fetchImage(imageRef: RawImageRef): Promise<DownloadedMedia> {
    let url: string;

    if (imageRef.kind === 'media') {
      if (imageRef.mediaId.trim().length === 0) {
        throw new InvalidInputError('Missing media id');
      }

      const resolved = await this.resolveMedia(imageRef.mediaId);
      if (!resolved) {
        throw new UpstreamFailureError('Could not resolve media', { mediaId: imageRef.mediaId });
      }
      url = resolved;
    } else {
      url = imageRef.url;
    }

    try {
      return await this.media.download(url);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      this.logger.warn(`Image download failed for ${url}: ${errorMessage(error)}`);
      throw new UpstreamFailureError('Failed to download image', { url });
    }
  }

  private async resolveMedia(mediaId: string): Promise<string | null> {
    try {
      return await this.media.resolveMediaUrl(mediaId);
    } catch (error) {
      this.logger.warn(`Media resolution failed for ${mediaId}: ${errorMessage(error)}`);
      throw new UpstreamFailureError('Could not resolve media', { mediaId });
    }
  }

  private validateImage(image: DownloadedMedia): void {
    const contentType = this.normalizeContentType(image.contentType);

    if (!this.options.allowedTypes.includes(contentType)) {
      throw new InvalidInputError(`Unsupported image type: ${contentType || 'unknown'}`, {
        contentType,
        allowedTypes: this.options.allowedTypes
      });
    }

    if (image.size > this.options.maxUploadSize) {
      throw new PayloadTooLargeError(
        `Image is larger than ${Math.floor(this.options.maxUploadSize / (1024 * 1024))} MB`,
        { size: image.size, maxSize: this.options.maxUploadSize }
      );
    }
  }

  private normalizeContentType(contentType: string): string {
    return contentType.split(';')[0].trim().toLowerCase();
  }

  private async deleteAsset(image: StoredImage): Promise<void> {
    try {
      await this.images.delete(image.path);
    } catch (error) {
      this.logger.warn(`Failed to delete image ${image.path}: ${errorMessage(error)}`);
    }
  }
}
