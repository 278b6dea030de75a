import {
    Account,
    AuditAction,
    AuditRecord,
    InterestSignal,
    Listing,
    StoredListingState
} from '../../types';

export interface CreateAccountParams {
    phoneNumber: string;
    catalogSlug: string;
    name?: string;
}

export interface UpdateAccountParams {
    name?: string;
    isActive?: boolean;
}

export interface AccountStore {
    findById(id: string): Promise<Account | null>;
    findByPhone(phoneNumber: string): Promise<Account | null>;
    findBySlug(catalogSlug: string): Promise<Account | null>;
    /**
     * Atomic insert-if-absent. Resolves to null when either the phone number
     * or the catalog slug is already taken.
     */
    insertIfAbsent(params: CreateAccountParams): Promise<Account | null>;
    update(id: string, params: UpdateAccountParams): Promise<Account | null>;
    touch(id: string, at: Date): Promise<void>;
}

export interface CreateListingParams {
    sellerId: string;
    name: string;
    description?: string;
    price?: number;
    currency: string;
    imageUrl: string;
    imagePath: string;
}

export interface UpdateListingParams {
    name?: string;
    description?: string;
    price?: number;
    currency?: string;
}

/**
 * A conditional state write: applied only while the row is still in `from`
 * (and, for restores, while its undo deadline is after `deadlineAfter`).
 */
export interface StateChange {
    from: StoredListingState;
    to: StoredListingState;
    removedAt: Date | null;
    undoDeadline: Date | null;
    deadlineAfter?: Date;
}

export interface ListingCounts {
    total: number;
    draft: number;
    active: number;
    removed: number;
}

export interface ListingStore {
    create(params: CreateListingParams): Promise<Listing>;
    findById(id: string): Promise<Listing | null>;
    findBySeller(sellerId: string, states: StoredListingState[]): Promise<Listing[]>;
    applyStateChange(id: string, change: StateChange): Promise<Listing | null>;
    applyStateChangeMany(ids: string[], change: StateChange): Promise<Listing[]>;
    /** Deletes the row, optionally only while it is in `from`. */
    deleteById(id: string, from?: StoredListingState): Promise<Listing | null>;
    updateDetails(id: string, params: UpdateListingParams): Promise<Listing | null>;
    findReclaimable(deadlineBefore: Date, limit: number): Promise<Listing[]>;
    markAssetReclaimed(id: string, at: Date): Promise<void>;
    countBySeller(sellerId: string): Promise<ListingCounts>;
}

export interface CreateInterestParams {
    listingId: string;
    buyerName?: string;
    buyerPhone?: string;
    buyerIp?: string;
    userAgent?: string;
}

export interface InterestStore {
    create(params: CreateInterestParams): Promise<InterestSignal>;
    setMessageSent(id: string, messageSent: boolean): Promise<InterestSignal | null>;
    countForSeller(sellerId: string, since?: Date): Promise<number>;
}

export type CreateAuditRecordParams = Omit<AuditRecord, 'id' | 'createdAt'>;

export interface AuditQueryOptions {
    action?: AuditAction;
    limit?: number;
    offset?: number;
}

export interface AuditStore {
    insert(params: CreateAuditRecordParams): Promise<AuditRecord>;
    findBySeller(sellerId: string, options?: AuditQueryOptions): Promise<AuditRecord[]>;
    findByListing(listingId: string, limit?: number): Promise<AuditRecord[]>;
    findSince(since: Date, action?: AuditAction): Promise<AuditRecord[]>;
    countBySellerAndAction(sellerId: string, action: AuditAction): Promise<number>;
}
