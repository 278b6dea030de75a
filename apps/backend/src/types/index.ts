export interface Account {
  id: string;
  phoneNumber: string;
  name?: string;
  catalogSlug: string;
  isActive: boolean;
  lastSeenAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface Listing {
  id: string;
  sellerId: string;
  name: string;
  description?: string;
  price?: number;
  currency: string;
  imageUrl: string;
  imagePath: string;
  state: ListingState;
  removedAt?: Date;
  undoDeadline?: Date;
  assetReclaimedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface InterestSignal {
  id: string;
  listingId: string;
  buyerName?: string;
  buyerPhone?: string;
  buyerIp?: string;
  userAgent?: string;
  messageSent: boolean;
  createdAt: Date;
}

export interface AuditRecord {
  id: string;
  action: AuditAction;
  sellerId?: string;
  listingId?: string;
  interestId?: string;
  data: Record<string, unknown>;
  ipAddress?: string;
  userAgent?: string;
  externalMessageId?: string;
  createdAt: Date;
}

/**
 * DRAFT, ACTIVE and REMOVED are persisted. DISCARDED and PURGED are terminal:
 * the row is deleted and the state only appears on the returned snapshot.
 */
export enum ListingState {
  DRAFT = 'draft',
  ACTIVE = 'active',
  REMOVED = 'removed',
  DISCARDED = 'discarded',
  PURGED = 'purged'
}

export type StoredListingState = ListingState.DRAFT | ListingState.ACTIVE | ListingState.REMOVED;

export enum AuditAction {
  ACCOUNT_REGISTERED = 'account_registered',
  PRODUCT_UPLOADED = 'product_uploaded',
  PRODUCT_CONFIRMED = 'product_confirmed',
  PRODUCT_CANCELLED = 'product_cancelled',
  PRODUCT_REMOVED = 'product_removed',
  PRODUCT_RESTORED = 'product_restored',
  INTEREST_SIGNALED = 'interest_signaled',
  CATALOG_VIEWED = 'catalog_viewed',
  MESSAGE_SENT = 'message_sent',
  MESSAGE_RECEIVED = 'message_received',
  ERROR = 'error'
}

export type InboundEvent =
  | { type: 'text'; from: string; body: string; messageId?: string }
  | { type: 'image'; from: string; mediaRef: string; caption?: string; messageId?: string }
  | { type: 'button_tap'; from: string; buttonId: string; messageId?: string };

export type RawImageRef =
  | { kind: 'media'; mediaId: string }
  | { kind: 'url'; url: string };

export interface ReplyButton {
  id: string;
  title: string;
}

export type OutboundMessage =
  | { kind: 'text'; to: string; body: string }
  | { kind: 'image'; to: string; url: string; caption?: string }
  | { kind: 'buttons'; to: string; body: string; buttons: ReplyButton[] };

export type DeliveryResult =
  | { success: true; messageId?: string }
  | { success: false; error: string };

/** An outbound message together with how its delivery went. */
export type Notification = OutboundMessage & { delivery: DeliveryResult };

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

export interface JwtPayload {
  sub: string;
  role: 'admin' | 'seller';
}
