import { StateChange } from '../../db/interfaces/store.interfaces';
import { AuditAction, Listing, ListingState, StoredListingState } from '../../types';

/** Write the new state with a conditional update. */
export interface UpdateTransition {
  kind: 'update';
  action: AuditAction;
  change: StateChange;
}

/** Delete the row; the listing leaves the store in a terminal state. */
export interface DeleteTransition {
  kind: 'delete';
  action: AuditAction;
  from?: StoredListingState;
  terminal: ListingState.DISCARDED | ListingState.PURGED;
}

export interface RejectedTransition {
  kind: 'rejected';
  reason: 'wrong_state' | 'expired';
  state: ListingState;
}

export type TransitionOutcome = UpdateTransition | DeleteTransition | RejectedTransition;

const wrongState = (listing: Listing): RejectedTransition => ({
  kind: 'rejected',
  reason: 'wrong_state',
  state: listing.state
});

export function confirmTransition(listing: Listing): TransitionOutcome {
  if (listing.state !== ListingState.DRAFT) {
    return wrongState(listing);
  }

  return {
    kind: 'update',
    action: AuditAction.PRODUCT_CONFIRMED,
    change: {
      from: ListingState.DRAFT,
      to: ListingState.ACTIVE,
      removedAt: null,
      undoDeadline: null
    }
  };
}

export function cancelTransition(listing: Listing): TransitionOutcome {
  if (listing.state !== ListingState.DRAFT) {
    return wrongState(listing);
  }

  return {
    kind: 'delete',
    action: AuditAction.PRODUCT_CANCELLED,
    from: ListingState.DRAFT,
    terminal: ListingState.DISCARDED
  };
}

function removeChange(now: Date, undoWindowMs: number): StateChange {
  return {
    from: ListingState.ACTIVE,
    to: ListingState.REMOVED,
    removedAt: now,
    undoDeadline: new Date(now.getTime() + undoWindowMs)
  };
}

export function removeTransition(listing: Listing, now: Date, undoWindowMs: number): TransitionOutcome {
  if (listing.state !== ListingState.ACTIVE) {
    return wrongState(listing);
  }

  return {
    kind: 'update',
    action: AuditAction.PRODUCT_REMOVED,
    change: removeChange(now, undoWindowMs)
  };
}

/** The undo deadline is exclusive: a restore at exactly the deadline is too late. */
export function restoreTransition(listing: Listing, now: Date): TransitionOutcome {
  if (listing.state !== ListingState.REMOVED) {
    return wrongState(listing);
  }

  if (!listing.undoDeadline || now.getTime() >= listing.undoDeadline.getTime()) {
    return { kind: 'rejected', reason: 'expired', state: listing.state };
  }

  return {
    kind: 'update',
    action: AuditAction.PRODUCT_RESTORED,
    change: {
      from: ListingState.REMOVED,
      to: ListingState.ACTIVE,
      removedAt: null,
      undoDeadline: null,
      deadlineAfter: now
    }
  };
}

export function purgeTransition(listing: Listing): TransitionOutcome {
  if (listing.state === ListingState.DISCARDED || listing.state === ListingState.PURGED) {
    return wrongState(listing);
  }

  return {
    kind: 'delete',
    action: AuditAction.PRODUCT_REMOVED,
    terminal: ListingState.PURGED
  };
}
