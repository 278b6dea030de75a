import { query } from './index';
import { Listing, ListingState, StoredListingState } from '../types';
import {
  CreateListingParams,
  ListingCounts,
  StateChange,
  UpdateListingParams
} from './interfaces/store.interfaces';

interface DbProduct {
  id: string;
  seller_id: string;
  name: string;
  description: string | null;
  price: string | null;
  currency: string;
  image_url: string;
  image_path: string;
  state: StoredListingState;
  removed_at: Date | null;
  undo_deadline: Date | null;
  asset_reclaimed_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export const create = async (params: CreateListingParams): Promise<Listing> => {
  const { sellerId, name, description, price, currency, imageUrl, imagePath } = params;

  const result = await query<DbProduct>(
    `INSERT INTO products
     (seller_id, name, description, price, currency, image_url, image_path, state)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
     RETURNING *`,
    [sellerId, name, description ?? null, price ?? null, currency, imageUrl, imagePath, ListingState.DRAFT]
  );

  return mapDbProductToListing(result.rows[0]);
};

export const findById = async (id: string): Promise<Listing | null> => {
  const result = await query<DbProduct>('SELECT * FROM products WHERE id = $1', [id]);

  if (result.rows.length === 0) {
    return null;
  }

  return mapDbProductToListing(result.rows[0]);
};

export const findBySeller = async (sellerId: string, states: StoredListingState[]): Promise<Listing[]> => {
  const result = await query<DbProduct>(
    `SELECT * FROM products
     WHERE seller_id = $1 AND state = ANY($2::listing_state[])
     ORDER BY created_at DESC`,
    [sellerId, states]
  );

  return result.rows.map(mapDbProductToListing);
};

/**
 * Precondition and write in one statement, so a concurrent transition on
 * the same row either wins or matches nothing.
 */
export const applyStateChange = async (id: string, change: StateChange): Promise<Listing | null> => {
  const rows = await runStateChange('id = $1', [id], change);
  return rows.length > 0 ? rows[0] : null;
};

export const applyStateChangeMany = async (ids: string[], change: StateChange): Promise<Listing[]> => {
  if (ids.length === 0) {
    return [];
  }
  return await runStateChange('id = ANY($1::uuid[])', [ids], change);
};

async function runStateChange(idClause: string, idParams: unknown[], change: StateChange): Promise<Listing[]> {
  const values: unknown[] = [...idParams, change.to, change.removedAt, change.undoDeadline, change.from];
  let guard = `${idClause} AND state = $5`;

  if (change.deadlineAfter) {
    values.push(change.deadlineAfter);
    guard += ' AND undo_deadline > $6';
  }

  const result = await query<DbProduct>(
    `UPDATE products
     SET state = $2, removed_at = $3, undo_deadline = $4, updated_at = NOW()
     WHERE ${guard}
     RETURNING *`,
    values
  );

  return result.rows.map(mapDbProductToListing);
}

export const deleteById = async (id: string, from?: StoredListingState): Promise<Listing | null> => {
  const result = from
    ? await query<DbProduct>('DELETE FROM products WHERE id = $1 AND state = $2 RETURNING *', [id, from])
    : await query<DbProduct>('DELETE FROM products WHERE id = $1 RETURNING *', [id]);

  if (result.rows.length === 0) {
    return null;
  }

  return mapDbProductToListing(result.rows[0]);
};

export const updateDetails = async (id: string, params: UpdateListingParams): Promise<Listing | null> => {
  const { name, description, price, currency } = params;

  const updates: string[] = [];
  const values: unknown[] = [id];
  let paramIndex = 2;

  if (name !== undefined) {
    updates.push(`name = $${paramIndex++}`);
    values.push(name);
  }

  if (description !== undefined) {
    updates.push(`description = $${paramIndex++}`);
    values.push(description);
  }

  if (price !== undefined) {
    updates.push(`price = $${paramIndex++}`);
    values.push(price);
  }

  if (currency !== undefined) {
    updates.push(`currency = $${paramIndex++}`);
    values.push(currency);
  }

  if (updates.length === 0) {
    return await findById(id);
  }

  updates.push('updated_at = NOW()');

  const result = await query<DbProduct>(
    `UPDATE products SET ${updates.join(', ')} WHERE id = $1 RETURNING *`,
    values
  );

  if (result.rows.length === 0) {
    return null;
  }

  return mapDbProductToListing(result.rows[0]);
};

export const findReclaimable = async (deadlineBefore: Date, limit: number): Promise<Listing[]> => {
  const result = await query<DbProduct>(
    `SELECT * FROM products
     WHERE state = $1 AND undo_deadline < $2 AND asset_reclaimed_at IS NULL
     ORDER BY undo_deadline ASC
     LIMIT $3`,
    [ListingState.REMOVED, deadlineBefore, limit]
  );

  return result.rows.map(mapDbProductToListing);
};

export const markAssetReclaimed = async (id: string, at: Date): Promise<void> => {
  await query('UPDATE products SET asset_reclaimed_at = $2 WHERE id = $1', [id, at]);
};

export const countBySeller = async (sellerId: string): Promise<ListingCounts> => {
  const result = await query<{ state: StoredListingState; count: string }>(
    'SELECT state, COUNT(*) AS count FROM products WHERE seller_id = $1 GROUP BY state',
    [sellerId]
  );

  const counts: ListingCounts = { total: 0, draft: 0, active: 0, removed: 0 };

  for (const row of result.rows) {
    const count = parseInt(row.count, 10);
    counts.total += count;

    if (row.state === ListingState.DRAFT) {
      counts.draft = count;
    } else if (row.state === ListingState.ACTIVE) {
      counts.active = count;
    } else if (row.state === ListingState.REMOVED) {
      counts.removed = count;
    }
  }

  return counts;
};

function mapDbProductToListing(row: DbProduct): Listing {
  return {
    id: row.id,
    sellerId: row.seller_id,
    name: row.name,
    description: row.description ?? undefined,
    price: row.price !== null ? parseFloat(row.price) : undefined,
    currency: row.currency,
    imageUrl: row.image_url,
    imagePath: row.image_path,
    state: row.state,
    removedAt: row.removed_at ?? undefined,
    undoDeadline: row.undo_deadline ?? undefined,
    assetReclaimedAt: row.asset_reclaimed_at ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}
