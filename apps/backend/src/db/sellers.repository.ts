import { query } from './index';
import { Account } from '../types';
import { CreateAccountParams, UpdateAccountParams } from './interfaces/store.interfaces';

interface DbSeller {
  id: string;
  phone_number: string;
  name: string | null;
  catalog_slug: string;
  is_active: boolean;
  last_seen_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export const findById = async (id: string): Promise<Account | null> => {
  const result = await query<DbSeller>('SELECT * FROM sellers WHERE id = $1', [id]);

  if (result.rows.length === 0) {
    return null;
  }

  return mapDbSellerToAccount(result.rows[0]);
};

export const findByPhone = async (phoneNumber: string): Promise<Account | null> => {
  const result = await query<DbSeller>(
    'SELECT * FROM sellers WHERE phone_number = $1',
    [phoneNumber]
  );

  if (result.rows.length === 0) {
    return null;
  }

  return mapDbSellerToAccount(result.rows[0]);
};

export const findBySlug = async (catalogSlug: string): Promise<Account | null> => {
  const result = await query<DbSeller>(
    'SELECT * FROM sellers WHERE catalog_slug = $1',
    [catalogSlug]
  );

  if (result.rows.length === 0) {
    return null;
  }

  return mapDbSellerToAccount(result.rows[0]);
};

/**
 * No conflict target: a clash on either unique column (phone number or
 * catalog slug) inserts nothing and returns no row.
 */
export const insertIfAbsent = async (params: CreateAccountParams): Promise<Account | null> => {
  const { phoneNumber, catalogSlug, name } = params;

  const result = await query<DbSeller>(
    `INSERT INTO sellers (phone_number, catalog_slug, name)
     VALUES ($1, $2, $3)
     ON CONFLICT DO NOTHING
     RETURNING *`,
    [phoneNumber, catalogSlug, name ?? null]
  );

  if (result.rows.length === 0) {
    return null;
  }

  return mapDbSellerToAccount(result.rows[0]);
};

export const update = async (id: string, params: UpdateAccountParams): Promise<Account | null> => {
  const updates: string[] = [];
  const values: unknown[] = [id];
  let paramIndex = 2;

  if (params.name !== undefined) {
    updates.push(`name = $${paramIndex++}`);
    values.push(params.name);
  }

  if (params.isActive !== undefined) {
    updates.push(`is_active = $${paramIndex++}`);
    values.push(params.isActive);
  }

  if (updates.length === 0) {
    return await findById(id);
  }

  updates.push('updated_at = NOW()');

  const result = await query<DbSeller>(
    `UPDATE sellers SET ${updates.join(', ')} WHERE id = $1 RETURNING *`,
    values
  );

  if (result.rows.length === 0) {
    return null;
  }

  return mapDbSellerToAccount(result.rows[0]);
};

export const touch = async (id: string, at: Date): Promise<void> => {
  await query('UPDATE sellers SET last_seen_at = $2 WHERE id = $1', [id, at]);
};

function mapDbSellerToAccount(row: DbSeller): Account {
  return {
    id: row.id,
    phoneNumber: row.phone_number,
    name: row.name ?? undefined,
    catalogSlug: row.catalog_slug,
    isActive: row.is_active,
    lastSeenAt: row.last_seen_at ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}
