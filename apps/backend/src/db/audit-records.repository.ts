import { query } from './index';
import { AuditAction, AuditRecord } from '../types';
import { AuditQueryOptions, CreateAuditRecordParams } from './interfaces/store.interfaces';

// Rows are only ever inserted.

interface DbAuditRecord {
  id: string;
  action: AuditAction;
  seller_id: string | null;
  product_id: string | null;
  interest_id: string | null;
  data: Record<string, unknown> | null;
  ip_address: string | null;
  user_agent: string | null;
  external_message_id: string | null;
  created_at: Date;
}

export async function insert(params: CreateAuditRecordParams): Promise<AuditRecord> {
  const result = await query<DbAuditRecord>(
    `INSERT INTO audit_records
     (action, seller_id, product_id, interest_id, data, ip_address, user_agent, external_message_id)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
     RETURNING *`,
    [
      params.action,
      params.sellerId ?? null,
      params.listingId ?? null,
      params.interestId ?? null,
      JSON.stringify(params.data),
      params.ipAddress ?? null,
      params.userAgent ?? null,
      params.externalMessageId ?? null
    ]
  );

  return mapRowToAuditRecord(result.rows[0]);
}

export async function findBySeller(sellerId: string, options: AuditQueryOptions = {}): Promise<AuditRecord[]> {
  const { action, limit = 100, offset = 0 } = options;
  const params: unknown[] = [sellerId, limit, offset];
  let actionClause = '';

  if (action) {
    params.push(action);
    actionClause = 'AND action = $4';
  }

  const result = await query<DbAuditRecord>(
    `SELECT * FROM audit_records
     WHERE seller_id = $1 ${actionClause}
     ORDER BY created_at DESC
     LIMIT $2 OFFSET $3`,
    params
  );

  return result.rows.map(mapRowToAuditRecord);
}

export async function findByListing(listingId: string, limit: number = 50): Promise<AuditRecord[]> {
  const result = await query<DbAuditRecord>(
    `SELECT * FROM audit_records
     WHERE product_id = $1
     ORDER BY created_at DESC
     LIMIT $2`,
    [listingId, limit]
  );

  return result.rows.map(mapRowToAuditRecord);
}

export async function findSince(since: Date, action?: AuditAction): Promise<AuditRecord[]> {
  const params: unknown[] = [since];
  let actionClause = '';

  if (action) {
    params.push(action);
    actionClause = 'AND action = $2';
  }

  const result = await query<DbAuditRecord>(
    `SELECT * FROM audit_records
     WHERE created_at >= $1 ${actionClause}
     ORDER BY created_at DESC`,
    params
  );

  return result.rows.map(mapRowToAuditRecord);
}

export async function countBySellerAndAction(sellerId: string, action: AuditAction): Promise<number> {
  const result = await query<{ count: string }>(
    'SELECT COUNT(*) AS count FROM audit_records WHERE seller_id = $1 AND action = $2',
    [sellerId, action]
  );

  return parseInt(result.rows[0].count, 10);
}

function mapRowToAuditRecord(row: DbAuditRecord): AuditRecord {
  return {
    id: row.id,
    action: row.action,
    sellerId: row.seller_id ?? undefined,
    listingId: row.product_id ?? undefined,
    interestId: row.interest_id ?? undefined,
    data: row.data ?? {},
    ipAddress: row.ip_address ?? undefined,
    userAgent: row.user_agent ?? undefined,
    externalMessageId: row.external_message_id ?? undefined,
    createdAt: row.created_at
  };
}
