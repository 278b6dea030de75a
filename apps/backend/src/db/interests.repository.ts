import { query } from './index';
import { InterestSignal } from '../types';
import { CreateInterestParams } from './interfaces/store.interfaces';

interface DbInterest {
  id: string;
  product_id: string;
  buyer_phone: string | null;
  buyer_name: string | null;
  buyer_ip: string | null;
  user_agent: string | null;
  message_sent: boolean;
  created_at: Date;
}

export async function create(params: CreateInterestParams): Promise<InterestSignal> {
  const { listingId, buyerName, buyerPhone, buyerIp, userAgent } = params;

  const result = await query<DbInterest>(
    `INSERT INTO interests (product_id, buyer_name, buyer_phone, buyer_ip, user_agent, message_sent)
     VALUES ($1, $2, $3, $4, $5, FALSE)
     RETURNING *`,
    [listingId, buyerName ?? null, buyerPhone ?? null, buyerIp ?? null, userAgent ?? null]
  );

  return mapRowToInterest(result.rows[0]);
}

export async function setMessageSent(id: string, messageSent: boolean): Promise<InterestSignal | null> {
  const result = await query<DbInterest>(
    'UPDATE interests SET message_sent = $2 WHERE id = $1 RETURNING *',
    [id, messageSent]
  );

  if (result.rows.length === 0) {
    return null;
  }

  return mapRowToInterest(result.rows[0]);
}

export async function countForSeller(sellerId: string, since?: Date): Promise<number> {
  const params: unknown[] = [sellerId];
  let sinceClause = '';

  if (since) {
    params.push(since);
    sinceClause = 'AND i.created_at >= $2';
  }

  const result = await query<{ count: string }>(
    `SELECT COUNT(*) AS count
     FROM interests i
     JOIN products p ON p.id = i.product_id
     WHERE p.seller_id = $1 ${sinceClause}`,
    params
  );

  return parseInt(result.rows[0].count, 10);
}

function mapRowToInterest(row: DbInterest): InterestSignal {
  return {
    id: row.id,
    listingId: row.product_id,
    buyerName: row.buyer_name ?? undefined,
    buyerPhone: row.buyer_phone ?? undefined,
    buyerIp: row.buyer_ip ?? undefined,
    userAgent: row.user_agent ?? undefined,
    messageSent: row.message_sent,
    createdAt: row.created_at
  };
}
