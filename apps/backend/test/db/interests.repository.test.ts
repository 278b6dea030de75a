import * as interestsRepository from '../../src/db/interests.repository';
import { query } from '../../src/db/index';

jest.mock('../../src/db/index', () => ({
  query: jest.fn()
}));

const mockQuery = query as jest.Mock;

describe('Interests Repository', () => {
  it('creates interests as not yet sent', async () => {
    mockQuery.mockResolvedValue({
      rows: [{
        id: 'interest-1',
        product_id: 'listing-1',
        buyer_name: 'Kofi',
        buyer_phone: null,
        buyer_ip: '127.0.0.1',
        user_agent: null,
        message_sent: false,
        created_at: new Date('2024-03-01T12:00:00.000Z')
      }]
    });

    const interest = await interestsRepository.create({ listingId: 'listing-1', buyerName: 'Kofi', buyerIp: '127.0.0.1' });

    expect(mockQuery).toHaveBeenCalledWith(
      expect.stringContaining('INSERT INTO interests'),
      ['listing-1', 'Kofi', null, '127.0.0.1', null]
    );
    expect(interest).toEqual({
      id: 'interest-1',
      listingId: 'listing-1',
      buyerName: 'Kofi',
      buyerPhone: undefined,
      buyerIp: '127.0.0.1',
      userAgent: undefined,
      messageSent: false,
      createdAt: new Date('2024-03-01T12:00:00.000Z')
    });
  });

  it('counts interests across a seller\'s products', async () => {
    const since = new Date('2024-02-23T12:00:00.000Z');
    mockQuery.mockResolvedValue({ rows: [{ count: '4' }] });

    expect(await interestsRepository.countForSeller('seller-1', since)).toBe(4);
    expect(mockQuery.mock.calls[0][0]).toContain('AND i.created_at >= $2');
    expect(mockQuery.mock.calls[0][1]).toEqual(['seller-1', since]);
  });
});
