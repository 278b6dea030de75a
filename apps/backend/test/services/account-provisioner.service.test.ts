import { createHarness } from '../fakes/harness';
import { AuditAction } from '../../src/types';
import { ConflictError, SlugAllocationError } from '../../src/utils/errors';

const sequence = (...slugs: string[]) => {
  let index = 0;
  return () => slugs[Math.min(index++, slugs.length - 1)];
};

describe('AccountProvisioner', () => {
  it('creates an account and welcomes the seller', async () => {
    const h = createHarness({ generateSlug: sequence('fresh002') });

    const { account, created, notifications } = await h.services.provisioner.getOrCreate('15551234567');

    expect(created).toBe(true);
    expect(account).toMatchObject({ phoneNumber: '15551234567', catalogSlug: 'fresh002', isActive: true });
    expect(notifications).toHaveLength(1);
    expect(h.messenger.bodies()).toEqual([
      '👋 Welcome to Stallbook, there!\n\nYour catalog is ready: https://catalog.test/c/fresh002\n\n' +
        'Send a photo of a product with its name and price as the caption (e.g. "Red Shoes $45.99") to add it.'
    ]);
    expect(h.auditStore.withAction(AuditAction.ACCOUNT_REGISTERED)[0]).toMatchObject({
      sellerId: account.id,
      data: { phoneNumber: '15551234567', name: null, catalogSlug: 'fresh002' }
    });
  });

  it('creates exactly one account under concurrent calls', async () => {
    const h = createHarness();

    const results = await Promise.all([
      h.services.provisioner.getOrCreate('15551234567', { greeting: 'on-create' }),
      h.services.provisioner.getOrCreate('15551234567', { greeting: 'on-create' }),
      h.services.provisioner.getOrCreate('15551234567', { greeting: 'on-create' })
    ]);

    expect(h.accounts.rows.size).toBe(1);
    expect(results.filter((result) => result.created)).toHaveLength(1);
    expect(new Set(results.map((result) => result.account.id)).size).toBe(1);
    expect(h.auditStore.withAction(AuditAction.ACCOUNT_REGISTERED)).toHaveLength(1);
    expect(h.messenger.sent).toHaveLength(1);
  });

  it('retries with a new slug when the slug is taken', async () => {
    const h = createHarness({ generateSlug: sequence('taken001', 'fresh002') });
    h.accounts.seed({ phoneNumber: '15550000000', catalogSlug: 'taken001' });

    const { account } = await h.services.provisioner.getOrCreate('15551234567');

    expect(account.catalogSlug).toBe('fresh002');
    expect(h.accounts.insertAttempts).toBe(2);
    expect(h.logger.debug).toHaveBeenCalledWith('Catalog slug taken001 already taken (attempt 1)');
  });

  it('gives up after the slug attempt limit', async () => {
    const h = createHarness({ generateSlug: () => 'taken001' });
    h.accounts.seed({ phoneNumber: '15550000000', catalogSlug: 'taken001' });

    await expect(h.services.provisioner.getOrCreate('15551234567')).rejects.toBeInstanceOf(SlugAllocationError);

    expect(h.accounts.insertAttempts).toBe(5);
    expect(h.logger.error).toHaveBeenCalledWith('Could not allocate a catalog slug for 15551234567 after 5 attempts');
    expect(h.messenger.sent).toHaveLength(0);
  });

  describe('greeting modes', () => {
    it('welcomes a known seller back when greeting always', async () => {
      const h = createHarness();
      const seller = h.accounts.seed({ phoneNumber: '15551234567', catalogSlug: 'shop0001' });

      const { account, created } = await h.services.provisioner.getOrCreate('15551234567', { greeting: 'always' });

      expect(created).toBe(false);
      expect(account.id).toBe(seller.id);
      expect(h.messenger.bodies()).toEqual([
        'Welcome back! 👋\n\nYour catalog: https://catalog.test/c/shop0001\n\nSend a product photo any time to add it.'
      ]);
    });

    it('stays quiet for a known seller on create-only greeting', async () => {
      const h = createHarness();
      h.accounts.seed({ phoneNumber: '15551234567', catalogSlug: 'shop0001' });

      const { notifications } = await h.services.provisioner.getOrCreate('15551234567', { greeting: 'on-create' });

      expect(notifications).toEqual([]);
      expect(h.messenger.sent).toHaveLength(0);
    });
  });

  describe('register', () => {
    it('registers a new seller with a name', async () => {
      const h = createHarness({ generateSlug: sequence('fresh002') });

      const account = await h.services.provisioner.register('15551234567', 'Ama');

      expect(account).toMatchObject({ name: 'Ama', catalogSlug: 'fresh002' });
      expect(h.messenger.sent).toHaveLength(0);
    });

    it('refuses a phone number that is already registered', async () => {
      const h = createHarness();
      h.accounts.seed({ phoneNumber: '15551234567', catalogSlug: 'shop0001' });

      await expect(h.services.provisioner.register('15551234567')).rejects.toThrow(
        new ConflictError('Seller already registered with this phone number')
      );
    });
  });

  describe('touch', () => {
    it('records when the seller was last seen', async () => {
      const h = createHarness();
      const seller = h.accounts.seed({ phoneNumber: '15551234567', catalogSlug: 'shop0001' });
      h.clock.advance(5000);

      await h.services.provisioner.touch(seller.id);

      expect(h.accounts.rows.get(seller.id)?.lastSeenAt).toEqual(new Date('2024-03-01T12:00:05.000Z'));
    });

    it('only warns when the update fails', async () => {
      const h = createHarness();
      const seller = h.accounts.seed({ phoneNumber: '15551234567', catalogSlug: 'shop0001' });
      jest.spyOn(h.accounts, 'touch').mockRejectedValue(new Error('db unavailable'));

      await expect(h.services.provisioner.touch(seller.id)).resolves.toBeUndefined();
      expect(h.logger.warn).toHaveBeenCalledWith(`Failed to update last seen for seller ${seller.id}: db unavailable`);
    });
  });
});
