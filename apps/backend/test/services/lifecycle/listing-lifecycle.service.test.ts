import { Harness, createHarness } from '../../fakes/harness';
import { jpegImage } from '../../fakes/collaborators';
import { Account, AuditAction, Listing, ListingState } from '../../../src/types';
import {
  ConflictError,
  GoneError,
  InvalidInputError,
  NotFoundError,
  PayloadTooLargeError,
  UpstreamFailureError
} from '../../../src/utils/errors';

describe('ListingLifecycleService', () => {
  let h: Harness;
  let seller: Account;

  const activeListing = async (name: string, owner: Account = seller): Promise<Listing> => {
    const draft = await h.listings.create({
      sellerId: owner.id,
      name,
      currency: 'USD',
      imageUrl: `https://api.test/uploads/${name}.jpg`,
      imagePath: `uploads/${name}.jpg`
    });
    const active = await h.listings.applyStateChange(draft.id, {
      from: ListingState.DRAFT,
      to: ListingState.ACTIVE,
      removedAt: null,
      undoDeadline: null
    });
    if (!active) {
      throw new Error('fixture listing was not activated');
    }
    return active;
  };

  beforeEach(() => {
    h = createHarness();
    seller = h.accounts.seed({ phoneNumber: '15551234567', catalogSlug: 'shop0001', name: 'Ama' });
  });

  describe('intake', () => {
    it('stores the image, drafts the listing and asks for confirmation', async () => {
      h.media.register('media-1');

      const { listing, notifications } = await h.services.lifecycle.intake(
        seller,
        { kind: 'media', mediaId: 'media-1' },
        'Red Shoes $45.99'
      );

      expect(listing).toMatchObject({
        sellerId: seller.id,
        name: 'Red Shoes',
        price: 45.99,
        currency: 'USD',
        state: ListingState.DRAFT,
        imageUrl: 'https://api.test/uploads/image-1.jpg',
        imagePath: 'uploads/image-1.jpg'
      });
      expect(h.images.files.has('uploads/image-1.jpg')).toBe(true);
      expect(h.auditStore.actions()).toEqual([AuditAction.PRODUCT_UPLOADED, AuditAction.MESSAGE_SENT]);
      expect(h.auditStore.withAction(AuditAction.PRODUCT_UPLOADED)[0].data).toEqual({
        productName: 'Red Shoes',
        price: 45.99,
        currency: 'USD',
        source: 'media'
      });

      expect(notifications).toHaveLength(1);
      expect(h.messenger.sent[0]).toEqual({
        kind: 'buttons',
        to: '15551234567',
        body: '📦 New product: *Red Shoes* - $45.99\n\nAdd it to your catalog?',
        buttons: [
          { id: `confirm_add_${listing.id}`, title: '✅ Add' },
          { id: `cancel_add_${listing.id}`, title: '❌ Cancel' }
        ]
      });
    });

    it('accepts a content type with parameters', async () => {
      h.media.register('media-png', { data: Buffer.alloc(16), contentType: 'Image/PNG; charset=binary', size: 16 });

      const { listing } = await h.services.lifecycle.intake(seller, { kind: 'media', mediaId: 'media-png' });

      expect(listing.imagePath).toBe('uploads/image-1.png');
      expect(listing.name).toBe('Untitled Product');
    });

    it('writes nothing when the download fails', async () => {
      h.media.register('media-1');
      h.media.failDownloads = true;

      await expect(
        h.services.lifecycle.intake(seller, { kind: 'media', mediaId: 'media-1' }, 'Lamp')
      ).rejects.toThrow(new UpstreamFailureError('Failed to download image'));

      expect(h.listings.rows.size).toBe(0);
      expect(h.images.files.size).toBe(0);
      expect(h.auditStore.rows).toHaveLength(0);
      expect(h.messenger.sent).toHaveLength(0);
    });

    it('reports unknown media as an upstream failure', async () => {
      await expect(
        h.services.lifecycle.intake(seller, { kind: 'media', mediaId: 'missing' })
      ).rejects.toBeInstanceOf(UpstreamFailureError);
    });

    it('rejects a missing media id', async () => {
      await expect(
        h.services.lifecycle.intake(seller, { kind: 'media', mediaId: ' ' })
      ).rejects.toThrow('Missing media id');
    });

    it('rejects unsupported image types', async () => {
      h.media.register('media-gif', { data: Buffer.alloc(10), contentType: 'image/gif', size: 10 });

      const intake = h.services.lifecycle.intake(seller, { kind: 'media', mediaId: 'media-gif' });

      await expect(intake).rejects.toBeInstanceOf(InvalidInputError);
      await expect(intake).rejects.toThrow('Unsupported image type: image/gif');
      expect(h.images.files.size).toBe(0);
    });

    it('rejects images over the size limit', async () => {
      h.media.register('media-big', { data: Buffer.alloc(1), contentType: 'image/jpeg', size: 10 * 1024 * 1024 + 1 });

      const intake = h.services.lifecycle.intake(seller, { kind: 'media', mediaId: 'media-big' });

      await expect(intake).rejects.toBeInstanceOf(PayloadTooLargeError);
      await expect(intake).rejects.toThrow('Image is larger than 10 MB');
    });

    it('accepts an image of exactly the size limit', async () => {
      h.media.register('media-max', { data: Buffer.alloc(1), contentType: 'image/jpeg', size: 10 * 1024 * 1024 });

      const { listing } = await h.services.lifecycle.intake(seller, { kind: 'media', mediaId: 'media-max' });

      expect(listing.state).toBe(ListingState.DRAFT);
    });

    it('deletes the stored image when the listing cannot be created', async () => {
      h.media.register('media-1');
      h.listings.failCreate = new Error('db unavailable');

      await expect(
        h.services.lifecycle.intake(seller, { kind: 'media', mediaId: 'media-1' })
      ).rejects.toThrow('db unavailable');

      expect(h.images.deleted).toEqual(['uploads/image-1.jpg']);
      expect(h.images.files.size).toBe(0);
    });

    it('downloads images given by url', async () => {
      h.media.files.set('https://cdn.test/shoe.jpg', jpegImage());

      const { listing } = await h.services.lifecycle.intake(seller, { kind: 'url', url: 'https://cdn.test/shoe.jpg' }, 'Shoe 12');

      expect(listing).toMatchObject({ name: 'Shoe', price: 12 });
      expect(h.auditStore.withAction(AuditAction.PRODUCT_UPLOADED)[0].data.source).toBe('url');
    });
  });

  describe('confirm and cancel', () => {
    let draft: Listing;

    beforeEach(async () => {
      h.media.register('media-1');
      ({ listing: draft } = await h.services.lifecycle.intake(
        seller,
        { kind: 'media', mediaId: 'media-1' },
        'Red Shoes $45.99'
      ));
      h.messenger.sent.length = 0;
    });

    it('publishes a draft and tells the seller', async () => {
      const { listing } = await h.services.lifecycle.confirm(draft.id);

      expect(listing.state).toBe(ListingState.ACTIVE);
      expect(h.auditStore.withAction(AuditAction.PRODUCT_CONFIRMED)).toHaveLength(1);
      expect(h.messenger.bodies()).toEqual([
        '✅ *Red Shoes* - $45.99 is now in your catalog.\n\nhttps://catalog.test/c/shop0001'
      ]);
    });

    it('rejects a second confirmation', async () => {
      await h.services.lifecycle.confirm(draft.id);

      await expect(h.services.lifecycle.confirm(draft.id)).rejects.toThrow(
        new ConflictError('Listing is already active')
      );
    });

    it('lets exactly one of two concurrent confirmations win', async () => {
      const results = await Promise.allSettled([
        h.services.lifecycle.confirm(draft.id),
        h.services.lifecycle.confirm(draft.id)
      ]);

      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(ConflictError);
      expect(h.auditStore.withAction(AuditAction.PRODUCT_CONFIRMED)).toHaveLength(1);
    });

    it('hides listings owned by another seller', async () => {
      const other = h.accounts.seed({ phoneNumber: '15550000000', catalogSlug: 'shop0002' });

      await expect(h.services.lifecycle.confirm(draft.id, { sellerId: other.id })).rejects.toBeInstanceOf(NotFoundError);
      expect(h.listings.rows.get(draft.id)?.state).toBe(ListingState.DRAFT);
    });

    it('discards a draft and its image', async () => {
      const { listing } = await h.services.lifecycle.cancel(draft.id);

      expect(listing.state).toBe(ListingState.DISCARDED);
      expect(h.listings.rows.has(draft.id)).toBe(false);
      expect(h.images.deleted).toEqual(['uploads/image-1.jpg']);
      expect(h.messenger.bodies()).toEqual(['❌ Upload cancelled. Nothing was added.']);
      expect(h.auditStore.withAction(AuditAction.PRODUCT_CANCELLED)[0].listingId).toBe(draft.id);

      await expect(h.services.lifecycle.confirm(draft.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('cannot cancel a published listing', async () => {
      await h.services.lifecycle.confirm(draft.id);

      await expect(h.services.lifecycle.cancel(draft.id)).rejects.toThrow('Listing is already active');
      expect(h.images.deleted).toEqual([]);
    });

    it('reports malformed ids as not found', async () => {
      await expect(h.services.lifecycle.confirm('not-a-uuid')).rejects.toThrow('Listing not-a-uuid not found');
    });
  });

  describe('remove and restore', () => {
    it('removes active listings and skips everything else', async () => {
      const shoes = await activeListing('shoes');
      const draft = await h.listings.create({
        sellerId: seller.id,
        name: 'draft',
        currency: 'USD',
        imageUrl: 'https://api.test/uploads/draft.jpg',
        imagePath: 'uploads/draft.jpg'
      });

      const { removed, undoUntil } = await h.services.lifecycle.remove([shoes.id, draft.id, 'nope', shoes.id]);

      expect(removed.map((listing) => listing.id)).toEqual([shoes.id]);
      expect(undoUntil.toISOString()).toBe('2024-03-01T12:00:30.000Z');
      expect(h.listings.rows.get(shoes.id)).toMatchObject({
        state: ListingState.REMOVED,
        removedAt: new Date('2024-03-01T12:00:00.000Z'),
        undoDeadline: new Date('2024-03-01T12:00:30.000Z')
      });
      expect(h.listings.rows.get(draft.id)?.state).toBe(ListingState.DRAFT);
      expect(h.auditStore.withAction(AuditAction.PRODUCT_REMOVED).map((record) => record.data)).toEqual([
        { productName: 'shoes', undoUntil: '2024-03-01T12:00:30.000Z' }
      ]);
    });

    it('writes nothing when no listing is active', async () => {
      const draft = await h.listings.create({
        sellerId: seller.id,
        name: 'draft',
        currency: 'USD',
        imageUrl: 'https://api.test/uploads/draft.jpg',
        imagePath: 'uploads/draft.jpg'
      });
      const bulkUpdate = jest.spyOn(h.listings, 'applyStateChangeMany');

      const { removed } = await h.services.lifecycle.remove([draft.id]);

      expect(removed).toEqual([]);
      expect(bulkUpdate).not.toHaveBeenCalled();
      expect(h.auditStore.withAction(AuditAction.PRODUCT_REMOVED)).toEqual([]);
    });

    it('only removes listings inside the owner scope', async () => {
      const other = h.accounts.seed({ phoneNumber: '15550000000', catalogSlug: 'shop0002' });
      const mine = await activeListing('mine');
      const theirs = await activeListing('theirs', other);

      const { removed } = await h.services.lifecycle.remove([mine.id, theirs.id], { sellerId: seller.id });

      expect(removed.map((listing) => listing.id)).toEqual([mine.id]);
      expect(h.listings.rows.get(theirs.id)?.state).toBe(ListingState.ACTIVE);
    });

    it('restores just before the undo deadline', async () => {
      const shoes = await activeListing('shoes');
      await h.services.lifecycle.remove([shoes.id]);
      h.clock.advance(29999);

      const restored = await h.services.lifecycle.restore(shoes.id);

      expect(restored.state).toBe(ListingState.ACTIVE);
      expect(restored.undoDeadline).toBeUndefined();
      expect(h.auditStore.withAction(AuditAction.PRODUCT_RESTORED)).toHaveLength(1);
    });

    it('refuses to restore at the undo deadline', async () => {
      const shoes = await activeListing('shoes');
      await h.services.lifecycle.remove([shoes.id]);
      h.clock.advance(30000);

      await expect(h.services.lifecycle.restore(shoes.id)).rejects.toThrow(new GoneError('Undo window has expired'));
      expect(h.listings.rows.get(shoes.id)?.state).toBe(ListingState.REMOVED);
    });

    it('refuses to restore a listing that was never removed', async () => {
      const shoes = await activeListing('shoes');

      await expect(h.services.lifecycle.restore(shoes.id)).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe('purge', () => {
    it('deletes the listing from any state', async () => {
      const shoes = await activeListing('shoes');

      const purged = await h.services.lifecycle.purge(shoes.id);

      expect(purged.state).toBe(ListingState.PURGED);
      expect(h.listings.rows.has(shoes.id)).toBe(false);
      expect(h.images.deleted).toEqual(['uploads/shoes.jpg']);
      expect(h.auditStore.withAction(AuditAction.PRODUCT_REMOVED)[0].data).toEqual({
        productName: 'shoes',
        permanent: true,
        previousState: 'active'
      });
    });

    it('tolerates a failure to delete the image', async () => {
      const shoes = await activeListing('shoes');
      h.images.failDeletes = true;

      await h.services.lifecycle.purge(shoes.id);

      expect(h.listings.rows.has(shoes.id)).toBe(false);
      expect(h.logger.warn).toHaveBeenCalledWith('Failed to delete image uploads/shoes.jpg: EACCES: permission denied');
    });
  });

  describe('updateDetails', () => {
    it('normalizes the new details', async () => {
      const shoes = await activeListing('shoes');

      const updated = await h.services.lifecycle.updateDetails(shoes.id, {
        name: ' Blue Shoes ',
        price: 10.456,
        currency: 'gbp'
      });

      expect(updated).toMatchObject({ name: 'Blue Shoes', price: 10.46, currency: 'GBP' });
    });

    it('rejects a negative price and an empty name', async () => {
      const shoes = await activeListing('shoes');

      await expect(h.services.lifecycle.updateDetails(shoes.id, { price: -1 })).rejects.toThrow(
        'Price must be a non-negative number'
      );
      await expect(h.services.lifecycle.updateDetails(shoes.id, { name: '  ' })).rejects.toThrow(
        'Name must not be empty'
      );
    });
  });

  it('lists a seller\'s listings with counts', async () => {
    await activeListing('one');
    const two = await activeListing('two');
    await h.services.lifecycle.remove([two.id]);

    const visible = await h.services.lifecycle.listForSeller(seller.id);
    const all = await h.services.lifecycle.listForSeller(seller.id, { includeInactive: true });

    expect(visible.listings.map((listing) => listing.name)).toEqual(['one']);
    expect(all.listings).toHaveLength(2);
    expect(visible.counts).toEqual({ total: 2, draft: 0, active: 1, removed: 1 });
  });

  describe('reclaimAssets', () => {
    const retention = 24 * 60 * 60 * 1000;

    it('deletes images once the retention period after the deadline has passed', async () => {
      const shoes = await activeListing('shoes');
      await h.services.lifecycle.remove([shoes.id]);

      h.clock.advance(30000 + retention);
      expect(await h.services.lifecycle.reclaimAssets()).toBe(0);

      h.clock.advance(1);
      expect(await h.services.lifecycle.reclaimAssets()).toBe(1);

      expect(h.images.deleted).toEqual(['uploads/shoes.jpg']);
      expect(h.listings.rows.get(shoes.id)).toMatchObject({
        state: ListingState.REMOVED,
        assetReclaimedAt: h.clock.now()
      });
      expect(await h.services.lifecycle.reclaimAssets()).toBe(0);
    });

    it('keeps going when one image cannot be deleted', async () => {
      const shoes = await activeListing('shoes');
      await h.services.lifecycle.remove([shoes.id]);
      h.clock.advance(30000 + retention + 1);
      h.images.failDeletes = true;

      expect(await h.services.lifecycle.reclaimAssets()).toBe(0);
      expect(h.listings.rows.get(shoes.id)?.assetReclaimedAt).toBeUndefined();
    });
  });
});
