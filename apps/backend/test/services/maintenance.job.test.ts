import { MaintenanceJob } from '../../src/services/maintenance.job';
import { AuditAction, ListingState } from '../../src/types';
import { Harness, createHarness } from '../fakes/harness';

describe('MaintenanceJob', () => {
  let h: Harness;
  let job: MaintenanceJob;

  beforeEach(() => {
    h = createHarness();
    job = new MaintenanceJob(
      h.services.lifecycle,
      h.services.auditTrail,
      { assetSweepMs: 60000, auditRetryMs: 60000 },
      h.logger
    );
  });

  afterEach(() => {
    job.stop();
  });

  it('does not schedule without an interval', () => {
    const disabled = new MaintenanceJob(
      h.services.lifecycle,
      h.services.auditTrail,
      { assetSweepMs: 0, auditRetryMs: 0 },
      h.logger
    );

    expect(disabled.start()).toBe(false);
    expect(disabled.isScheduled).toBe(false);
  });

  it('replays audit records with the default configuration', async () => {
    jest.useFakeTimers({ doNotFake: ['setImmediate'] });
    const reclaim = jest.spyOn(h.services.lifecycle, 'reclaimAssets');
    h.auditStore.failInserts = 1;
    await h.services.auditTrail.record(AuditAction.ERROR, { data: { message: 'boom' } });

    expect(h.services.maintenance.start()).toBe(true);
    expect(h.services.maintenance.scheduledTasks()).toEqual(['audit retry']);

    await jest.advanceTimersByTimeAsync(60000);
    h.services.maintenance.stop();

    expect(h.services.auditTrail.pendingCount).toBe(0);
    expect(h.auditStore.actions()).toEqual([AuditAction.ERROR]);
    expect(reclaim).not.toHaveBeenCalled();
  });

  it('schedules only the asset sweep when audit retries are off', () => {
    const sweepOnly = new MaintenanceJob(
      h.services.lifecycle,
      h.services.auditTrail,
      { assetSweepMs: 5000, auditRetryMs: 0 },
      h.logger
    );

    expect(sweepOnly.start()).toBe(true);
    expect(sweepOnly.scheduledTasks()).toEqual(['asset sweep']);
    sweepOnly.stop();
  });

  it('schedules once until stopped', () => {
    expect(job.start()).toBe(true);
    expect(job.start()).toBe(false);

    job.stop();
    expect(job.isScheduled).toBe(false);
  });

  it('reclaims assets and replays audit records in one run', async () => {
    const seller = h.accounts.seed({ phoneNumber: '15551234567', catalogSlug: 'shop0001' });
    const listing = await h.listings.create({
      sellerId: seller.id,
      name: 'Lamp',
      currency: 'USD',
      imageUrl: 'https://api.test/uploads/lamp.jpg',
      imagePath: 'uploads/lamp.jpg'
    });
    await h.listings.applyStateChange(listing.id, {
      from: ListingState.DRAFT,
      to: ListingState.REMOVED,
      removedAt: h.clock.now(),
      undoDeadline: h.clock.now()
    });
    h.auditStore.failInserts = 1;
    await h.services.auditTrail.record(AuditAction.CATALOG_VIEWED, { sellerId: seller.id });
    h.clock.advance(24 * 60 * 60 * 1000 + 1);

    expect(await job.runOnce()).toEqual({ reclaimedAssets: 1, replayedAuditRecords: 1 });
    expect(h.images.deleted).toEqual(['uploads/lamp.jpg']);
  });

  it('runs on every interval', async () => {
    jest.useFakeTimers({ doNotFake: ['setImmediate'] });
    h.auditStore.failInserts = 1;
    await h.services.auditTrail.record(AuditAction.CATALOG_VIEWED);
    job.start();

    await jest.advanceTimersByTimeAsync(60000);

    expect(h.services.auditTrail.pendingCount).toBe(0);
    expect(h.auditStore.actions()).toEqual([AuditAction.CATALOG_VIEWED]);
  });

  it('logs a failed run and keeps the schedule', async () => {
    jest.useFakeTimers({ doNotFake: ['setImmediate'] });
    jest.spyOn(h.services.lifecycle, 'reclaimAssets').mockRejectedValue(new Error('disk unavailable'));
    job.start();

    await jest.advanceTimersByTimeAsync(60000);

    expect(h.logger.error).toHaveBeenCalledWith('Maintenance asset sweep failed: disk unavailable');
    expect(job.isScheduled).toBe(true);
  });
});
