import { AppConfig } from './config';
import * as sellersRepository from './db/sellers.repository';
import * as listingsRepository from './db/listings.repository';
import * as interestsRepository from './db/interests.repository';
import * as auditRecordsRepository from './db/audit-records.repository';
import { AccountStore, AuditStore, InterestStore, ListingStore } from './db/interfaces/store.interfaces';
import { ImageStore, MediaResolver, Messenger } from './interfaces/messaging.interfaces';
import { Clock, systemClock } from './types';
import defaultLogger, { Logger } from './utils/logger';
import { AccountProvisioner } from './services/account-provisioner.service';
import { AuditTrailService } from './services/audit-trail.service';
import { CatalogService } from './services/catalog.service';
import { ListingLifecycleService } from './services/lifecycle/listing-lifecycle.service';
import { MaintenanceJob } from './services/maintenance.job';
import { NotificationDispatcher } from './services/notifications/notification-dispatcher.service';
import { MessageRouter } from './services/router/message-router.service';
import { SellersService } from './services/sellers.service';
import { LocalImageStore } from './services/storage/local-image.store';
import { GraphMediaClient } from './services/whatsapp/media.client';
import { WhatsAppClient } from './services/whatsapp/whatsapp.client';

export interface Collaborators {
  accounts: AccountStore;
  listings: ListingStore;
  interests: InterestStore;
  auditStore: AuditStore;
  messenger: Messenger;
  media: MediaResolver;
  images: ImageStore;
  clock: Clock;
  logger: Logger;
  generateSlug?: () => string;
}

export interface Services {
  config: AppConfig;
  auditTrail: AuditTrailService;
  dispatcher: NotificationDispatcher;
  provisioner: AccountProvisioner;
  lifecycle: ListingLifecycleService;
  router: MessageRouter;
  catalog: CatalogService;
  sellers: SellersService;
  maintenance: MaintenanceJob;
}

/**
 * Wires the services. Anything in `overrides` replaces the production
 * collaborator (PostgreSQL stores, Cloud API clients, local disk).
 */
export function createServices(config: AppConfig, overrides: Partial<Collaborators> = {}): Services {
  const deps: Collaborators = {
    accounts: overrides.accounts ?? sellersRepository,
    listings: overrides.listings ?? listingsRepository,
    interests: overrides.interests ?? interestsRepository,
    auditStore: overrides.auditStore ?? auditRecordsRepository,
    messenger: overrides.messenger ?? new WhatsAppClient({
      apiBaseUrl: config.whatsapp.apiBaseUrl,
      phoneNumberId: config.whatsapp.phoneNumberId,
      apiToken: config.whatsapp.apiToken,
      timeoutMs: config.http.timeoutMs,
      defaultCountryCode: config.catalog.defaultCountryCode
    }),
    media: overrides.media ?? new GraphMediaClient({
      apiBaseUrl: config.whatsapp.apiBaseUrl,
      apiToken: config.whatsapp.apiToken,
      timeoutMs: config.http.timeoutMs,
      maxContentLength: config.uploads.maxSize
    }),
    images: overrides.images ?? new LocalImageStore(config.uploads.dir, config.server.publicBaseUrl),
    clock: overrides.clock ?? systemClock,
    logger: overrides.logger ?? defaultLogger,
    generateSlug: overrides.generateSlug
  };

  const auditTrail = new AuditTrailService(deps.auditStore, {
    retryCapacity: config.audit.retryCapacity,
    logger: deps.logger,
    clock: deps.clock
  });

  const dispatcher = new NotificationDispatcher(deps.messenger, auditTrail, deps.logger);

  const provisioner = new AccountProvisioner(deps.accounts, auditTrail, dispatcher, {
    catalogBaseUrl: config.catalog.baseUrl,
    generateSlug: deps.generateSlug,
    logger: deps.logger,
    clock: deps.clock
  });

  const lifecycle = new ListingLifecycleService(
    deps.listings,
    deps.accounts,
    auditTrail,
    dispatcher,
    deps.media,
    deps.images,
    {
      defaultCurrency: config.catalog.defaultCurrency,
      catalogBaseUrl: config.catalog.baseUrl,
      undoWindowMs: config.lifecycle.undoWindowMs,
      assetRetentionMs: config.lifecycle.assetRetentionMs,
      maxUploadSize: config.uploads.maxSize,
      allowedTypes: config.uploads.allowedTypes,
      logger: deps.logger,
      clock: deps.clock
    }
  );

  const router = new MessageRouter(deps.accounts, provisioner, lifecycle, dispatcher, auditTrail, deps.logger);

  const catalog = new CatalogService(
    deps.accounts,
    deps.listings,
    deps.interests,
    auditTrail,
    dispatcher,
    config.catalog.defaultCountryCode,
    deps.logger
  );

  const sellers = new SellersService(
    deps.accounts,
    deps.listings,
    deps.interests,
    auditTrail,
    config.catalog.baseUrl,
    deps.clock
  );

  const maintenance = new MaintenanceJob(
    lifecycle,
    auditTrail,
    { assetSweepMs: config.lifecycle.sweepIntervalMs, auditRetryMs: config.audit.retryIntervalMs },
    deps.logger
  );

  return { config, auditTrail, dispatcher, provisioner, lifecycle, router, catalog, sellers, maintenance };
}
