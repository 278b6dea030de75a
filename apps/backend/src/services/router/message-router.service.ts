import { AccountStore } from '../../db/interfaces/store.interfaces';
import { Account, InboundEvent, Notification, OutboundMessage } from '../../types';
import {
  ConflictError,
  GoneError,
  InvalidInputError,
  NotFoundError,
  UpstreamFailureError,
  errorMessage
} from '../../utils/errors';
import defaultLogger, { Logger } from '../../utils/logger';
import { AccountProvisioner } from '../account-provisioner.service';
import { AuditTrailService } from '../audit-trail.service';
import { ListingLifecycleService } from '../lifecycle/listing-lifecycle.service';
import { DispatchRefs, NotificationDispatcher } from '../notifications/notification-dispatcher.service';
import * as templates from '../notifications/templates';
import { classifyText, parseButtonId } from './intent-classifier';

type TextEvent = Extract<InboundEvent, { type: 'text' }>;
type ImageEvent = Extract<InboundEvent, { type: 'image' }>;
type ButtonTapEvent = Extract<InboundEvent, { type: 'button_tap' }>;

/**
 * Turns one inbound chat event into provisioning and lifecycle calls and
 * returns every notification sent while handling it.
 */
export class MessageRouter {
  constructor(
    private readonly accounts: AccountStore,
    private readonly provisioner: AccountProvisioner,
    private readonly lifecycle: ListingLifecycleService,
    private readonly dispatcher: NotificationDispatcher,
    private readonly auditTrail: AuditTrailService,
    private readonly logger: Logger = defaultLogger
  ) {}

  async route(event: InboundEvent): Promise<Notification[]> {
    const known = await this.accounts.findByPhone(event.from);
    if (known) {
      await this.provisioner.touch(known.id);
    }

    const refs: DispatchRefs = known ? { sellerId: known.id } : {};

    try {
      switch (event.type) {
        case 'text':
          return await this.handleText(event, known);
        case 'image':
          return await this.handleImage(event);
        case 'button_tap':
          return await this.handleButtonTap(event, known);
      }
    } catch (error) {
      return await this.handleFailure(error, event, refs);
    }
  }

  private async handleText(event: TextEvent, known: Account | null): Promise<Notification[]> {
    const intent = classifyText(event.body);
    this.logger.debug(`Text from ${event.from} classified as ${intent}`);

    switch (intent) {
      case 'registration': {
        const { notifications } = await this.provisioner.getOrCreate(event.from, { greeting: 'always' });
        return notifications;
      }
      case 'help':
        return await this.send(templates.helpGuide(event.from), known);
      case 'catalog_link':
        if (!known) {
          return await this.send(templates.notRegistered(event.from), known);
        }
        return await this.send(templates.catalogLink(event.from, this.provisioner.catalogUrl(known)), known);
      case 'fallback':
        return await this.send(templates.fallbackGuidance(event.from), known);
    }
  }

  private async handleImage(event: ImageEvent): Promise<Notification[]> {
    if (event.mediaRef.trim().length === 0) {
      throw new InvalidInputError('No image was attached');
    }

    const provisioned = await this.provisioner.getOrCreate(event.from, { greeting: 'on-create' });

    try {
      const { notifications } = await this.lifecycle.intake(
        provisioned.account,
        { kind: 'media', mediaId: event.mediaRef },
        event.caption
      );
      return [...provisioned.notifications, ...notifications];
    } catch (error) {
      const failure = await this.handleFailure(error, event, { sellerId: provisioned.account.id });
      return [...provisioned.notifications, ...failure];
    }
  }

  private async handleButtonTap(event: ButtonTapEvent, known: Account | null): Promise<Notification[]> {
    const action = parseButtonId(event.buttonId);

    if (!action) {
      this.logger.debug(`Ignoring unknown button ${event.buttonId} from ${event.from}`);
      return [];
    }

    if (!known) {
      return await this.send(templates.notFound(event.from), known);
    }

    const scope = { sellerId: known.id };
    const result = action.verb === 'confirm_add'
      ? await this.lifecycle.confirm(action.listingId, scope)
      : await this.lifecycle.cancel(action.listingId, scope);

    return result.notifications;
  }

  private async handleFailure(error: unknown, event: InboundEvent, refs: DispatchRefs): Promise<Notification[]> {
    const to = event.from;

    if (error instanceof NotFoundError) {
      return [await this.dispatcher.dispatch(templates.notFound(to), refs)];
    }

    if (error instanceof ConflictError || error instanceof GoneError) {
      return [await this.dispatcher.dispatch(templates.alreadyHandled(to), refs)];
    }

    if (error instanceof InvalidInputError) {
      return [await this.dispatcher.dispatch(templates.invalidImage(to, error.message), refs)];
    }

    if (error instanceof UpstreamFailureError) {
      return [await this.dispatcher.dispatch(templates.downloadFailed(to), refs)];
    }

    const message = errorMessage(error);
    this.logger.error(`Failed to handle ${event.type} event from ${to}: ${message}`, {
      stack: error instanceof Error ? error.stack : undefined
    });
    await this.auditTrail.recordError(message, refs, {
      operation: `route_${event.type}`,
      from: to
    });

    return [await this.dispatcher.dispatch(templates.genericFailure(to), refs)];
  }

  private async send(message: OutboundMessage, known: Account | null): Promise<Notification[]> {
    return [await this.dispatcher.dispatch(message, known ? { sellerId: known.id } : {})];
  }
}
