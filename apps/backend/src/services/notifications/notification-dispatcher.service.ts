import { Messenger } from '../../interfaces/messaging.interfaces';
import { AuditAction, DeliveryResult, Notification, OutboundMessage } from '../../types';
import { errorMessage } from '../../utils/errors';
import defaultLogger, { Logger } from '../../utils/logger';
import { AuditTrailService } from '../audit-trail.service';

export interface DispatchRefs {
  sellerId?: string;
  listingId?: string;
  interestId?: string;
}

/**
 * Delivers rendered messages through the injected Messenger and audits each
 * attempt. Delivery failures are reported on the returned notification.
 */
export class NotificationDispatcher {
  constructor(
    private readonly messenger: Messenger,
    private readonly auditTrail: AuditTrailService,
    private readonly logger: Logger = defaultLogger
  ) {}

  async dispatch(message: OutboundMessage, refs: DispatchRefs = {}): Promise<Notification> {
    const delivery = await this.deliver(message);

    if (delivery.success) {
      await this.auditTrail.record(AuditAction.MESSAGE_SENT, {
        ...refs,
        externalMessageId: delivery.messageId,
        data: { kind: message.kind, to: message.to }
      });
    } else {
      this.logger.warn(`Failed to deliver ${message.kind} message to ${message.to}: ${delivery.error}`);
      await this.auditTrail.recordError(delivery.error, refs, {
        operation: 'send_message',
        kind: message.kind,
        to: message.to
      });
    }

    return { ...message, delivery };
  }

  private async deliver(message: OutboundMessage): Promise<DeliveryResult> {
    try {
      switch (message.kind) {
        case 'text':
          return await this.messenger.sendText(message.to, message.body);
        case 'image':
          return await this.messenger.sendImage(message.to, message.url, message.caption);
        case 'buttons':
          return await this.messenger.sendButtons(message.to, message.body, message.buttons);
      }
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }
}
