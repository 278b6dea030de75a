import { Request, Response, NextFunction } from 'express';
import { AuditAction } from '../../types';
import { InvalidInputError, UnauthorizedError } from '../../utils/errors';
import logger from '../../utils/logger';
import { AuditTrailService } from '../../services/audit-trail.service';
import { MessageRouter } from '../../services/router/message-router.service';
import { parseWebhookPayload } from '../../services/whatsapp/webhook-parser';
import { verifySignature } from '../../services/whatsapp/signature';

export interface WebhookControllerDeps {
  router: MessageRouter;
  auditTrail: AuditTrailService;
  verifyToken: string;
  appSecret?: string;
}

export const createWebhookController = ({ router, auditTrail, verifyToken, appSecret }: WebhookControllerDeps) => {
  const verify = (req: Request, res: Response) => {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];

    if (mode === 'subscribe' && token === verifyToken && typeof challenge === 'string') {
      logger.info('Webhook verified');
      res.status(200).send(challenge);
      return;
    }

    logger.warn('Webhook verification failed');
    res.status(403).json({ status: 'error', code: 'FORBIDDEN', message: 'Verification failed' });
  };

  const receive = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

      if (appSecret && !verifySignature(rawBody, req.get('x-hub-signature-256'), appSecret)) {
        throw new UnauthorizedError('Invalid webhook signature');
      }

      let payload: unknown;
      try {
        payload = JSON.parse(rawBody.toString('utf8'));
      } catch (error) {
        throw new InvalidInputError('Invalid JSON payload');
      }

      const event = parseWebhookPayload(payload);

      if (!event) {
        res.status(200).json({ status: 'ignored' });
        return;
      }

      await auditTrail.record(AuditAction.MESSAGE_RECEIVED, {
        externalMessageId: event.messageId,
        data: { from: event.from, type: event.type }
      });

      const notifications = await router.route(event);

      res.status(200).json({ status: 'processed', notifications: notifications.length });
    } catch (error) {
      next(error);
    }
  };

  return { verify, receive };
};
