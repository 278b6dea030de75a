import express, { Router } from 'express';
import { Services } from '../../container';
import { createWebhookController } from '../controllers/webhook.controller';

// The raw body is kept for signature verification, so this router parses JSON itself.
export const createWebhookRoutes = (services: Pick<Services, 'router' | 'auditTrail' | 'config'>): Router => {
  const router = Router();
  const webhookController = createWebhookController({
    router: services.router,
    auditTrail: services.auditTrail,
    verifyToken: services.config.whatsapp.verifyToken,
    appSecret: services.config.whatsapp.appSecret
  });

  router.get('/whatsapp', webhookController.verify);
  router.post('/whatsapp', express.raw({ type: '*/*', limit: '1mb' }), webhookController.receive);

  return router;
};

export default createWebhookRoutes;
