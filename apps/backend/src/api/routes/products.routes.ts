import { Router } from 'express';
import { Services } from '../../container';
import { createProductsController } from '../controllers/products.controller';
import { authenticate, requireAdmin } from '../middleware/auth';

export const createProductsRoutes = (services: Pick<Services, 'lifecycle' | 'sellers' | 'auditTrail'>): Router => {
  const router = Router();
  const productsController = createProductsController(services);

  router.post('/intake', productsController.intake);
  router.post('/remove', productsController.remove);
  router.get('/seller/:sellerId', productsController.listForSeller);

  router.get('/:id', productsController.getById);
  router.patch('/:id', productsController.update);
  router.post('/:id/confirm', productsController.confirm);
  router.post('/:id/cancel', productsController.cancel);
  router.post('/:id/restore', productsController.restore);
  router.get('/:id/audit', productsController.getHistory);

  router.delete('/:id', authenticate, requireAdmin, productsController.purge);

  return router;
};

export default createProductsRoutes;
