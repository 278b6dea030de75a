import { Router } from 'express';
import { Services } from '../../container';
import { createSellersController } from '../controllers/sellers.controller';

export const createSellersRoutes = (services: Pick<Services, 'sellers' | 'provisioner'>): Router => {
  const router = Router();
  const sellersController = createSellersController(services);

  router.post('/register', sellersController.register);
  router.get('/phone/:phone', sellersController.getByPhone);

  router.get('/:id', sellersController.getById);
  router.patch('/:id', sellersController.update);
  router.get('/:id/stats', sellersController.getStats);
  router.get('/:id/catalog-link', sellersController.getCatalogLink);
  router.get('/:id/audit', sellersController.getAuditTrail);

  return router;
};

export default createSellersRoutes;
