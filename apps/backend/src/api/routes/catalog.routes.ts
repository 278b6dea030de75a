import { Router } from 'express';
import { Services } from '../../container';
import { createCatalogController } from '../controllers/catalog.controller';

export const createCatalogRoutes = (services: Pick<Services, 'catalog'>): Router => {
  const router = Router();
  const catalogController = createCatalogController(services.catalog);

  router.get('/:slug', catalogController.view);
  router.get('/:slug/products/:productId', catalogController.getProduct);
  router.post('/:slug/interest', catalogController.registerInterest);

  return router;
};

export default createCatalogRoutes;
