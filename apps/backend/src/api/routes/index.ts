import { Router } from 'express';
import { Services } from '../../container';
import { createSellersRoutes } from './sellers.routes';
import { createProductsRoutes } from './products.routes';
import { createCatalogRoutes } from './catalog.routes';

export const createApiRoutes = (services: Services): Router => {
  const router = Router();

  router.use('/sellers', createSellersRoutes(services));
  router.use('/products', createProductsRoutes(services));
  router.use('/catalog', createCatalogRoutes(services));

  return router;
};

export default createApiRoutes;
