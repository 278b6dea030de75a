import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { parseRequest } from '../../middleware/validation';
import { CatalogService, RequestContext } from '../../services/catalog.service';

const interestSchema = z.object({
  productId: z.string().uuid(),
  buyerName: z.string().min(1).max(100).optional(),
  buyerPhone: z.string().min(1).max(20).optional()
});

const requestContext = (req: Request): RequestContext => ({
  ipAddress: req.ip,
  userAgent: req.get('user-agent')
});

export const createCatalogController = (catalog: CatalogService) => {
  const view = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await catalog.viewCatalog(req.params.slug, requestContext(req));

      res.status(200).json({
        status: 'success',
        data: result
      });
    } catch (error) {
      next(error);
    }
  };

  const getProduct = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const product = await catalog.getProduct(req.params.slug, req.params.productId);

      res.status(200).json({
        status: 'success',
        data: { product }
      });
    } catch (error) {
      next(error);
    }
  };

  const registerInterest = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseRequest(req.body, interestSchema);
      const { interest, whatsappLink } = await catalog.registerInterest(req.params.slug, body, requestContext(req));

      res.status(201).json({
        status: 'success',
        data: { interest, whatsappLink }
      });
    } catch (error) {
      next(error);
    }
  };

  return { view, getProduct, registerInterest };
};
