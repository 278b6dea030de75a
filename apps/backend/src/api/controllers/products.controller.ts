import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { parseRequest } from '../../middleware/validation';
import { AuditTrailService } from '../../services/audit-trail.service';
import { ListingLifecycleService } from '../../services/lifecycle/listing-lifecycle.service';
import { SellersService } from '../../services/sellers.service';
import { SECOND_IN_MS } from '../../utils';

const intakeSchema = z.object({
  phoneNumber: z.string().min(1),
  imageUrl: z.string().url().refine((value) => value.toLowerCase().startsWith('https://'), {
    message: 'Image URL must use https'
  }),
  caption: z.string().max(1024).optional()
});

const removeSchema = z.object({
  productIds: z.array(z.string().uuid()).min(1).max(100)
});

const updateSchema = z.object({
  name: z.string().min(1).max(200).optional(),
  description: z.string().max(2000).optional(),
  price: z.number().nonnegative().optional(),
  currency: z.string().length(3).optional()
});

const historyParamsSchema = z.object({
  id: z.string().uuid()
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

const listQuerySchema = z.object({
  includeInactive: z.enum(['true', 'false']).optional()
});

export interface ProductsControllerDeps {
  lifecycle: ListingLifecycleService;
  sellers: SellersService;
  auditTrail: AuditTrailService;
}

export const createProductsController = ({ lifecycle, sellers, auditTrail }: ProductsControllerDeps) => {
  const intake = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { phoneNumber, imageUrl, caption } = parseRequest(req.body, intakeSchema);
      const seller = await sellers.getByPhone(phoneNumber);
      const { listing } = await lifecycle.intake(seller, { kind: 'url', url: imageUrl }, caption);

      res.status(201).json({
        status: 'success',
        data: { product: listing }
      });
    } catch (error) {
      next(error);
    }
  };

  const confirm = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { listing } = await lifecycle.confirm(req.params.id);

      res.status(200).json({
        status: 'success',
        message: 'Product added to catalog',
        data: { product: listing }
      });
    } catch (error) {
      next(error);
    }
  };

  const cancel = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { listing } = await lifecycle.cancel(req.params.id);

      res.status(200).json({
        status: 'success',
        message: 'Product upload cancelled',
        data: { product: listing }
      });
    } catch (error) {
      next(error);
    }
  };

  const remove = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { productIds } = parseRequest(req.body, removeSchema);
      const { removed, undoUntil } = await lifecycle.remove(productIds);
      const undoSeconds = Math.round(lifecycle.undoWindowMs / SECOND_IN_MS);

      res.status(200).json({
        status: 'success',
        message: `${removed.length} product(s) removed. You have ${undoSeconds} seconds to undo.`,
        data: {
          removedCount: removed.length,
          undoSeconds,
          undoUntil: undoUntil.toISOString()
        }
      });
    } catch (error) {
      next(error);
    }
  };

  const restore = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const product = await lifecycle.restore(req.params.id);

      res.status(200).json({
        status: 'success',
        data: { product }
      });
    } catch (error) {
      next(error);
    }
  };

  const purge = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const product = await lifecycle.purge(req.params.id);

      res.status(200).json({
        status: 'success',
        message: 'Product permanently deleted',
        data: { product }
      });
    } catch (error) {
      next(error);
    }
  };

  const getById = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const product = await lifecycle.getListing(req.params.id);

      res.status(200).json({
        status: 'success',
        data: { product }
      });
    } catch (error) {
      next(error);
    }
  };

  const listForSeller = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { includeInactive } = parseRequest(req.query, listQuerySchema);
      const seller = await sellers.getById(req.params.sellerId);
      const { listings, counts } = await lifecycle.listForSeller(seller.id, {
        includeInactive: includeInactive === 'true'
      });

      res.status(200).json({
        status: 'success',
        data: {
          products: listings,
          total: listings.length,
          activeCount: counts.active,
          removedCount: counts.removed
        }
      });
    } catch (error) {
      next(error);
    }
  };

  const update = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = parseRequest(req.body, updateSchema);
      const product = await lifecycle.updateDetails(req.params.id, params);

      res.status(200).json({
        status: 'success',
        data: { product }
      });
    } catch (error) {
      next(error);
    }
  };

  // Purged listings keep their history, so the listing itself is not looked up
  const getHistory = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseRequest(req.params, historyParamsSchema);
      const { limit } = parseRequest(req.query, historyQuerySchema);
      const records = await auditTrail.forListing(id, limit);

      res.status(200).json({
        status: 'success',
        data: { records, limit }
      });
    } catch (error) {
      next(error);
    }
  };

  return { intake, confirm, cancel, remove, restore, purge, getById, listForSeller, update, getHistory };
};
