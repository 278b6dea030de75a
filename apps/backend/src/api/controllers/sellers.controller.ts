import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AuditAction } from '../../types';
import { parseRequest } from '../../middleware/validation';
import { AccountProvisioner } from '../../services/account-provisioner.service';
import { SellersService } from '../../services/sellers.service';

const registerSchema = z.object({
  phoneNumber: z.string().regex(/^\+?\d{7,15}$/, 'must be 7 to 15 digits'),
  name: z.string().min(1).max(100).optional()
});

const updateSchema = z.object({
  name: z.string().min(1).max(100).optional(),
  isActive: z.boolean().optional()
});

const auditQuerySchema = z.object({
  action: z.nativeEnum(AuditAction).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0)
});

export interface SellersControllerDeps {
  sellers: SellersService;
  provisioner: AccountProvisioner;
}

export const createSellersController = ({ sellers, provisioner }: SellersControllerDeps) => {
  const register = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { phoneNumber, name } = parseRequest(req.body, registerSchema);
      const seller = await provisioner.register(phoneNumber, name);

      res.status(201).json({
        status: 'success',
        data: { seller, catalogUrl: provisioner.catalogUrl(seller) }
      });
    } catch (error) {
      next(error);
    }
  };

  const getByPhone = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const seller = await sellers.getByPhone(req.params.phone);

      res.status(200).json({
        status: 'success',
        data: { seller }
      });
    } catch (error) {
      next(error);
    }
  };

  const getById = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const seller = await sellers.getById(req.params.id);

      res.status(200).json({
        status: 'success',
        data: { seller }
      });
    } catch (error) {
      next(error);
    }
  };

  const update = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = parseRequest(req.body, updateSchema);
      const seller = await sellers.update(req.params.id, params);

      res.status(200).json({
        status: 'success',
        data: { seller }
      });
    } catch (error) {
      next(error);
    }
  };

  const getStats = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await sellers.getStats(req.params.id);

      res.status(200).json({
        status: 'success',
        data: { stats }
      });
    } catch (error) {
      next(error);
    }
  };

  const getCatalogLink = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const link = await sellers.getCatalogLink(req.params.id);

      res.status(200).json({
        status: 'success',
        data: link
      });
    } catch (error) {
      next(error);
    }
  };

  const getAuditTrail = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const options = parseRequest(req.query, auditQuerySchema);
      const records = await sellers.getAuditTrail(req.params.id, options);

      res.status(200).json({
        status: 'success',
        data: {
          records,
          limit: options.limit,
          offset: options.offset
        }
      });
    } catch (error) {
      next(error);
    }
  };

  return { register, getByPhone, getById, update, getStats, getCatalogLink, getAuditTrail };
};
