import { Request, Response } from 'express';
import { ProfileCatalog } from '@/types/profile.types';
import { InvalidInputError } from '@/utils/errors';
import { sendError } from '@/controllers/error-response';

export interface ProfileController {
  listProfiles(req: Request, res: Response): void;
  getDynamicProfile(req: Request, res: Response): void;
}

const parseQueryNumber = (name: string, value: unknown): number | undefined => {
  if (value === undefined) return undefined;
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new InvalidInputError(`${name} must be a number`);
  }
  return parsed;
};

export const createProfileController = (catalog: ProfileCatalog): ProfileController => ({
  listProfiles(_req, res) {
    const profiles = catalog.listProducts().map(product => ({
      product,
      ...catalog.getBaseProfile(product)
    }));
    res.json({ success: true, data: profiles, count: profiles.length });
  },

  getDynamicProfile(req, res) {
    try {
      const outside = parseQueryNumber('outside', req.query.outside);
      const door = parseQueryNumber('door', req.query.door) ?? 0;
      const variability = parseQueryNumber('variability', req.query.variability);
      const profile = catalog.derive(req.params.product, outside, door, variability);
      res.json({ success: true, data: profile });
    } catch (error) {
      sendError(res, error, 'Profile derivation error');
    }
  }
});
