import { Router } from 'express';
import { ProfileCatalog } from '@/types/profile.types';
import { createProfileController } from '@/controllers/profile.controller';

export const createProfileRouter = (catalog: ProfileCatalog): Router => {
  const router = Router();
  const controller = createProfileController(catalog);

  router.get('/', controller.listProfiles);
  router.get('/:product/dynamic', controller.getDynamicProfile);

  return router;
};
