import express from 'express';
import type { AppServices } from '../composition.js';
import { userIdParamSchema } from '../schemas/chat.js';
import { parseInput } from '../middleware/validate.js';

export function createProfileRouter(services: AppServices) {
  const router = express.Router();

  router.get('/:userId', async (req, res, next) => {
    try {
      const { userId } = parseInput(userIdParamSchema, req.params);
      const profile = await services.profiles.getProfile(userId);
      res.json({ user_id: userId, car_profile: profile });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
