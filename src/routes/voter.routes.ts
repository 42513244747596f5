import { Router } from 'express';
import type { VoterController } from '../controllers/voter.controller';
import { validate } from '../middleware/validation.middleware';
import { validateRegisterVoter } from '../validators/voter.validator';

export const createVoterRoutes = (voterController: VoterController): Router => {
  const router = Router();

  /**
   * POST /api/voters
   * Register a voter and return their secret
   */
  router.post('/', validate(validateRegisterVoter), voterController.registerVoter.bind(voterController));

  return router;
};
