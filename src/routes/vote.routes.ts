import { RequestHandler, Router } from 'express';
import type { VoteController } from '../controllers/vote.controller';
import { validate } from '../middleware/validation.middleware';
import { validateDecodeVote, validateSubmitVote } from '../validators/vote.validator';

export const createVoteRoutes = (voteController: VoteController, votingRateLimit?: RequestHandler): Router => {
  const router = Router();

  if (votingRateLimit) {
    router.use(votingRateLimit);
  }

  /**
   * POST /api/votes
   * Cast an encrypted ballot
   */
  router.post('/', validate(validateSubmitVote), voteController.submitVote.bind(voteController));

  /**
   * POST /api/votes/decode
   * Verify a ballot by its code (level 1) or code and vote secret (level 2)
   */
  router.post('/decode', validate(validateDecodeVote), voteController.decodeVote.bind(voteController));

  return router;
};
