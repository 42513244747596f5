import { RequestHandler, Router } from 'express';
import { EventController } from '../controllers/event.controller';
import { VoteController } from '../controllers/vote.controller';
import { VoterController } from '../controllers/voter.controller';
import type { Services } from '../services';
import { createEventRoutes } from './event.routes';
import { createVoteRoutes } from './vote.routes';
import { createVoterRoutes } from './voter.routes';

export interface ApiRouterOptions {
  votingRateLimit?: RequestHandler;
}

export const createApiRouter = (services: Services, options: ApiRouterOptions = {}): Router => {
  const router = Router();

  const eventController = new EventController(services.events, services.votes, services.results);
  const voteController = new VoteController(services.votes, services.verification);
  const voterController = new VoterController(services.voters);

  // API root
  router.get('/', (req, res) => {
    res.json({
      message: 'Ballot Orchestrator API',
      version: '1.0.0',
      status: 'operational',
      timestamp: new Date().toISOString(),
      endpoints: {
        events: '/api/events',
        voters: '/api/voters',
        votes: '/api/votes',
      },
      health: '/health',
    });
  });

  router.use('/events', createEventRoutes(eventController));
  router.use('/voters', createVoterRoutes(voterController));
  router.use('/votes', createVoteRoutes(voteController, options.votingRateLimit));

  return router;
};
