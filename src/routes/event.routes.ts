import { Router } from 'express';
import type { EventController } from '../controllers/event.controller';
import { validate } from '../middleware/validation.middleware';
import { validateCreateEvent, validateEventId, validateListEvents } from '../validators/event.validator';

export const createEventRoutes = (eventController: EventController): Router => {
  const router = Router();

  // ============================================================================
  // EVENT LIFECYCLE ROUTES
  // ============================================================================

  /**
   * POST /api/events
   * Create an event, run its key ceremony and open it for voting
   */
  router.post('/', validate(validateCreateEvent), eventController.createEvent.bind(eventController));

  /**
   * GET /api/events
   * List events, newest first
   */
  router.get('/', validate(validateListEvents), eventController.listEvents.bind(eventController));

  /**
   * GET /api/events/:eventId
   */
  router.get('/:eventId', validate(validateEventId), eventController.getEvent.bind(eventController));

  /**
   * POST /api/events/:eventId/close
   */
  router.post('/:eventId/close', validate(validateEventId), eventController.closeVoting.bind(eventController));

  // ============================================================================
  // TALLY ROUTES
  // ============================================================================

  /**
   * POST /api/events/:eventId/tally
   * Recompute the tally from every recorded ballot
   */
  router.post('/:eventId/tally', validate(validateEventId), eventController.tally.bind(eventController));

  /**
   * GET /api/events/:eventId/tally
   * Latest stored tally
   */
  router.get('/:eventId/tally', validate(validateEventId), eventController.getTally.bind(eventController));

  /**
   * GET /api/events/:eventId/ballots
   * Public bulletin board
   */
  router.get('/:eventId/ballots', validate(validateEventId), eventController.listBallots.bind(eventController));

  /**
   * GET /api/events/:eventId/voters
   * Voting status of every registered voter, without codes or selections
   */
  router.get(
    '/:eventId/voters',
    validate([...validateEventId, ...validateListEvents]),
    eventController.listParticipants.bind(eventController)
  );

  return router;
};
