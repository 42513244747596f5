import { Request, Response, NextFunction } from 'express';
import type { EventService } from '../services/event.service';
import type { ResultService } from '../services/result.service';
import type { VoteService } from '../services/vote.service';
import { logAudit } from '../utils/logger';

interface CreateEventBody {
  name: string;
  opensAt: string;
  closesAt: string;
  selectionLimit: number;
  candidateNames: string[];
}

export class EventController {
  constructor(
    private readonly eventService: EventService,
    private readonly voteService: VoteService,
    private readonly resultService: ResultService
  ) {}

  /**
   * Create a new voting event
   */
  async createEvent(req: Request<Record<string, string>, unknown, CreateEventBody>, res: Response, next: NextFunction) {
    try {
      const { name, opensAt, closesAt, selectionLimit, candidateNames } = req.body;

      const event = await this.eventService.createEvent({
        name,
        opensAt: new Date(opensAt),
        closesAt: new Date(closesAt),
        selectionLimit: Number(selectionLimit),
        candidateNames,
      });

      logAudit('EVENT_CREATE_REQUEST', req.ip ?? 'unknown', { eventId: event.id });

      res.status(201).json({
        success: true,
        message: 'Event created successfully',
        data: event,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * List events, newest first
   */
  async listEvents(req: Request, res: Response, next: NextFunction) {
    try {
      // Sanitized to numbers by the validator
      const result = this.eventService.listEvents({
        page: req.query.page === undefined ? undefined : Number(req.query.page),
        limit: req.query.limit === undefined ? undefined : Number(req.query.limit),
      });

      res.json({
        success: true,
        message: 'Events retrieved successfully',
        data: result.data,
        pagination: result.pagination,
      });
    } catch (error) {
      next(error);
    }
  }

  async getEvent(req: Request, res: Response, next: NextFunction) {
    try {
      const event = this.eventService.getEvent(req.params.eventId);

      res.json({
        success: true,
        message: 'Event retrieved successfully',
        data: event,
      });
    } catch (error) {
      next(error);
    }
  }

  async closeVoting(req: Request, res: Response, next: NextFunction) {
    try {
      const event = this.eventService.closeVoting(req.params.eventId);

      res.json({
        success: true,
        message: 'Voting closed successfully',
        data: event,
      });
    } catch (error) {
      next(error);
    }
  }

  async tally(req: Request, res: Response, next: NextFunction) {
    try {
      const snapshot = await this.resultService.tally(req.params.eventId);

      res.json({
        success: true,
        message: 'Tally computed successfully',
        data: snapshot,
      });
    } catch (error) {
      next(error);
    }
  }

  async getTally(req: Request, res: Response, next: NextFunction) {
    try {
      const snapshot = this.resultService.getTally(req.params.eventId);

      res.json({
        success: true,
        message: 'Tally retrieved successfully',
        data: snapshot,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Public bulletin board of recorded verification codes
   */
  async listBallots(req: Request, res: Response, next: NextFunction) {
    try {
      const entries = this.voteService.listEventBallots(req.params.eventId);

      res.json({
        success: true,
        message: 'Ballots retrieved successfully',
        data: entries,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Registered voters and whether each has voted in the event
   */
  async listParticipants(req: Request, res: Response, next: NextFunction) {
    try {
      const result = this.voteService.listEventParticipants(req.params.eventId, {
        page: req.query.page === undefined ? undefined : Number(req.query.page),
        limit: req.query.limit === undefined ? undefined : Number(req.query.limit),
      });

      res.json({
        success: true,
        message: 'Participants retrieved successfully',
        data: result.data,
        pagination: result.pagination,
      });
    } catch (error) {
      next(error);
    }
  }
}
