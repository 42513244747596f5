import { Request, Response, NextFunction } from 'express';
import type { VoterService } from '../services/voter.service';

interface RegisterVoterBody {
  voterId: string;
}

export class VoterController {
  constructor(private readonly voterService: VoterService) {}

  /**
   * Register a voter. The secret in the response is shown only this once.
   */
  async registerVoter(req: Request<Record<string, string>, unknown, RegisterVoterBody>, res: Response, next: NextFunction) {
    try {
      const registration = this.voterService.registerVoter(req.body.voterId);

      res.status(201).json({
        success: true,
        message: 'Voter registered successfully',
        data: registration,
      });
    } catch (error) {
      next(error);
    }
  }
}
