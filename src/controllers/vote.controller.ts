import { Request, Response, NextFunction } from 'express';
import type { VerificationService } from '../services/verification.service';
import type { VoteService } from '../services/vote.service';
import type { VerificationLevel } from '../types/vote.types';

interface SubmitVoteBody {
  voterSecret: string;
  eventId: string;
  selectedCandidateIds: string[];
}

interface DecodeVoteBody {
  level: number;
  verificationCode: string;
  voteSecret?: string;
}

const toLevel = (value: number): VerificationLevel => (value === 2 ? 2 : 1);

export class VoteController {
  constructor(
    private readonly voteService: VoteService,
    private readonly verificationService: VerificationService
  ) {}

  /**
   * Cast an encrypted ballot
   */
  async submitVote(req: Request<Record<string, string>, unknown, SubmitVoteBody>, res: Response, next: NextFunction) {
    try {
      const { voterSecret, eventId, selectedCandidateIds } = req.body;

      const receipt = await this.voteService.submitVote({ voterSecret, eventId, selectedCandidateIds });

      res.status(201).json({
        success: true,
        message: 'Vote recorded. Keep your verification code and vote secret: they cannot be recovered.',
        data: receipt,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Look up a ballot by verification code (level 1) or code and secret (level 2)
   */
  async decodeVote(req: Request<Record<string, string>, unknown, DecodeVoteBody>, res: Response, next: NextFunction) {
    try {
      const { level, verificationCode, voteSecret } = req.body;

      const decoded = await this.verificationService.decodeVote({
        level: toLevel(level),
        verificationCode,
        voteSecret,
      });

      res.json({
        success: true,
        message: 'Vote verified successfully',
        data: decoded,
      });
    } catch (error) {
      next(error);
    }
  }
}
