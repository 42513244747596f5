import type { AppDatabase } from '../config/database';
import type { CryptoEngine } from '../crypto/engine';
import { CryptoService, CryptoServiceOptions } from './crypto.service';
import { EventService } from './event.service';
import { ResultService } from './result.service';
import { VerificationService } from './verification.service';
import { VoteService } from './vote.service';
import { VoterService } from './voter.service';

export interface Services {
  crypto: CryptoService;
  events: EventService;
  voters: VoterService;
  votes: VoteService;
  verification: VerificationService;
  results: ResultService;
}

export interface ServiceDependencies {
  db: AppDatabase;
  engine: CryptoEngine;
  crypto: CryptoServiceOptions;
  now?: () => Date;
}

export function createServices({ db, engine, crypto: cryptoOptions, now = () => new Date() }: ServiceDependencies): Services {
  const crypto = new CryptoService(engine, cryptoOptions);
  const events = new EventService(db, crypto, now);
  const voters = new VoterService(db, now);

  return {
    crypto,
    events,
    voters,
    votes: new VoteService(db, events, voters, crypto, now),
    verification: new VerificationService(db, events, crypto),
    results: new ResultService(db, events, crypto, now),
  };
}
