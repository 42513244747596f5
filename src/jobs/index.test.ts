import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TestContext, createOpenEvent, createTestContext, registerVoters } from '../__tests__/helpers/context';
import { JobScheduler } from './index';

describe('JobScheduler', () => {
  let context: TestContext;
  let scheduler: JobScheduler;

  beforeEach(() => {
    context = createTestContext({ timeoutMs: 50 });
    scheduler = new JobScheduler(context.services.events, context.services.results);
  });

  afterEach(() => {
    scheduler.stop();
    context.close();
  });

  describe('initialize', () => {
    it('schedules nothing for an empty pattern', () => {
      scheduler.initialize('');
      expect(scheduler.scheduledJobs).toEqual([]);
    });

    it('rejects an invalid pattern', () => {
      expect(() => scheduler.initialize('not a cron')).toThrow('Invalid cron pattern for job tally-refresh: not a cron');
    });

    it('schedules the tally refresh and stops it', () => {
      scheduler.initialize('*/5 * * * *');
      expect(scheduler.scheduledJobs).toEqual(['tally-refresh']);

      scheduler.stop();
      expect(scheduler.scheduledJobs).toEqual([]);
    });
  });

  describe('runTallyRefresh', () => {
    it('re-tallies open events and carries on past a failure', async () => {
      const quiet = await createOpenEvent(context, { name: 'Quiet' });
      const busy = await createOpenEvent(context, { name: 'Busy' });
      const closed = await createOpenEvent(context, { name: 'Closed' });
      context.services.events.closeVoting(closed.id);

      const [secret] = registerVoters(context, 1);
      await context.services.votes.submitVote({
        voterSecret: secret,
        eventId: busy.id,
        selectedCandidateIds: [busy.candidates[0].id],
      });
      context.engine.queue('aggregateAndDecrypt', 'fail', 'fail');

      const report = await scheduler.runTallyRefresh();

      expect(report.refreshed).toEqual([quiet.id]);
      expect(report.failed).toEqual([busy.id]);
      expect(context.services.results.getTally(quiet.id).totalBallots).toBe(0);
      expect(() => context.services.results.getTally(closed.id)).toThrow('has not been tallied yet');
    });
  });
});
