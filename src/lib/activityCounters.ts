import { ActionKind, CounterSnapshot, ForumCounters, VoteDirection } from '../types/forum';

export const ACTION_KINDS: readonly ActionKind[] = ['Posts', 'Comments', 'Votes', 'Messages'];

function emptyBreakdown(): Record<ActionKind, number> {
  return { Posts: 0, Comments: 0, Votes: 0, Messages: 0 };
}

// Running platform totals. Mutated only from inside the engine's critical section.
export class ActivityCounters {
  private counters: ForumCounters = {
    totalPosts: 0,
    totalVotes: 0,
    totalUpvotes: 0,
    totalDownvotes: 0,
    totalComments: 0,
    totalMessages: 0,
    totalActions: 0,
    disconnectedUsers: 0,
    actionBreakdown: emptyBreakdown(),
  };

  readonly startedAt: number;

  constructor(now: number = Date.now()) {
    this.startedAt = now;
  }

  recordAction(): void {
    this.counters.totalActions++;
  }

  recordPost(): void {
    this.counters.totalPosts++;
    this.counters.actionBreakdown.Posts++;
    this.counters.totalActions++;
  }

  recordComment(): void {
    this.counters.totalComments++;
    this.counters.actionBreakdown.Comments++;
    this.counters.totalActions++;
  }

  recordMessage(): void {
    this.counters.totalMessages++;
    this.counters.actionBreakdown.Messages++;
    this.counters.totalActions++;
  }

  // Votes are unattributed, so they never count towards totalActions.
  recordVote(direction: VoteDirection): void {
    this.counters.totalVotes++;
    if (direction === 'up') {
      this.counters.totalUpvotes++;
    } else {
      this.counters.totalDownvotes++;
    }
    this.counters.actionBreakdown.Votes++;
  }

  recordConnectivityChange(connected: boolean): void {
    this.counters.disconnectedUsers += connected ? -1 : 1;
  }

  snapshot(now: number = Date.now()): CounterSnapshot {
    return {
      ...this.counters,
      actionBreakdown: { ...this.counters.actionBreakdown },
      startedAt: new Date(this.startedAt).toISOString(),
      uptimeMs: Math.max(0, now - this.startedAt),
    };
  }
}
