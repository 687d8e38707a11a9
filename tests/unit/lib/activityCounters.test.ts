import { describe, it, expect } from '@jest/globals';
import { ACTION_KINDS, ActivityCounters } from '@/lib/activityCounters';

describe('ActivityCounters', () => {
  it('should list the action kinds in report order', () => {
    expect(ACTION_KINDS).toEqual(['Posts', 'Comments', 'Votes', 'Messages']);
  });

  it('should start every total at zero', () => {
    const counters = new ActivityCounters(0);
    const snap = counters.snapshot(0);
    expect(snap.totalActions).toBe(0);
    expect(snap.actionBreakdown).toEqual({ Posts: 0, Comments: 0, Votes: 0, Messages: 0 });
    expect(snap.uptimeMs).toBe(0);
  });

  it('should count posts, comments and messages as actions', () => {
    const counters = new ActivityCounters(0);
    counters.recordPost();
    counters.recordComment();
    counters.recordComment();
    counters.recordMessage();
    counters.recordAction();

    const snap = counters.snapshot(0);
    expect(snap.totalPosts).toBe(1);
    expect(snap.totalComments).toBe(2);
    expect(snap.totalMessages).toBe(1);
    expect(snap.totalActions).toBe(5);
    expect(snap.actionBreakdown).toEqual({ Posts: 1, Comments: 2, Votes: 0, Messages: 1 });
  });

  it('should split votes by direction without billing an action', () => {
    const counters = new ActivityCounters(0);
    counters.recordVote('up');
    counters.recordVote('up');
    counters.recordVote('down');

    const snap = counters.snapshot(0);
    expect(snap.totalVotes).toBe(3);
    expect(snap.totalUpvotes).toBe(2);
    expect(snap.totalDownvotes).toBe(1);
    expect(snap.actionBreakdown.Votes).toBe(3);
    expect(snap.totalActions).toBe(0);
  });

  it('should move the disconnected count in both directions', () => {
    const counters = new ActivityCounters(0);
    counters.recordConnectivityChange(false);
    counters.recordConnectivityChange(false);
    counters.recordConnectivityChange(true);
    expect(counters.snapshot(0).disconnectedUsers).toBe(1);
  });

  it('should return detached snapshots', () => {
    const counters = new ActivityCounters(0);
    const snap = counters.snapshot(0);
    snap.actionBreakdown.Posts = 99;
    expect(counters.snapshot(0).actionBreakdown.Posts).toBe(0);
  });

  it('should report uptime from the start time and never goes negative', () => {
    const counters = new ActivityCounters(2_000);
    expect(counters.snapshot(5_000).uptimeMs).toBe(3_000);
    expect(counters.snapshot(1_000).uptimeMs).toBe(0);
    expect(counters.snapshot(5_000).startedAt).toBe('1970-01-01T00:00:02.000Z');
  });
});
