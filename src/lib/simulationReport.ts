import { v4 as uuidv4 } from 'uuid';
import { APP_CONFIG } from './config';
import { ACTION_KINDS } from './activityCounters';
import { ForumEngine } from './forumEngine';
import { SeededRandom } from './seededRandom';
import {
  CommentThread,
  CommunityStats,
  CounterSnapshot,
  LeaderboardEntry,
  PostId,
  UserId,
} from '../types/forum';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface ReportComment {
  id: number;
  authorName: string;
  content: string;
  votes: number;
  replies: ReportComment[];
}

export interface ReportPost {
  id: PostId;
  authorName: string;
  content: string;
  votes: number;
  comments: ReportComment[];
}

export interface FeedSample {
  userId: UserId;
  username: string;
  posts: ReportPost[];
}

export interface ReportMessage {
  from: string;
  to: string;
  content: string;
}

export interface SimulationReport {
  runId: string;
  seed: number;
  generatedAt: string;
  userCount: number;
  communityCount: number;
  counters: CounterSnapshot;
  throughputPerSecond: number;
  communities: CommunityStats[];
  topUsers: LeaderboardEntry[];
  feedSample: FeedSample | null;
  messages: ReportMessage[];
}

export interface ReportOptions {
  seed: number;
  leaderboardSize?: number;
}

// ─── Build ────────────────────────────────────────────────────────────────────

export function computeThroughput(totalActions: number, uptimeMs: number): number {
  if (uptimeMs <= 0) return 0;
  return totalActions / (uptimeMs / 1000);
}

function toReportComments(threads: CommentThread[], names: Map<UserId, string>): ReportComment[] {
  return threads.map((t) => ({
    id: t.comment.id,
    authorName: names.get(t.comment.authorId) ?? `#${t.comment.authorId}`,
    content: t.comment.content,
    votes: t.comment.votes,
    replies: toReportComments(t.replies, names),
  }));
}

export async function buildSimulationReport(
  engine: ForumEngine,
  rng: SeededRandom,
  options: ReportOptions,
): Promise<SimulationReport> {
  const counters = await engine.getCounters();
  const users = await engine.listUsers();
  const names = new Map(users.map((u) => [u.id, u.username] as const));
  const nameOf = (id: UserId): string => names.get(id) ?? `#${id}`;

  let feedSample: FeedSample | null = null;
  const sampled = rng.pick(users);
  if (sampled) {
    const feed = await engine.getUserFeed(sampled.id);
    const posts: ReportPost[] = [];
    for (const post of feed) {
      const threads = (await engine.getCommentThread(post.id)) ?? [];
      posts.push({
        id: post.id,
        authorName: nameOf(post.authorId),
        content: post.content,
        votes: post.votes,
        comments: toReportComments(threads, names),
      });
    }
    feedSample = { userId: sampled.id, username: sampled.username, posts };
  }

  const messages = (await engine.getMessageLog()).map((m) => ({
    from: nameOf(m.fromId),
    to: nameOf(m.toId),
    content: m.content,
  }));

  const communities = await engine.getCommunityStats();

  return {
    runId: uuidv4(),
    seed: options.seed,
    generatedAt: new Date().toISOString(),
    userCount: users.length,
    communityCount: communities.length,
    counters,
    throughputPerSecond: computeThroughput(counters.totalActions, counters.uptimeMs),
    communities,
    topUsers: await engine.getKarmaLeaderboard(options.leaderboardSize ?? APP_CONFIG.leaderboardSize),
    feedSample,
    messages,
  };
}

// ─── Format ───────────────────────────────────────────────────────────────────

function formatComments(comments: ReportComment[], level: number, out: string[]): void {
  const indent = '  '.repeat(level);
  for (const c of comments) {
    out.push(`${indent}Comment ID ${c.id} by ${c.authorName}: ${c.content} (Votes: ${c.votes})`);
    if (c.replies.length > 0) formatComments(c.replies, level + 1, out);
  }
}

export function formatSimulationReport(report: SimulationReport): string[] {
  const { counters } = report;
  const lines: string[] = [
    `Simulation Complete (run ${report.runId}, seed ${report.seed}). Metrics:`,
    `Users: ${report.userCount}`,
    `Communities: ${report.communityCount}`,
    `Total Posts: ${counters.totalPosts}`,
    `Total Votes: ${counters.totalVotes} (Upvotes: ${counters.totalUpvotes}, Downvotes: ${counters.totalDownvotes})`,
    `Total Comments: ${counters.totalComments}`,
    `Total Messages: ${counters.totalMessages}`,
    `Total Actions: ${counters.totalActions}`,
    `Throughput (actions/sec): ${report.throughputPerSecond.toFixed(2)}`,
    `Disconnected Users: ${counters.disconnectedUsers}`,
    '',
    'Action Breakdown:',
    ...ACTION_KINDS.map((kind) => `${kind}: ${counters.actionBreakdown[kind]}`),
    '',
    'Community Metrics:',
    ...report.communities.map((c, i) => `${i + 1}. ${c.name} - Members: ${c.memberCount}, Posts: ${c.postCount}`),
    '',
    'Top Users by Karma:',
    ...report.topUsers.map((u) => `${u.rank}. ${u.username} - Karma: ${u.karma}`),
    '',
  ];

  if (report.feedSample) {
    lines.push(`Feed for ${report.feedSample.username}:`);
    for (const post of report.feedSample.posts) {
      lines.push(`Post ID ${post.id} by ${post.authorName}: ${post.content} (Votes: ${post.votes})`);
      if (post.comments.length > 0) {
        lines.push('  Comments:');
        formatComments(post.comments, 1, lines);
      }
    }
  } else {
    lines.push('Feed: no users registered');
  }

  lines.push('', 'Direct Messages:');
  for (const m of report.messages) {
    lines.push(`From ${m.from} to ${m.to}: ${m.content}`);
  }
  return lines;
}
