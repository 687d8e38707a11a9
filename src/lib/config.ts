import { LogLevel } from '../types/forum';

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return 'info';
}

function parseOptionalInt(value: string | undefined): number | null {
  if (value === undefined || value.trim().length === 0) return null;
  return parseInt(value, 10);
}

export const APP_CONFIG = {
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  leaderboardSize: 10,
  simulation: {
    userCount: parseInt(process.env.SIM_USER_COUNT || '100', 10),
    communityCount: parseInt(process.env.SIM_COMMUNITY_COUNT || '10', 10),
    seed: parseOptionalInt(process.env.SIM_SEED),
    concurrency: parseInt(process.env.SIM_CONCURRENCY || '1', 10),
  },
} as const;

export interface IntRange {
  min: number;
  max: number;
}

export interface ActivityProfile {
  membershipSkew: number;
  disconnectRate: number;
  upvoteRate: number;
  repostRate: number;
  messageRate: number;
  postsPerUser: IntRange;
  votesPerItem: IntRange;
  commentsPerPost: IntRange;
  repliesPerComment: IntRange;
}

// Probabilities and ranges of the synthetic activity driver.
export const ACTIVITY_PROFILE: ActivityProfile = {
  membershipSkew: 1.2,
  disconnectRate: 0.2,
  upvoteRate: 0.7,
  repostRate: 0.1,
  messageRate: 0.2,
  postsPerUser: { min: 1, max: 3 },
  votesPerItem: { min: 1, max: 5 },
  commentsPerPost: { min: 1, max: 2 },
  repliesPerComment: { min: 1, max: 2 },
};
