/**
 * @module activitySimulator
 * @description Seeded synthetic-activity driver for the forum engine. Registers
 * users, skews community membership toward the first communities, and has each
 * user post, vote, comment, reply, repost and message with the probabilities of
 * an {@link ActivityProfile}. It only ever goes through the engine's public
 * operations.
 */

import { ACTIVITY_PROFILE, ActivityProfile } from './config';
import { logger } from './logger';
import { ForumEngine } from './forumEngine';
import { SeededRandom } from './seededRandom';
import {
  validatePositiveInt,
  validatePositiveNumber,
  validateProbability,
  validateRange,
} from './validation';
import { User } from '../types/forum';

const log = logger.forModule('activitySimulator');

export interface SimulationOptions {
  userCount: number;
  communityCount: number;
  concurrency: number;
  profile: ActivityProfile;
}

export interface SimulationSummary {
  seed: number;
  usersRegistered: number;
  communitiesCreated: number;
  postsCreated: number;
  repostsCreated: number;
  commentsCreated: number;
  repliesCreated: number;
  votesCast: number;
  messagesSent: number;
  usersDisconnected: number;
  rejectedOperations: number;
  durationMs: number;
}

type Tally = Omit<SimulationSummary, 'seed' | 'durationMs'>;

export function resolveSimulationOptions(input: Partial<SimulationOptions> = {}): SimulationOptions {
  const profile = input.profile ?? ACTIVITY_PROFILE;
  return {
    userCount: validatePositiveInt('userCount', input.userCount ?? 100),
    communityCount: validatePositiveInt('communityCount', input.communityCount ?? 10),
    concurrency: validatePositiveInt('concurrency', input.concurrency ?? 1, 1000),
    profile: {
      membershipSkew: validatePositiveNumber('membershipSkew', profile.membershipSkew),
      disconnectRate: validateProbability('disconnectRate', profile.disconnectRate),
      upvoteRate: validateProbability('upvoteRate', profile.upvoteRate),
      repostRate: validateProbability('repostRate', profile.repostRate),
      messageRate: validateProbability('messageRate', profile.messageRate),
      postsPerUser: validateRange('postsPerUser', profile.postsPerUser),
      votesPerItem: validateRange('votesPerItem', profile.votesPerItem),
      commentsPerPost: validateRange('commentsPerPost', profile.commentsPerPost),
      repliesPerComment: validateRange('repliesPerComment', profile.repliesPerComment),
    },
  };
}

export function communityName(index: number): string {
  return `Community${index + 1}`;
}

export async function simulateActivity(
  engine: ForumEngine,
  options: SimulationOptions,
  rng: SeededRandom,
): Promise<SimulationSummary> {
  const startedAt = Date.now();
  const { profile } = options;
  const tally: Tally = {
    usersRegistered: 0,
    communitiesCreated: 0,
    postsCreated: 0,
    repostsCreated: 0,
    commentsCreated: 0,
    repliesCreated: 0,
    votesCast: 0,
    messagesSent: 0,
    usersDisconnected: 0,
    rejectedOperations: 0,
  };

  log.info('Simulation started', {
    seed: rng.seed,
    userCount: options.userCount,
    communityCount: options.communityCount,
    concurrency: options.concurrency,
  });

  const communities: string[] = [];
  for (let i = 0; i < options.communityCount; i++) {
    const name = communityName(i);
    const created = await engine.createCommunity(name);
    if (created.success) tally.communitiesCreated++;
    communities.push(name);
  }

  const registered: User[] = [];

  const vote = async (up: boolean, apply: (up: boolean) => Promise<{ success: boolean }>): Promise<void> => {
    const result = await apply(up);
    if (result.success) tally.votesCast++;
    else tally.rejectedOperations++;
  };

  const simulateUser = async (index: number): Promise<void> => {
    const username = `User${index + 1}`;
    const user = await engine.registerUser(username);
    registered.push(user);
    tally.usersRegistered++;

    const subCount = Math.floor(communities.length * Math.pow(rng.next(), profile.membershipSkew)) + 1;
    for (let j = 0; j < subCount && j < communities.length; j++) {
      const joined = await engine.joinCommunity(user.id, communities[j]);
      if (!joined.success) tally.rejectedOperations++;
    }

    if (rng.chance(profile.disconnectRate)) {
      const toggled = await engine.setConnected(user.id, false);
      if (toggled.success) tally.usersDisconnected++;
    }

    const postCount = rng.between(profile.postsPerUser.min, profile.postsPerUser.max);
    for (let j = 0; j < postCount; j++) {
      const target = rng.pick(communities) ?? communities[0];
      const posted = await engine.createPost(user.id, target, `Post content ${j + 1} from ${username}`);
      if (!posted.success) {
        tally.rejectedOperations++;
        continue;
      }
      const post = posted.value;
      tally.postsCreated++;

      const postVotes = rng.between(profile.votesPerItem.min, profile.votesPerItem.max);
      for (let k = 0; k < postVotes; k++) {
        await vote(rng.chance(profile.upvoteRate), (up) =>
          up ? engine.upvotePost(post.id) : engine.downvotePost(post.id));
      }

      const commentCount = rng.between(profile.commentsPerPost.min, profile.commentsPerPost.max);
      for (let l = 0; l < commentCount; l++) {
        const commented = await engine.commentOnPost(user.id, post.id, `Comment ${l + 1} on post ${post.id}`);
        if (!commented.success) {
          tally.rejectedOperations++;
          continue;
        }
        const comment = commented.value;
        tally.commentsCreated++;

        const commentVotes = rng.between(profile.votesPerItem.min, profile.votesPerItem.max);
        for (let v = 0; v < commentVotes; v++) {
          await vote(rng.chance(profile.upvoteRate), (up) =>
            up ? engine.upvoteComment(comment.id) : engine.downvoteComment(comment.id));
        }

        const replyCount = rng.between(profile.repliesPerComment.min, profile.repliesPerComment.max);
        for (let m = 0; m < replyCount; m++) {
          const replied = await engine.replyToComment(user.id, comment.id, `Reply ${m + 1} to comment ${comment.id}`);
          if (replied.success) tally.repliesCreated++;
          else tally.rejectedOperations++;
        }
      }

      if (rng.chance(profile.repostRate)) {
        const destination = rng.pick(communities) ?? communities[0];
        const reposted = await engine.createRepost(user.id, post.id, destination);
        if (reposted.success) tally.repostsCreated++;
        else tally.rejectedOperations++;
      }
    }

    if (rng.chance(profile.messageRate) && registered.length > 1) {
      const recipient = rng.pick(registered);
      if (recipient && recipient.id !== user.id) {
        const sent = await engine.sendDirectMessage(
          user.id,
          recipient.id,
          `Hello from ${username} to ${recipient.username}!`,
        );
        if (sent.success) tally.messagesSent++;
        else tally.rejectedOperations++;
      }
    }
  };

  for (let offset = 0; offset < options.userCount; offset += options.concurrency) {
    const wave: Promise<void>[] = [];
    for (let i = offset; i < Math.min(offset + options.concurrency, options.userCount); i++) {
      wave.push(simulateUser(i));
    }
    await Promise.all(wave);
  }

  const summary: SimulationSummary = { seed: rng.seed, ...tally, durationMs: Date.now() - startedAt };
  log.info('Simulation finished', { ...summary });
  return summary;
}
