/**
 * @module forumEngine
 * @description In-memory forum engine: user registration, community membership,
 * posting, reposting, threaded comments, voting with karma, direct messages and
 * feed/inbox queries. Every operation runs under one exclusive lock covering the
 * whole store and the aggregate counters, so operations are linearizable and no
 * caller ever observes a half-applied mutation.
 */

import { APP_CONFIG } from './config';
import { logger } from './logger';
import { ExclusiveLock, LockMetrics } from './exclusiveLock';
import { IdentityAllocator } from './identityAllocator';
import { ActivityCounters } from './activityCounters';
import {
  ForumEntityStore,
  snapshotComment,
  snapshotCommunity,
  snapshotMessage,
  snapshotPost,
  snapshotUser,
} from './forumEntityStore';
import {
  CommentNotFoundError,
  CommunityExistsError,
  CommunityNotFoundError,
  ForumError,
  OperationResult,
  PostNotFoundError,
  UserNotFoundError,
  fail,
  succeed,
} from './forumErrors';
import {
  Comment,
  CommentId,
  CommentThread,
  Community,
  CommunityStats,
  CounterSnapshot,
  LeaderboardEntry,
  Message,
  Post,
  PostId,
  User,
  UserId,
  VoteDirection,
} from '../types/forum';

export interface ForumEngineOptions {
  clock?: () => number;
}

type MembershipError = CommunityNotFoundError | UserNotFoundError;
type PostingError = CommunityNotFoundError | UserNotFoundError;
type RepostError = CommunityNotFoundError | UserNotFoundError | PostNotFoundError;
type CommentingError = UserNotFoundError | PostNotFoundError;
type ReplyError = UserNotFoundError | CommentNotFoundError;

export class ForumEngine {
  private readonly store = new ForumEntityStore();
  private readonly ids = new IdentityAllocator();
  private readonly lock: ExclusiveLock;
  private readonly counters: ActivityCounters;
  private readonly clock: () => number;
  private readonly log = logger.forModule('forumEngine');

  constructor(options: ForumEngineOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.lock = new ExclusiveLock('forum-engine', this.clock);
    this.counters = new ActivityCounters(this.clock());
  }

  // ── Mutations ─────────────────────────────────────────────────────────────

  registerUser(username: string): Promise<User> {
    return this.lock.runExclusive(() => {
      const user: User = {
        id: this.ids.nextUserId(),
        username,
        karma: 0,
        actions: 0,
        connected: true,
      };
      this.store.insertUser(user);
      this.log.debug('User registered', { userId: user.id, username });
      return snapshotUser(user);
    });
  }

  createCommunity(name: string): Promise<OperationResult<Community, CommunityExistsError>> {
    return this.lock.runExclusive(() => {
      if (this.store.hasCommunity(name)) {
        return this.reject('createCommunity', new CommunityExistsError(name));
      }
      const community = this.store.insertCommunity(name);
      this.log.info('Community created', { communityName: name });
      return succeed(snapshotCommunity(community));
    });
  }

  joinCommunity(userId: UserId, communityName: string): Promise<OperationResult<Community, MembershipError>> {
    return this.lock.runExclusive(() => {
      const community = this.store.findCommunity(communityName);
      if (!community) return this.reject('joinCommunity', new CommunityNotFoundError(communityName));
      const user = this.store.findUser(userId);
      if (!user) return this.reject('joinCommunity', new UserNotFoundError(userId));

      community.members.add(user.id);
      user.actions++;
      this.counters.recordAction();
      return succeed(snapshotCommunity(community));
    });
  }

  /** Billed as an action even when the user was not a member. */
  leaveCommunity(userId: UserId, communityName: string): Promise<OperationResult<Community, MembershipError>> {
    return this.lock.runExclusive(() => {
      const community = this.store.findCommunity(communityName);
      if (!community) return this.reject('leaveCommunity', new CommunityNotFoundError(communityName));
      const user = this.store.findUser(userId);
      if (!user) return this.reject('leaveCommunity', new UserNotFoundError(userId));

      community.members.delete(user.id);
      user.actions++;
      this.counters.recordAction();
      return succeed(snapshotCommunity(community));
    });
  }

  createPost(userId: UserId, communityName: string, content: string): Promise<OperationResult<Post, PostingError>> {
    return this.lock.runExclusive(() => {
      const community = this.store.findCommunity(communityName);
      if (!community) return this.reject('createPost', new CommunityNotFoundError(communityName));
      const user = this.store.findUser(userId);
      if (!user) return this.reject('createPost', new UserNotFoundError(userId));

      const post: Post = {
        id: this.ids.nextPostId(),
        authorId: user.id,
        communityName: community.name,
        content,
        votes: 0,
        commentIds: [],
        repostOf: null,
        createdAt: this.timestamp(),
      };
      this.store.insertPost(community, post);
      user.actions++;
      this.counters.recordPost();
      return succeed(snapshotPost(post));
    });
  }

  /** Copies the original's content only; votes and comments start empty. */
  createRepost(userId: UserId, originalPostId: PostId, communityName: string): Promise<OperationResult<Post, RepostError>> {
    return this.lock.runExclusive(() => {
      const community = this.store.findCommunity(communityName);
      if (!community) return this.reject('createRepost', new CommunityNotFoundError(communityName));
      const user = this.store.findUser(userId);
      if (!user) return this.reject('createRepost', new UserNotFoundError(userId));
      const original = this.store.findPost(originalPostId);
      if (!original) return this.reject('createRepost', new PostNotFoundError(originalPostId));

      const repost: Post = {
        id: this.ids.nextPostId(),
        authorId: user.id,
        communityName: community.name,
        content: original.content,
        votes: 0,
        commentIds: [],
        repostOf: original.id,
        createdAt: this.timestamp(),
      };
      this.store.insertPost(community, repost);
      user.actions++;
      this.counters.recordPost();
      return succeed(snapshotPost(repost));
    });
  }

  commentOnPost(userId: UserId, postId: PostId, content: string): Promise<OperationResult<Comment, CommentingError>> {
    return this.lock.runExclusive(() => {
      const user = this.store.findUser(userId);
      if (!user) return this.reject('commentOnPost', new UserNotFoundError(userId));
      const post = this.store.findPost(postId);
      if (!post) return this.reject('commentOnPost', new PostNotFoundError(postId));

      const comment: Comment = {
        id: this.ids.nextCommentId(),
        authorId: user.id,
        postId: post.id,
        parentId: null,
        content,
        votes: 0,
        replyIds: [],
        createdAt: this.timestamp(),
      };
      this.store.insertComment(post, comment);
      user.actions++;
      this.counters.recordComment();
      return succeed(snapshotComment(comment));
    });
  }

  replyToComment(userId: UserId, parentCommentId: CommentId, content: string): Promise<OperationResult<Comment, ReplyError>> {
    return this.lock.runExclusive(() => {
      const user = this.store.findUser(userId);
      if (!user) return this.reject('replyToComment', new UserNotFoundError(userId));
      const parent = this.store.findComment(parentCommentId);
      if (!parent) return this.reject('replyToComment', new CommentNotFoundError(parentCommentId));

      const reply: Comment = {
        id: this.ids.nextCommentId(),
        authorId: user.id,
        postId: parent.postId,
        parentId: parent.id,
        content,
        votes: 0,
        replyIds: [],
        createdAt: this.timestamp(),
      };
      this.store.insertReply(parent, reply);
      user.actions++;
      this.counters.recordComment();
      return succeed(snapshotComment(reply));
    });
  }

  upvotePost(postId: PostId): Promise<OperationResult<Post, PostNotFoundError>> {
    return this.votePost(postId, 'up');
  }

  downvotePost(postId: PostId): Promise<OperationResult<Post, PostNotFoundError>> {
    return this.votePost(postId, 'down');
  }

  upvoteComment(commentId: CommentId): Promise<OperationResult<Comment, CommentNotFoundError>> {
    return this.voteComment(commentId, 'up');
  }

  downvoteComment(commentId: CommentId): Promise<OperationResult<Comment, CommentNotFoundError>> {
    return this.voteComment(commentId, 'down');
  }

  sendDirectMessage(fromId: UserId, toId: UserId, content: string): Promise<OperationResult<Message, UserNotFoundError>> {
    return this.lock.runExclusive(() => {
      const from = this.store.findUser(fromId);
      if (!from) return this.reject('sendDirectMessage', new UserNotFoundError(fromId));
      const to = this.store.findUser(toId);
      if (!to) return this.reject('sendDirectMessage', new UserNotFoundError(toId));

      const message: Message = { fromId: from.id, toId: to.id, content, sentAt: this.timestamp() };
      this.store.appendMessage(message);
      from.actions++;
      this.counters.recordMessage();
      return succeed(snapshotMessage(message));
    });
  }

  replyToMessage(userId: UserId, original: Message, content: string): Promise<OperationResult<Message, UserNotFoundError>> {
    return this.sendDirectMessage(userId, original.fromId, content);
  }

  /** Not billed as an action; the disconnected count moves only on an actual change. */
  setConnected(userId: UserId, connected: boolean): Promise<OperationResult<User, UserNotFoundError>> {
    return this.lock.runExclusive(() => {
      const user = this.store.findUser(userId);
      if (!user) return this.reject('setConnected', new UserNotFoundError(userId));

      if (user.connected !== connected) {
        user.connected = connected;
        this.counters.recordConnectivityChange(connected);
      }
      return succeed(snapshotUser(user));
    });
  }

  // ── Queries ───────────────────────────────────────────────────────────────

  retrieveMessages(userId: UserId): Promise<Message[]> {
    return this.lock.runExclusive(() =>
      this.store.allMessages()
        .filter((m) => m.toId === userId)
        .map(snapshotMessage),
    );
  }

  getUserFeed(userId: UserId): Promise<Post[]> {
    return this.lock.runExclusive(() => {
      const feed: Post[] = [];
      for (const community of this.store.allCommunities()) {
        if (!community.members.has(userId)) continue;
        for (const postId of community.postIds) {
          const post = this.store.findPost(postId);
          if (post) feed.push(snapshotPost(post));
        }
      }
      return feed;
    });
  }

  getUser(userId: UserId): Promise<User | null> {
    return this.lock.runExclusive(() => {
      const user = this.store.findUser(userId);
      return user ? snapshotUser(user) : null;
    });
  }

  getCommunity(name: string): Promise<Community | null> {
    return this.lock.runExclusive(() => {
      const community = this.store.findCommunity(name);
      return community ? snapshotCommunity(community) : null;
    });
  }

  getPost(postId: PostId): Promise<Post | null> {
    return this.lock.runExclusive(() => {
      const post = this.store.findPost(postId);
      return post ? snapshotPost(post) : null;
    });
  }

  getComment(commentId: CommentId): Promise<Comment | null> {
    return this.lock.runExclusive(() => {
      const comment = this.store.findComment(commentId);
      return comment ? snapshotComment(comment) : null;
    });
  }

  listUsers(): Promise<User[]> {
    return this.lock.runExclusive(() => this.store.allUsers().map(snapshotUser));
  }

  /** Nested comment tree of a post, or null when the post does not exist. */
  getCommentThread(postId: PostId): Promise<CommentThread[] | null> {
    return this.lock.runExclusive(() => {
      const post = this.store.findPost(postId);
      if (!post) return null;

      const roots: CommentThread[] = [];
      // Breadth-first with an explicit queue; sibling order is preserved per parent.
      const pending: Array<{ id: CommentId; into: CommentThread[] }> =
        post.commentIds.map((id) => ({ id, into: roots }));

      for (let i = 0; i < pending.length; i++) {
        const { id, into } = pending[i];
        const comment = this.store.findComment(id);
        if (!comment) continue;
        const node: CommentThread = { comment: snapshotComment(comment), replies: [] };
        into.push(node);
        for (const replyId of comment.replyIds) {
          pending.push({ id: replyId, into: node.replies });
        }
      }
      return roots;
    });
  }

  getCommunityStats(): Promise<CommunityStats[]> {
    return this.lock.runExclusive(() =>
      this.store.allCommunities()
        .map((c) => ({ name: c.name, memberCount: c.members.size, postCount: c.postIds.length }))
        .sort((a, b) => b.memberCount - a.memberCount || compareStrings(a.name, b.name)),
    );
  }

  getKarmaLeaderboard(limit: number = APP_CONFIG.leaderboardSize): Promise<LeaderboardEntry[]> {
    return this.lock.runExclusive(() =>
      this.store.allUsers()
        .slice()
        .sort((a, b) => b.karma - a.karma || a.id - b.id)
        .slice(0, Math.max(0, limit))
        .map((u, i) => ({ rank: i + 1, userId: u.id, username: u.username, karma: u.karma })),
    );
  }

  getMessageLog(): Promise<Message[]> {
    return this.lock.runExclusive(() => this.store.allMessages().map(snapshotMessage));
  }

  getCounters(): Promise<CounterSnapshot> {
    return this.lock.runExclusive(() => this.counters.snapshot(this.clock()));
  }

  getLockMetrics(): LockMetrics {
    return this.lock.getMetrics();
  }

  // ── Private ───────────────────────────────────────────────────────────────

  private votePost(postId: PostId, direction: VoteDirection): Promise<OperationResult<Post, PostNotFoundError>> {
    return this.lock.runExclusive(() => {
      const post = this.store.findPost(postId);
      if (!post) return this.reject(`${direction}votePost`, new PostNotFoundError(postId));

      this.applyVote(post, direction);
      return succeed(snapshotPost(post));
    });
  }

  private voteComment(commentId: CommentId, direction: VoteDirection): Promise<OperationResult<Comment, CommentNotFoundError>> {
    return this.lock.runExclusive(() => {
      const comment = this.store.findComment(commentId);
      if (!comment) return this.reject(`${direction}voteComment`, new CommentNotFoundError(commentId));

      this.applyVote(comment, direction);
      return succeed(snapshotComment(comment));
    });
  }

  private applyVote(target: { votes: number; authorId: UserId }, direction: VoteDirection): void {
    const delta = direction === 'up' ? 1 : -1;
    target.votes += delta;
    const author = this.store.findUser(target.authorId);
    if (author) author.karma += delta;
    this.counters.recordVote(direction);
  }

  private reject<E extends ForumError>(operation: string, error: E): { success: false; error: E } {
    this.log.rejected(operation, error);
    return fail(error);
  }

  private timestamp(): string {
    return new Date(this.clock()).toISOString();
  }
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// ── Singleton ─────────────────────────────────────────────────────────────────

const KEY = '__forumEngine__';
export function getForumEngine(): ForumEngine {
  const g = globalThis as unknown as Record<string, unknown>;
  const existing = g[KEY];
  if (existing instanceof ForumEngine) return existing;

  const created = new ForumEngine();
  g[KEY] = created;
  return created;
}
