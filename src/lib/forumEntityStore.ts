import {
  Comment,
  CommentId,
  Community,
  Message,
  Post,
  PostId,
  User,
  UserId,
} from '../types/forum';

// ─── Records ──────────────────────────────────────────────────────────────────

export interface CommunityRecord {
  name: string;
  postIds: PostId[];
  members: Set<UserId>;
}

// ─── Snapshots ────────────────────────────────────────────────────────────────

export function snapshotUser(user: User): User {
  return { ...user };
}

export function snapshotCommunity(community: CommunityRecord): Community {
  return {
    name: community.name,
    postIds: [...community.postIds],
    memberIds: Array.from(community.members),
  };
}

export function snapshotPost(post: Post): Post {
  return { ...post, commentIds: [...post.commentIds] };
}

export function snapshotComment(comment: Comment): Comment {
  return { ...comment, replyIds: [...comment.replyIds] };
}

export function snapshotMessage(message: Message): Message {
  return { ...message };
}

// ─── ForumEntityStore ─────────────────────────────────────────────────────────

/**
 * Sole owner of every user, community, post, comment and message. Posts and
 * comments live in flat id-keyed arenas; communities and comments refer to
 * their children by id, so a reply chain of any depth is just a list walk.
 *
 * The store performs no locking and no counting of its own: the engine is the
 * only writer and calls it from inside its critical section.
 */
export class ForumEntityStore {
  private users = new Map<UserId, User>();
  private communities = new Map<string, CommunityRecord>();
  private posts = new Map<PostId, Post>();
  private comments = new Map<CommentId, Comment>();
  private messages: Message[] = [];

  // ── Users ─────────────────────────────────────────────────────────────────

  insertUser(user: User): void {
    this.users.set(user.id, user);
  }

  findUser(id: UserId): User | undefined {
    return this.users.get(id);
  }

  allUsers(): User[] {
    return Array.from(this.users.values());
  }

  userCount(): number {
    return this.users.size;
  }

  // ── Communities ───────────────────────────────────────────────────────────

  hasCommunity(name: string): boolean {
    return this.communities.has(name);
  }

  insertCommunity(name: string): CommunityRecord {
    const community: CommunityRecord = { name, postIds: [], members: new Set() };
    this.communities.set(name, community);
    return community;
  }

  findCommunity(name: string): CommunityRecord | undefined {
    return this.communities.get(name);
  }

  /** Communities in creation order. */
  allCommunities(): CommunityRecord[] {
    return Array.from(this.communities.values());
  }

  communityCount(): number {
    return this.communities.size;
  }

  // ── Posts ─────────────────────────────────────────────────────────────────

  insertPost(community: CommunityRecord, post: Post): void {
    this.posts.set(post.id, post);
    community.postIds.push(post.id);
  }

  findPost(id: PostId): Post | undefined {
    return this.posts.get(id);
  }

  // ── Comments ──────────────────────────────────────────────────────────────

  insertComment(post: Post, comment: Comment): void {
    this.comments.set(comment.id, comment);
    post.commentIds.push(comment.id);
  }

  insertReply(parent: Comment, reply: Comment): void {
    this.comments.set(reply.id, reply);
    parent.replyIds.push(reply.id);
  }

  findComment(id: CommentId): Comment | undefined {
    return this.comments.get(id);
  }

  // ── Messages ──────────────────────────────────────────────────────────────

  appendMessage(message: Message): void {
    this.messages.push(message);
  }

  allMessages(): readonly Message[] {
    return this.messages;
  }
}
