export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type UserId = number;
export type PostId = number;
export type CommentId = number;

export type ActionKind = 'Posts' | 'Comments' | 'Votes' | 'Messages';

export type VoteDirection = 'up' | 'down';

export interface User {
  id: UserId;
  username: string;
  karma: number;
  actions: number;
  connected: boolean;
}

export interface Community {
  name: string;
  postIds: PostId[];
  memberIds: UserId[];
}

export interface Post {
  id: PostId;
  authorId: UserId;
  communityName: string;
  content: string;
  votes: number;
  commentIds: CommentId[];
  repostOf: PostId | null;
  createdAt: string;
}

export interface Comment {
  id: CommentId;
  authorId: UserId;
  postId: PostId;
  parentId: CommentId | null;
  content: string;
  votes: number;
  replyIds: CommentId[];
  createdAt: string;
}

export interface Message {
  fromId: UserId;
  toId: UserId;
  content: string;
  sentAt: string;
}

export interface CommentThread {
  comment: Comment;
  replies: CommentThread[];
}

export interface CommunityStats {
  name: string;
  memberCount: number;
  postCount: number;
}

export interface LeaderboardEntry {
  rank: number;
  userId: UserId;
  username: string;
  karma: number;
}

export interface ForumCounters {
  totalPosts: number;
  totalVotes: number;
  totalUpvotes: number;
  totalDownvotes: number;
  totalComments: number;
  totalMessages: number;
  totalActions: number;
  disconnectedUsers: number;
  actionBreakdown: Record<ActionKind, number>;
}

export interface CounterSnapshot extends ForumCounters {
  startedAt: string;
  uptimeMs: number;
}
