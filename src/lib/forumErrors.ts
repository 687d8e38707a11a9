import { CommentId, PostId, UserId } from '../types/forum';

export type ForumErrorCode =
  | 'COMMUNITY_NOT_FOUND'
  | 'COMMUNITY_EXISTS'
  | 'USER_NOT_FOUND'
  | 'POST_NOT_FOUND'
  | 'COMMENT_NOT_FOUND';

export abstract class ForumError extends Error {
  abstract readonly code: ForumErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class CommunityNotFoundError extends ForumError {
  readonly code = 'COMMUNITY_NOT_FOUND';

  constructor(readonly communityName: string) {
    super(`Community "${communityName}" not found`);
  }
}

export class CommunityExistsError extends ForumError {
  readonly code = 'COMMUNITY_EXISTS';

  constructor(readonly communityName: string) {
    super(`Community "${communityName}" already exists`);
  }
}

export class UserNotFoundError extends ForumError {
  readonly code = 'USER_NOT_FOUND';

  constructor(readonly userId: UserId) {
    super(`User ${userId} not found`);
  }
}

export class PostNotFoundError extends ForumError {
  readonly code = 'POST_NOT_FOUND';

  constructor(readonly postId: PostId) {
    super(`Post ${postId} not found`);
  }
}

export class CommentNotFoundError extends ForumError {
  readonly code = 'COMMENT_NOT_FOUND';

  constructor(readonly commentId: CommentId) {
    super(`Comment ${commentId} not found`);
  }
}

// ─── Operation results ───────────────────────────────────────────────────────

export type OperationResult<T, E extends ForumError = ForumError> =
  | { success: true; value: T }
  | { success: false; error: E };

export function succeed<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function fail<E extends ForumError>(error: E): { success: false; error: E } {
  return { success: false, error };
}
