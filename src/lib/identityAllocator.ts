import { CommentId, PostId, UserId } from '../types/forum';

export class IdSequence {
  private nextValue: number;

  constructor(start = 1) {
    this.nextValue = start;
  }

  next(): number {
    return this.nextValue++;
  }
}

/**
 * Issues ids for each entity type from its own counter. Callers allocate only
 * once the creation is certain to succeed, so no id is consumed by a rejected
 * operation.
 */
export class IdentityAllocator {
  private readonly users = new IdSequence();
  private readonly posts = new IdSequence();
  private readonly comments = new IdSequence();

  nextUserId(): UserId {
    return this.users.next();
  }

  nextPostId(): PostId {
    return this.posts.next();
  }

  nextCommentId(): CommentId {
    return this.comments.next();
  }
}
