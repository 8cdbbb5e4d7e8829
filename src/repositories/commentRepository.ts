import { v4 as uuidv4 } from 'uuid';
import type { Comment } from '../domain/comment';

export interface CommentRepository {
  create(input: Omit<Comment, 'id' | 'createdAt'>): Promise<Comment>;
  findById(id: string): Promise<Comment | undefined>;
  listByTask(taskId: number): Promise<Comment[]>;
  delete(id: string): Promise<boolean>;
}

export class InMemoryCommentRepository implements CommentRepository {
  private readonly comments = new Map<string, Comment>();

  async create(input: Omit<Comment, 'id' | 'createdAt'>): Promise<Comment> {
    const comment: Comment = { ...input, id: uuidv4(), createdAt: new Date() };
    this.comments.set(comment.id, comment);
    return comment;
  }

  async findById(id: string): Promise<Comment | undefined> {
    return this.comments.get(id);
  }

  // Map iteration keeps insertion order, which is creation order here.
  async listByTask(taskId: number): Promise<Comment[]> {
    return [...this.comments.values()].filter((c) => c.taskId === taskId);
  }

  async delete(id: string): Promise<boolean> {
    return this.comments.delete(id);
  }
}
