import type { Knex } from 'knex';
import { v4 as uuid } from 'uuid';
import { TaskSchema, type Task, type TaskStatus } from '../db/models/Task.js';

export interface NewTask {
  user_id: string;
  title: string;
  description?: string;
  status?: TaskStatus;
  due_date?: Date;
}

export class TaskRepository {
  constructor(private readonly knex: Knex) {}

  async create(input: NewTask, now: Date = new Date()): Promise<Task> {
    const id = uuid();
    const timestamp = now.toISOString();

    await this.knex('tasks').insert({
      id,
      user_id: input.user_id,
      title: input.title,
      description: input.description ?? null,
      status: input.status ?? 'todo',
      due_date: input.due_date ? input.due_date.toISOString() : null,
      created_at: timestamp,
      updated_at: timestamp,
    });

    const created = await this.findOwned(id, input.user_id);
    if (!created) {
      throw new Error(`Task ${id} not found after insert`);
    }
    return created;
  }

  /** The task if it exists and belongs to `userId`. */
  async findOwned(id: string, userId: string): Promise<Task | null> {
    const row = await this.knex('tasks').where({ id, user_id: userId }).first();
    return row ? TaskSchema.parse(row) : null;
  }

  async listByUser(userId: string, status?: TaskStatus, limit = 50): Promise<Task[]> {
    let query = this.knex('tasks').where('user_id', userId);

    if (status) {
      query = query.where('status', status);
    }

    const rows = await query.orderBy('created_at', 'desc').limit(limit);
    return rows.map((row: unknown) => TaskSchema.parse(row));
  }
}
