import type { Knex } from 'knex';
import { v4 as uuid } from 'uuid';
import { UserSchema, type User } from '../db/models/User.js';

export interface NewUser {
  username: string;
  email: string;
  password_hash: string;
  roles: string[];
}

export class UserRepository {
  constructor(private readonly knex: Knex) {}

  async findById(id: string): Promise<User | null> {
    const row = await this.knex('users').where('id', id).first();
    return row ? UserSchema.parse(row) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const row = await this.knex('users').where('username', username).first();
    return row ? UserSchema.parse(row) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const row = await this.knex('users')
      .whereRaw('LOWER(email) = ?', [email.trim().toLowerCase()])
      .first();
    return row ? UserSchema.parse(row) : null;
  }

  /** Email when the identifier contains '@', username otherwise. */
  async findByIdentifier(identifier: string): Promise<User | null> {
    return identifier.includes('@')
      ? this.findByEmail(identifier)
      : this.findByUsername(identifier.trim());
  }

  async list(): Promise<User[]> {
    const rows = await this.knex('users').orderBy('created_at', 'asc');
    return rows.map((row: unknown) => UserSchema.parse(row));
  }

  async isEmpty(): Promise<boolean> {
    const existing = await this.knex('users').select('id').limit(1);
    return existing.length === 0;
  }

  async create(input: NewUser, now: Date = new Date()): Promise<User> {
    const id = uuid();
    const timestamp = now.toISOString();

    await this.knex('users').insert({
      id,
      username: input.username,
      email: input.email,
      password_hash: input.password_hash,
      roles: JSON.stringify(input.roles),
      email_verified: false,
      created_at: timestamp,
      updated_at: timestamp,
    });

    const created = await this.findById(id);
    if (!created) {
      throw new Error(`User ${id} not found after insert`);
    }
    return created;
  }

  async updatePasswordHash(id: string, passwordHash: string, now: Date = new Date()): Promise<boolean> {
    const updated = await this.knex('users')
      .where('id', id)
      .update({ password_hash: passwordHash, updated_at: now.toISOString() });
    return updated > 0;
  }

  async markEmailVerified(email: string, now: Date = new Date()): Promise<boolean> {
    const updated = await this.knex('users')
      .whereRaw('LOWER(email) = ?', [email.trim().toLowerCase()])
      .update({ email_verified: true, updated_at: now.toISOString() });
    return updated > 0;
  }
}
