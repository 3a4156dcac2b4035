import type Database from 'better-sqlite3';
import type { User } from '../../types/expense';
import type { UserStore } from '../../types/stores';

export class SqliteUserRepository implements UserStore {
  constructor(private readonly db: Database.Database) {}

  async ensure(user: User): Promise<void> {
    this.db
      .prepare<{ id: number; username: string | null; first_name: string | null }>(
        `INSERT INTO users (id, username, first_name) VALUES (@id, @username, @first_name)
         ON CONFLICT(id) DO UPDATE SET username = excluded.username, first_name = excluded.first_name`,
      )
      .run({ id: user.id, username: user.username ?? null, first_name: user.firstName ?? null });
  }

  async getDefaultCurrency(userId: number): Promise<string | null> {
    const row = this.db
      .prepare<[number], { default_currency: string | null }>(`SELECT default_currency FROM users WHERE id = ?`)
      .get(userId);
    return row?.default_currency ?? null;
  }

  async setDefaultCurrency(userId: number, currency: string): Promise<void> {
    this.db
      .prepare<[number, string]>(
        `INSERT INTO users (id, default_currency) VALUES (?, ?)
         ON CONFLICT(id) DO UPDATE SET default_currency = excluded.default_currency`,
      )
      .run(userId, currency);
  }
}
