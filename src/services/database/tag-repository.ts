import type Database from 'better-sqlite3';
import type { Tag } from '../../types/expense';
import type { TagStore } from '../../types/stores';

export class SqliteTagRepository implements TagStore {
  constructor(private readonly db: Database.Database) {}

  async getOrCreate(name: string): Promise<Tag> {
    const normalized = name.toLowerCase();
    this.db.prepare<[string]>(`INSERT INTO tags (name) VALUES (?) ON CONFLICT(name) DO NOTHING`).run(normalized);

    const tag = this.db.prepare<[string], Tag>(`SELECT id, name FROM tags WHERE name = ?`).get(normalized);
    if (!tag) {
      throw new Error(`Tag ${normalized} vanished after insert`);
    }
    return tag;
  }

  /**
   * Replace the expense's tags with `tagIds`.
   */
  async setExpenseTags(expenseId: number, tagIds: number[]): Promise<void> {
    const clear = this.db.prepare<[number]>(`DELETE FROM expense_tags WHERE expense_id = ?`);
    const link = this.db.prepare<[number, number]>(
      `INSERT OR IGNORE INTO expense_tags (expense_id, tag_id) VALUES (?, ?)`,
    );

    this.db.transaction(() => {
      clear.run(expenseId);
      for (const tagId of tagIds) {
        link.run(expenseId, tagId);
      }
    })();
  }

  async getByName(name: string): Promise<Tag | null> {
    return this.db.prepare<[string], Tag>(`SELECT id, name FROM tags WHERE name = ?`).get(name.toLowerCase()) ?? null;
  }

  async addExpenseTags(expenseId: number, tagIds: number[]): Promise<void> {
    const link = this.db.prepare<[number, number]>(
      `INSERT OR IGNORE INTO expense_tags (expense_id, tag_id) VALUES (?, ?)`,
    );
    this.db.transaction(() => {
      for (const tagId of tagIds) {
        link.run(expenseId, tagId);
      }
    })();
  }

  async removeExpenseTag(expenseId: number, tagId: number): Promise<boolean> {
    const result = this.db
      .prepare<[number, number]>(`DELETE FROM expense_tags WHERE expense_id = ? AND tag_id = ?`)
      .run(expenseId, tagId);
    return result.changes > 0;
  }

  async getUserTags(userId: number): Promise<Tag[]> {
    return this.db
      .prepare<[number], Tag>(
        `SELECT DISTINCT t.id, t.name
         FROM tags t
         JOIN expense_tags et ON et.tag_id = t.id
         JOIN expenses e ON e.id = et.expense_id
         WHERE e.user_id = ?
         ORDER BY t.name`,
      )
      .all(userId);
  }

  async getExpenseTags(expenseId: number): Promise<Tag[]> {
    return this.db
      .prepare<[number], Tag>(
        `SELECT t.id, t.name
         FROM tags t
         JOIN expense_tags et ON et.tag_id = t.id
         WHERE et.expense_id = ?
         ORDER BY t.name`,
      )
      .all(expenseId);
  }
}
