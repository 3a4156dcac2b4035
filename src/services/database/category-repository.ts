import type Database from 'better-sqlite3';
import type { Category } from '../../types/expense';
import type { CategoryStore } from '../../types/stores';

interface CategoryRow {
  id: number;
  name: string;
  created_at: string;
}

export class SqliteCategoryRepository implements CategoryStore {
  constructor(private readonly db: Database.Database) {}

  async getAll(): Promise<Category[]> {
    return this.db
      .prepare<[], CategoryRow>(`SELECT id, name, created_at FROM categories ORDER BY id`)
      .all()
      .map(toCategory);
  }

  async getById(id: number): Promise<Category | null> {
    const row = this.db.prepare<[number], CategoryRow>(`SELECT id, name, created_at FROM categories WHERE id = ?`).get(id);
    return row ? toCategory(row) : null;
  }

  /**
   * Throws when a category with the same name (any case) exists.
   */
  async create(name: string): Promise<Category> {
    const result = this.db.prepare<[string]>(`INSERT INTO categories (name) VALUES (?)`).run(name);
    const created = await this.getById(Number(result.lastInsertRowid));
    if (!created) {
      throw new Error('Category vanished after insert');
    }
    return created;
  }

  async rename(id: number, name: string): Promise<void> {
    const result = this.db.prepare<[string, number]>(`UPDATE categories SET name = ? WHERE id = ?`).run(name, id);
    if (result.changes === 0) {
      throw new Error(`Category ${id} not found`);
    }
  }

  async delete(id: number): Promise<number> {
    const uncategorize = this.db.prepare<[number]>(`UPDATE expenses SET category_id = NULL WHERE category_id = ?`);
    const remove = this.db.prepare<[number]>(`DELETE FROM categories WHERE id = ?`);

    return this.db.transaction((categoryId: number) => {
      const affected = uncategorize.run(categoryId).changes;
      remove.run(categoryId);
      return affected;
    })(id);
  }
}

function toCategory(row: CategoryRow): Category {
  return { id: row.id, name: row.name, createdAt: row.created_at };
}
