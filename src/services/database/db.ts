import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { DEFAULT_CATEGORIES } from '../../config/constants';

const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

/**
 * Open the database at `dbPath` (or ":memory:"), create the schema and seed
 * the default categories on first run.
 */
export function initializeDatabase(dbPath: string): Database.Database {
  let location = dbPath;
  if (dbPath !== IN_MEMORY) {
    location = path.resolve(dbPath);
    fs.mkdirSync(path.dirname(location), { recursive: true });
  }

  const database = new Database(location);
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');

  createSchema(database);
  seedDefaultCategories(database);

  db = database;
  return database;
}

function createSchema(database: Database.Database): void {
  const statements = [
    `CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY,
      username TEXT,
      first_name TEXT,
      default_currency TEXT,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP
    )`,

    `CREATE TABLE IF NOT EXISTS categories (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE COLLATE NOCASE,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP
    )`,

    `CREATE TABLE IF NOT EXISTS expenses (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      amount INTEGER NOT NULL CHECK (amount > 0),
      currency TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      merchant TEXT NOT NULL DEFAULT '',
      category_id INTEGER,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      FOREIGN KEY (user_id) REFERENCES users(id),
      FOREIGN KEY (category_id) REFERENCES categories(id) ON DELETE SET NULL
    )`,

    `CREATE TABLE IF NOT EXISTS tags (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE
    )`,

    `CREATE TABLE IF NOT EXISTS expense_tags (
      expense_id INTEGER NOT NULL,
      tag_id INTEGER NOT NULL,
      PRIMARY KEY (expense_id, tag_id),
      FOREIGN KEY (expense_id) REFERENCES expenses(id) ON DELETE CASCADE,
      FOREIGN KEY (tag_id) REFERENCES tags(id) ON DELETE CASCADE
    )`,

    `CREATE INDEX IF NOT EXISTS idx_expenses_user ON expenses(user_id)`,
    `CREATE INDEX IF NOT EXISTS idx_expense_tags_tag ON expense_tags(tag_id)`,
  ];

  for (const stmt of statements) {
    database.exec(stmt);
  }
}

function seedDefaultCategories(database: Database.Database): void {
  const checkStmt = database.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM categories`);
  const result = checkStmt.get();

  if (!result || result.count === 0) {
    const insertStmt = database.prepare<[string]>(`INSERT INTO categories (name) VALUES (?)`);
    const seed = database.transaction((names: readonly string[]) => {
      for (const name of names) {
        insertStmt.run(name);
      }
    });
    seed(DEFAULT_CATEGORIES);
    console.log('[Database] Seeded', DEFAULT_CATEGORIES.length, 'default categories');
  }
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
