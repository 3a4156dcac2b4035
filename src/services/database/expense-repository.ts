import type Database from 'better-sqlite3';
import type { Expense, NewExpense } from '../../types/expense';
import type { DateRange, ExpenseStore } from '../../types/stores';

interface ExpenseRow {
  id: bigint;
  user_id: bigint;
  amount: bigint;
  currency: string;
  description: string;
  merchant: string;
  category_id: bigint | null;
  created_at: string;
  updated_at: string;
}

interface ExpenseParams {
  user_id: number;
  amount: bigint;
  currency: string;
  description: string;
  merchant: string;
  category_id: number | null;
}

/**
 * Expenses table. Integer columns are read as bigint so amounts never pass
 * through a float.
 */
export class SqliteExpenseRepository implements ExpenseStore {
  constructor(private readonly db: Database.Database) {}

  async getById(id: number): Promise<Expense | null> {
    const row = this.db
      .prepare<[number], ExpenseRow>(`SELECT * FROM expenses WHERE id = ?`)
      .safeIntegers(true)
      .get(id);
    return row ? toExpense(row) : null;
  }

  async create(input: NewExpense): Promise<Expense> {
    const now = new Date().toISOString();
    const result = this.db
      .prepare<ExpenseParams & { now: string }>(
        `INSERT INTO expenses (user_id, amount, currency, description, merchant, category_id, created_at, updated_at)
         VALUES (@user_id, @amount, @currency, @description, @merchant, @category_id, @now, @now)`,
      )
      .run({ ...toParams(input), now });

    const created = await this.getById(Number(result.lastInsertRowid));
    if (!created) {
      throw new Error('Expense vanished after insert');
    }
    return created;
  }

  async update(expense: Expense): Promise<void> {
    const result = this.db
      .prepare<ExpenseParams & { id: number; now: string }>(
        `UPDATE expenses
         SET amount = @amount, currency = @currency, description = @description,
             merchant = @merchant, category_id = @category_id, updated_at = @now
         WHERE id = @id AND user_id = @user_id`,
      )
      .run({ ...toParams(expense), id: expense.id, now: new Date().toISOString() });

    if (result.changes === 0) {
      throw new Error(`Expense ${expense.id} not found`);
    }
  }

  async delete(id: number): Promise<void> {
    this.db.prepare<[number]>(`DELETE FROM expenses WHERE id = ?`).run(id);
  }

  async listRecent(userId: number, limit: number): Promise<Expense[]> {
    return this.db
      .prepare<[number, number], ExpenseRow>(
        `SELECT * FROM expenses WHERE user_id = ? ORDER BY created_at DESC, id DESC LIMIT ?`,
      )
      .safeIntegers(true)
      .all(userId, limit)
      .map(toExpense);
  }

  async listInRange(userId: number, range: DateRange): Promise<Expense[]> {
    return this.db
      .prepare<[number, string, string], ExpenseRow>(
        `SELECT * FROM expenses
         WHERE user_id = ? AND created_at >= ? AND created_at < ?
         ORDER BY created_at DESC, id DESC`,
      )
      .safeIntegers(true)
      .all(userId, range.from.toISOString(), range.to.toISOString())
      .map(toExpense);
  }

  async listByTag(userId: number, tagId: number, limit: number): Promise<Expense[]> {
    return this.db
      .prepare<[number, number, number], ExpenseRow>(
        `SELECT e.* FROM expenses e
         JOIN expense_tags et ON et.expense_id = e.id
         WHERE e.user_id = ? AND et.tag_id = ?
         ORDER BY e.created_at DESC, e.id DESC LIMIT ?`,
      )
      .safeIntegers(true)
      .all(userId, tagId, limit)
      .map(toExpense);
  }
}

function toParams(expense: NewExpense): ExpenseParams {
  return {
    user_id: expense.userId,
    amount: expense.amount,
    currency: expense.currency,
    description: expense.description,
    merchant: expense.merchant,
    category_id: expense.categoryId,
  };
}

function toExpense(row: ExpenseRow): Expense {
  return {
    id: Number(row.id),
    userId: Number(row.user_id),
    amount: row.amount,
    currency: row.currency,
    description: row.description,
    merchant: row.merchant,
    categoryId: row.category_id === null ? null : Number(row.category_id),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
