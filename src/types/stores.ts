import type { Category, Expense, NewExpense, Tag, User } from './expense';

export interface CategoryStore {
  getAll(): Promise<Category[]>;
  getById(id: number): Promise<Category | null>;
  create(name: string): Promise<Category>;
  rename(id: number, name: string): Promise<void>;
  /** Delete the category and uncategorize its expenses. Returns how many expenses were affected. */
  delete(id: number): Promise<number>;
}

/**
 * Half-open range of creation times, `from` inclusive.
 */
export interface DateRange {
  from: Date;
  to: Date;
}

export interface ExpenseStore {
  getById(id: number): Promise<Expense | null>;
  create(input: NewExpense): Promise<Expense>;
  update(expense: Expense): Promise<void>;
  delete(id: number): Promise<void>;
  /** Newest first. */
  listRecent(userId: number, limit: number): Promise<Expense[]>;
  /** Newest first. */
  listInRange(userId: number, range: DateRange): Promise<Expense[]>;
  /** Newest first. */
  listByTag(userId: number, tagId: number, limit: number): Promise<Expense[]>;
}

export interface TagStore {
  getOrCreate(name: string): Promise<Tag>;
  getByName(name: string): Promise<Tag | null>;
  setExpenseTags(expenseId: number, tagIds: number[]): Promise<void>;
  /** Link tags without touching the ones already on the expense. */
  addExpenseTags(expenseId: number, tagIds: number[]): Promise<void>;
  /** Returns false when the expense did not carry the tag. */
  removeExpenseTag(expenseId: number, tagId: number): Promise<boolean>;
  getExpenseTags(expenseId: number): Promise<Tag[]>;
  /** Tags on any of the user's expenses, by name. */
  getUserTags(userId: number): Promise<Tag[]>;
}

export interface UserStore {
  ensure(user: User): Promise<void>;
  getDefaultCurrency(userId: number): Promise<string | null>;
  setDefaultCurrency(userId: number, currency: string): Promise<void>;
}
