export interface Expense {
  id: number;
  userId: number;
  /** Amount in minor units (hundredths). */
  amount: bigint;
  currency: string;
  description: string;
  merchant: string;
  categoryId: number | null;
  createdAt: string;
  updatedAt: string;
}

export type NewExpense = Omit<Expense, 'id' | 'createdAt' | 'updatedAt'>;

export interface Category {
  id: number;
  name: string;
  createdAt: string;
}

export interface Tag {
  id: number;
  name: string;
}

export interface User {
  id: number;
  username?: string;
  firstName?: string;
}

/**
 * Result of parsing a chat message as an expense. Never produced without a
 * positive amount.
 */
export interface ParsedExpense {
  amount: bigint;
  /** ISO code, or '' when the text named no currency. */
  currency: string;
  description: string;
  /** Known category name found in the text, or ''. */
  categoryName: string;
  tags: string[];
}
