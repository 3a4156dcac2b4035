import type { InlineKeyboard } from 'grammy';

export type EditField = 'amount' | 'merchant' | 'category';

export const EDIT_FIELDS: readonly EditField[] = ['amount', 'merchant', 'category'];

export interface PendingEdit {
  expenseId: number;
  field: EditField;
  /** Message showing the prompt; replaced in place by the confirmation. */
  promptMessageId: number;
}

export type EditAction =
  | { verb: 'menu'; expenseId: number }
  | { verb: 'edit'; field: EditField; expenseId: number }
  | { verb: 'cancel'; expenseId: number }
  | { verb: 'setcat'; categoryId: number; expenseId: number }
  | { verb: 'done'; expenseId: number }
  | { verb: 'delete'; expenseId: number }
  | { verb: 'confirmdelete'; expenseId: number };

export type OutgoingMessage =
  | { kind: 'send'; text: string; keyboard?: InlineKeyboard }
  | { kind: 'edit'; messageId: number; text: string; keyboard?: InlineKeyboard };
