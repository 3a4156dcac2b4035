import { InlineKeyboard } from 'grammy';
import type { Category } from '../../types/expense';
import { buildActionToken } from '../edit/actions';

/**
 * Inline keyboards for the expense and edit dialogue
 */

export function getExpenseActionsKeyboard(expenseId: number): InlineKeyboard {
  return new InlineKeyboard()
    .text('✏️ Edit', buildActionToken({ verb: 'menu', expenseId }))
    .text('🗑️ Delete', buildActionToken({ verb: 'delete', expenseId }));
}

export function getEditMenuKeyboard(expenseId: number): InlineKeyboard {
  return new InlineKeyboard()
    .text('💰 Amount', buildActionToken({ verb: 'edit', field: 'amount', expenseId }))
    .text('🏪 Merchant', buildActionToken({ verb: 'edit', field: 'merchant', expenseId }))
    .row()
    .text('📁 Category', buildActionToken({ verb: 'edit', field: 'category', expenseId }))
    .row()
    .text('✅ Done', buildActionToken({ verb: 'done', expenseId }));
}

export function getCancelKeyboard(expenseId: number): InlineKeyboard {
  return new InlineKeyboard().text('⬅️ Cancel', buildActionToken({ verb: 'cancel', expenseId }));
}

export function getCategoryPickerKeyboard(expenseId: number, categories: readonly Category[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  categories.forEach((category, index) => {
    keyboard.text(category.name, buildActionToken({ verb: 'setcat', categoryId: category.id, expenseId }));
    if (index % 2 === 1) {
      keyboard.row();
    }
  });
  if (categories.length % 2 === 1) {
    keyboard.row();
  }
  return keyboard.text('⬅️ Cancel', buildActionToken({ verb: 'cancel', expenseId }));
}

export function getUpdatedKeyboard(expenseId: number): InlineKeyboard {
  return new InlineKeyboard()
    .text('✏️ Edit More', buildActionToken({ verb: 'menu', expenseId }))
    .text('✅ Done', buildActionToken({ verb: 'done', expenseId }));
}

export function getConfirmDeleteKeyboard(expenseId: number): InlineKeyboard {
  return new InlineKeyboard()
    .text('✅ Yes, Delete', buildActionToken({ verb: 'confirmdelete', expenseId }))
    .row()
    .text('❌ No, Keep It', buildActionToken({ verb: 'done', expenseId }));
}
