import { getCurrencySymbol, SUPPORTED_CURRENCIES } from '../../config/currencies';
import { MAX_AMOUNT, MAX_CATEGORY_NAME_LENGTH, MAX_TAG_NAME_LENGTH, MAX_TAGS_PER_COMMAND, UNCATEGORIZED } from '../../config/constants';
import type { EditField } from '../../types/edit';

/**
 * User-facing texts
 */

export interface ExpenseView {
  id: number;
  amount: bigint;
  currency: string;
  description: string;
  merchant: string;
  categoryName: string | null;
  tags?: string[];
}

/**
 * One row of an expense listing
 */
export interface ListedExpense {
  id: number;
  amount: bigint;
  currency: string;
  label: string;
  categoryName: string | null;
  tags: string[];
  createdAt: string;
}

const FIELD_LABELS: Record<EditField, string> = {
  amount: 'Amount',
  merchant: 'Merchant',
  category: 'Category',
};

export const messages = {
  success: {
    expenseAdded: (expense: ExpenseView) => {
      const lines = ['✅ Expense Added', '', `💰 ${formatMoney(expense.amount, expense.currency)}`];
      if (expense.description) {
        lines.push(`📝 ${expense.description}`);
      }
      lines.push(`📁 ${expense.categoryName ?? UNCATEGORIZED}`);
      if (expense.tags && expense.tags.length > 0) {
        lines.push(`🏷️ ${expense.tags.join(', ')}`);
      }
      lines.push(`🆔 #${expense.id}`);
      return lines.join('\n');
    },
    fieldUpdated: (field: EditField, expense: ExpenseView) =>
      `✅ ${FIELD_LABELS[field]} Updated!\n\n${expenseDetails(expense)}`,
    categoryCreated: (expense: ExpenseView) => `✅ Category Created!\n\n${expenseDetails(expense)}`,
    expenseDeleted: (id: number) => `🗑️ Expense #${id} deleted.`,
    categoryAdded: (name: string) => `✅ Category "${name}" added.`,
    categoryRenamed: (oldName: string, newName: string) => `✅ Category "${oldName}" renamed to "${newName}".`,
    categoryDeleted: (name: string, affected: number) =>
      `✅ Category "${name}" deleted.` + (affected > 0 ? `\n\n${affected} expense(s) have been uncategorized.` : ''),
    tagsAdded: (added: string[], expenseId: number, current: string[]) =>
      `✅ Added ${added.map((name) => `#${name}`).join(', ')} to expense #${expenseId}.` +
      (current.length > 0 ? `\n🏷️ Tags: ${current.map((name) => `#${name}`).join(' ')}` : ''),
    tagRemoved: (name: string, expenseId: number) => `✅ Removed #${name} from expense #${expenseId}.`,
    currencySet: (code: string) =>
      `✅ Default currency set to ${code} (${getCurrencySymbol(code)})\n\nNew expenses will use this currency unless you specify otherwise.`,
  },

  error: {
    invalidFormat: 'Invalid format. Use: /add 5.50 Coffee [category]',
    expenseNotFound: '❌ Expense not found.',
    saveFailed: '❌ Failed to save expense. Please try again.',
    loadFailed: '❌ Something went wrong. Please try again.',
    amountTooLargeReason: `Amount is too large (max ${formatAmount(MAX_AMOUNT)}).`,
    updateFailed: (field: EditField) => `❌ Failed to update ${FIELD_LABELS[field].toLowerCase()}. Please try again.`,
    deleteFailed: '❌ Failed to delete expense. Please try again.',
    categoryCreateFailed: '❌ Failed to create category. Please try again.',
    categoriesUnavailable: '❌ Failed to load categories. Please try again.',
    currencyUpdateFailed: '❌ Failed to update currency. Please try again.',
    categoryExists: (name: string) => `Category "${name}" already exists.`,
    categoryNotFound: (name: string) => `❌ Category "${name}" not found.\n\nUse /categories to see all categories.`,
    categoryRenameFailed: '❌ Failed to rename category. Please try again.',
    categoryDeleteFailed: '❌ Failed to delete category. Please try again.',
    expenseNumberNotFound: (id: number) => `❌ Expense #${id} not found.`,
    invalidExpenseId: (usage: string) => `❌ Invalid expense ID. Use: ${usage}`,
    usage: (usage: string) => `❌ Usage: ${usage}`,
    listFailed: '❌ Failed to fetch expenses. Please try again.',
    tagsUnavailable: '❌ Failed to fetch tags. Please try again.',
    tooManyTags: `❌ Too many tags. Maximum ${MAX_TAGS_PER_COMMAND} tags per command.`,
    invalidTagName: (name: string) =>
      `❌ Invalid tag name "${name}". Tags must start with a letter, contain only letters/numbers/underscores, and be at most ${MAX_TAG_NAME_LENGTH} characters.`,
    tagNotFound: (name: string) => `❌ Tag "${name}" not found.\n\nUse /tags to see all tags.`,
    notTagged: (name: string, expenseId: number) => `❌ Expense #${expenseId} is not tagged #${name}.`,
    tagFailed: '❌ Failed to update tags. Please try again.',
    unknownCurrency: (code: string) => `❌ Unknown currency: ${code}\n\nUse /currency to see supported currencies.`,
    validation: (reason: string) => `❌ ${reason}`,
  },

  info: {
    welcome: (firstName?: string) =>
      `👋 Welcome${firstName ? `, ${firstName}` : ''}!\n\nType an expense like "5.50 Coffee" to track it.\nUse /help to see all commands.`,
    help: [
      'How to add expenses:',
      '• 5.50 Coffee',
      '• $10 Lunch #work',
      '• SGD 25.50 Groceries',
      '• /add 12 Taxi [Transportation]',
      '',
      'Commands:',
      '/add <amount> <description> [category] - Add an expense',
      '/categories - List categories',
      `/addcategory <name> - Create a category (max ${MAX_CATEGORY_NAME_LENGTH} characters)`,
      '/currency [code] - Show or set your default currency',
      '/list - Recent expenses',
      '/today - Today\'s expenses',
      '/week - This week\'s expenses',
      '/delete <id> - Delete an expense',
      '/tag <id> #tag1 [#tag2] - Tag an expense',
      '/untag <id> #tag - Remove a tag',
      '/tags [#tag] - List tags, or expenses with a tag',
      '/renamecategory <old> -> <new> - Rename a category',
      '/deletecategory <name> - Delete a category',
    ].join('\n'),
    categoryList: (names: string[]) =>
      names.length === 0 ? 'No categories yet. Add one with /addcategory <name>' : `📁 Categories:\n\n${names.map((name) => `• ${name}`).join('\n')}`,
    currencyList: (current: string) =>
      [
        `Your default currency: ${current}`,
        '',
        'Supported currencies:',
        ...Object.entries(SUPPORTED_CURRENCIES).map(([code, symbol]) => `• ${code} (${symbol})`),
        '',
        'Set one with /currency <code>',
      ].join('\n'),
    addCategoryUsage: 'Usage: /addcategory <name>',
    expenseList: (header: string, expenses: ListedExpense[]) =>
      expenses.length === 0 ? `${header}\n\nNo expenses found.` : `${header}\n\n${expenses.map(expenseLine).join('\n\n')}`,
    tagList: (names: string[]) =>
      names.length === 0
        ? '🏷️ No tags found.\n\nAdd tags inline: 5.50 Coffee #work\nOr use: /tag <id> #work'
        : `🏷️ Tags\n\n${names.map((name, i) => `${i + 1}. #${name}`).join('\n')}`,
    unrecognized: 'Use /help or type an expense like "5.50 Coffee".',
  },

  prompt: {
    editMenu: (expense: ExpenseView) => `✏️ Edit Expense #${expense.id}\n\n${expenseDetails(expense)}\n\nWhat would you like to edit?`,
    editAmount: (expense: ExpenseView) =>
      `💰 Edit Amount\n\nCurrent amount: ${formatMoney(expense.amount, expense.currency)}\n\nPlease type the new amount (e.g., 25.50):`,
    editMerchant: (expense: ExpenseView) =>
      `🏪 Edit Merchant\n\nCurrent merchant: ${expense.merchant || '-'}\n\nPlease type the new merchant name:`,
    editCategory: (expense: ExpenseView) =>
      `📁 Edit Category\n\nCurrent: ${expense.categoryName ?? UNCATEGORIZED}\n\nChoose a category below, or type a name to create a new one (e.g., Subscriptions):`,
    confirmDelete: (expense: ExpenseView) =>
      `🗑️ Delete Expense?\n\n💰 ${formatMoney(expense.amount, expense.currency)}\n📝 ${expense.description || '-'}\n🆔 #${expense.id}\n\nThis action cannot be undone.`,
  },
};

export const listHeaders = {
  recent: '📋 Recent Expenses',
  today: (totals: string) => `📅 Today's Expenses${totals}`,
  week: (totals: string) => `📆 This Week's Expenses${totals}`,
  tagged: (name: string) => `🏷️ Expenses tagged #${name}`,
};

function expenseLine(expense: ListedExpense): string {
  let line = `#${expense.id} ${formatMoney(expense.amount, expense.currency)}`;
  if (expense.label) {
    line += ` - ${expense.label}`;
  }
  if (expense.categoryName) {
    line += ` [${expense.categoryName}]`;
  }
  if (expense.tags.length > 0) {
    line += ` ${expense.tags.map((name) => `#${name}`).join(' ')}`;
  }
  return `${line}\n${expense.createdAt.slice(0, 10)}`;
}

/**
 * " (Total: S$12.00 SGD, $3.50 USD)", one sum per currency in code order; '' for no amounts
 */
export function formatTotals(amounts: readonly { amount: bigint; currency: string }[]): string {
  const sums = new Map<string, bigint>();
  for (const { amount, currency } of amounts) {
    sums.set(currency, (sums.get(currency) ?? 0n) + amount);
  }
  if (sums.size === 0) {
    return '';
  }
  const parts = [...sums.keys()].sort().map((currency) => formatMoney(sums.get(currency) ?? 0n, currency));
  return ` (Total: ${parts.join(', ')})`;
}

export function expenseDetails(expense: ExpenseView): string {
  return [
    `💰 Amount: ${formatMoney(expense.amount, expense.currency)}`,
    `🏪 Merchant: ${expense.merchant || '-'}`,
    `📁 Category: ${expense.categoryName ?? UNCATEGORIZED}`,
  ].join('\n');
}

/**
 * Format minor units with two decimals and thousands separators: 123450n -> "1,234.50"
 */
export function formatAmount(amount: bigint): string {
  const negative = amount < 0n;
  const abs = negative ? -amount : amount;
  const whole = new Intl.NumberFormat('en-US').format(abs / 100n);
  const cents = String(abs % 100n).padStart(2, '0');
  return `${negative ? '-' : ''}${whole}.${cents}`;
}

export function formatCurrency(amount: bigint, currency: string): string {
  return `${getCurrencySymbol(currency)}${formatAmount(amount)}`;
}

/**
 * "S$5.50 SGD"
 */
export function formatMoney(amount: bigint, currency: string): string {
  return `${formatCurrency(amount, currency)} ${currency}`;
}
