import type { Category, Expense, ParsedExpense, Tag, User } from '../../types/expense';
import type { OutgoingMessage } from '../../types/edit';
import type { CategoryStore, ExpenseStore, TagStore, UserStore } from '../../types/stores';
import { matchCategory, sortCategoriesById } from '../category/matcher';
import { messages } from '../feedback/messages';
import { getExpenseActionsKeyboard } from '../telegram/buttons';
import { errorMessage } from '../../utils/errors';
import { exceedsMaxAmount, parseCommandExpense, parseExpenseInput } from './parser';

export interface ExpenseCaptureDeps {
  expenses: ExpenseStore;
  categories: CategoryStore;
  tags: TagStore;
  users: UserStore;
  defaultCurrency: string;
}

/**
 * Turns "5.50 Coffee" style messages and /add commands into stored expenses
 */
export class ExpenseCaptureService {
  constructor(private readonly deps: ExpenseCaptureDeps) {}

  /**
   * Returns null when the text is a command or does not start with an amount.
   */
  async captureFreeText(user: User, text: string): Promise<OutgoingMessage[] | null> {
    if (text.trim().startsWith('/')) {
      return null;
    }

    const categories = await this.loadCategories();
    const parsed = parseExpenseInput(
      text,
      categories.map((c) => c.name),
    );
    if (!parsed) {
      return null;
    }
    return this.save(user, parsed, categories);
  }

  async captureCommand(user: User, text: string): Promise<OutgoingMessage[]> {
    const categories = await this.loadCategories();
    const parsed = parseCommandExpense(
      text,
      categories.map((c) => c.name),
    );
    if (!parsed) {
      return [{ kind: 'send', text: messages.error.invalidFormat }];
    }
    return this.save(user, parsed, categories);
  }

  private async save(user: User, parsed: ParsedExpense, categories: Category[]): Promise<OutgoingMessage[]> {
    if (exceedsMaxAmount(parsed.amount)) {
      return [{ kind: 'send', text: messages.error.validation(messages.error.amountTooLargeReason) }];
    }
    const category = parsed.categoryName ? matchCategory(parsed.categoryName, categories) : null;

    let expense: Expense;
    try {
      await this.deps.users.ensure(user);
      const currency = parsed.currency || (await this.deps.users.getDefaultCurrency(user.id)) || this.deps.defaultCurrency;
      expense = await this.deps.expenses.create({
        userId: user.id,
        amount: parsed.amount,
        currency,
        description: parsed.description,
        merchant: parsed.description,
        categoryId: category?.id ?? null,
      });
    } catch (error) {
      console.error('[Capture] Failed to create expense:', errorMessage(error));
      return [{ kind: 'send', text: messages.error.saveFailed }];
    }

    const tags = await this.attachTags(expense.id, parsed.tags);
    console.log('[Capture] Expense created:', expense.id, expense.amount.toString(), expense.currency);

    const text = messages.success.expenseAdded({
      id: expense.id,
      amount: expense.amount,
      currency: expense.currency,
      description: expense.description,
      merchant: expense.merchant,
      categoryName: category?.name ?? null,
      tags,
    });
    return [{ kind: 'send', text, keyboard: getExpenseActionsKeyboard(expense.id) }];
  }

  // A tag failure does not undo the expense; the summary lists what stuck
  private async attachTags(expenseId: number, names: string[]): Promise<string[]> {
    if (names.length === 0) {
      return [];
    }
    try {
      const tags: Tag[] = [];
      for (const name of names) {
        tags.push(await this.deps.tags.getOrCreate(name));
      }
      await this.deps.tags.setExpenseTags(
        expenseId,
        tags.map((tag) => tag.id),
      );
      return tags.map((tag) => tag.name);
    } catch (error) {
      console.error('[Capture] Failed to attach tags:', expenseId, errorMessage(error));
      return [];
    }
  }

  private async loadCategories(): Promise<Category[]> {
    try {
      return sortCategoriesById(await this.deps.categories.getAll());
    } catch (error) {
      console.error('[Capture] Failed to fetch categories:', errorMessage(error));
      return [];
    }
  }
}
