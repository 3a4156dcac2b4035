import type { Category, Expense } from '../../types/expense';
import type { EditAction, EditField, OutgoingMessage, PendingEdit } from '../../types/edit';
import type { CategoryStore, ExpenseStore, TagStore } from '../../types/stores';
import { sortCategoriesById } from '../category/matcher';
import { messages, type ExpenseView } from '../feedback/messages';
import type { PendingEditStore } from '../state/pending-edits';
import {
  getCancelKeyboard,
  getCategoryPickerKeyboard,
  getConfirmDeleteKeyboard,
  getEditMenuKeyboard,
  getExpenseActionsKeyboard,
  getUpdatedKeyboard,
} from '../telegram/buttons';
import { CategoryNameSchema, EditAmountSchema, MerchantSchema, validateInput } from '../validation/schemas';
import { errorMessage } from '../../utils/errors';
import { parseEditAction } from './actions';

export interface EditFlowDeps {
  pendingEdits: PendingEditStore;
  expenses: ExpenseStore;
  categories: CategoryStore;
  tags: TagStore;
}

type ExpenseLookup =
  | { status: 'found'; expense: Expense }
  | { status: 'missing' }
  | { status: 'forbidden' }
  | { status: 'failed' };

const NOTHING: OutgoingMessage[] = [];

/**
 * Drives the edit dialogue: button taps start, cancel or finish an edit, and
 * the next text message in a chat with a pending edit is consumed as the new
 * value for that field.
 *
 * Every operation checks that the acting user owns the expense; a mismatch
 * produces no messages.
 */
export class EditFlowController {
  constructor(private readonly deps: EditFlowDeps) {}

  hasPending(chatId: number): boolean {
    return this.deps.pendingEdits.get(chatId) !== null;
  }

  /**
   * Handle a button press. Malformed tokens are ignored.
   */
  async handleAction(chatId: number, userId: number, messageId: number, token: string): Promise<OutgoingMessage[]> {
    const action = parseEditAction(token);
    if (!action) {
      return NOTHING;
    }

    if (action.verb === 'cancel') {
      this.deps.pendingEdits.clear(chatId);
    }

    const lookup = await this.loadExpense(action.expenseId, userId);
    switch (lookup.status) {
      case 'missing':
        return [{ kind: 'edit', messageId, text: messages.error.expenseNotFound }];
      case 'forbidden':
        return NOTHING;
      case 'failed':
        return [{ kind: 'send', text: messages.error.loadFailed }];
      case 'found':
        return this.applyAction(chatId, messageId, action, lookup.expense);
    }
  }

  /**
   * Consume a text message as the value for the chat's pending edit.
   * Returns null when nothing is pending, so the caller can treat the text as
   * a new expense instead.
   */
  async handleText(chatId: number, userId: number, text: string): Promise<OutgoingMessage[] | null> {
    // Taken before any I/O: whatever happens next, the chat ends up idle
    const pending = this.deps.pendingEdits.take(chatId);
    if (!pending) {
      return null;
    }

    const lookup = await this.loadExpense(pending.expenseId, userId);
    switch (lookup.status) {
      case 'missing':
        return [{ kind: 'send', text: messages.error.expenseNotFound }];
      case 'forbidden':
        return NOTHING;
      case 'failed':
        return [{ kind: 'send', text: messages.error.updateFailed(pending.field) }];
      case 'found':
        break;
    }

    const expense = lookup.expense;
    switch (pending.field) {
      case 'amount':
        return this.applyAmount(pending, expense, text);
      case 'merchant':
        return this.applyMerchant(pending, expense, text);
      case 'category':
        return this.applyNewCategory(pending, expense, text);
      default:
        return assertNever(pending.field);
    }
  }

  private async applyAction(
    chatId: number,
    messageId: number,
    action: EditAction,
    expense: Expense,
  ): Promise<OutgoingMessage[]> {
    switch (action.verb) {
      case 'menu':
      case 'cancel':
        return [
          { kind: 'edit', messageId, text: messages.prompt.editMenu(await this.describe(expense)), keyboard: getEditMenuKeyboard(expense.id) },
        ];

      case 'edit':
        return this.startEdit(chatId, messageId, action.field, expense);

      case 'setcat':
        this.deps.pendingEdits.clear(chatId);
        return this.assignCategory(messageId, expense, action.categoryId);

      case 'done': {
        this.deps.pendingEdits.clear(chatId);
        const view = await this.describe(expense, true);
        return [
          { kind: 'edit', messageId, text: messages.success.expenseAdded(view), keyboard: getExpenseActionsKeyboard(expense.id) },
        ];
      }

      case 'delete':
        return [
          {
            kind: 'edit',
            messageId,
            text: messages.prompt.confirmDelete(await this.describe(expense)),
            keyboard: getConfirmDeleteKeyboard(expense.id),
          },
        ];

      case 'confirmdelete':
        return this.deleteExpense(chatId, messageId, expense);

      default:
        return assertNever(action);
    }
  }

  private async startEdit(chatId: number, messageId: number, field: EditField, expense: Expense): Promise<OutgoingMessage[]> {
    this.deps.pendingEdits.set(chatId, { expenseId: expense.id, field, promptMessageId: messageId });
    const view = await this.describe(expense);

    switch (field) {
      case 'amount':
        return [{ kind: 'edit', messageId, text: messages.prompt.editAmount(view), keyboard: getCancelKeyboard(expense.id) }];
      case 'merchant':
        return [{ kind: 'edit', messageId, text: messages.prompt.editMerchant(view), keyboard: getCancelKeyboard(expense.id) }];
      case 'category': {
        const categories = await this.loadCategories();
        const keyboard = categories.length > 0 ? getCategoryPickerKeyboard(expense.id, categories) : getCancelKeyboard(expense.id);
        return [{ kind: 'edit', messageId, text: messages.prompt.editCategory(view), keyboard }];
      }
      default:
        return assertNever(field);
    }
  }

  private async applyAmount(pending: PendingEdit, expense: Expense, text: string): Promise<OutgoingMessage[]> {
    const result = validateInput(EditAmountSchema, text);
    if (!result.valid) {
      return [{ kind: 'send', text: messages.error.validation(result.error) }];
    }

    const updated: Expense = { ...expense, amount: result.data };
    if (!(await this.save(updated))) {
      return [{ kind: 'send', text: messages.error.updateFailed('amount') }];
    }

    console.log('[EditFlow] Amount updated:', expense.id, '->', result.data.toString());
    return this.confirmUpdate(pending, updated, messages.success.fieldUpdated('amount', await this.describe(updated)));
  }

  private async applyMerchant(pending: PendingEdit, expense: Expense, text: string): Promise<OutgoingMessage[]> {
    const result = validateInput(MerchantSchema, text);
    if (!result.valid) {
      return [{ kind: 'send', text: messages.error.validation(result.error) }];
    }

    const updated: Expense = { ...expense, merchant: result.data, description: result.data };
    if (!(await this.save(updated))) {
      return [{ kind: 'send', text: messages.error.updateFailed('merchant') }];
    }

    console.log('[EditFlow] Merchant updated:', expense.id);
    return this.confirmUpdate(pending, updated, messages.success.fieldUpdated('merchant', await this.describe(updated)));
  }

  private async applyNewCategory(pending: PendingEdit, expense: Expense, text: string): Promise<OutgoingMessage[]> {
    const result = validateInput(CategoryNameSchema, text);
    if (!result.valid) {
      return [{ kind: 'send', text: messages.error.validation(result.error) }];
    }

    const name = result.data;
    let category: Category;
    let created = false;
    try {
      const wanted = name.toLowerCase();
      const existing = (await this.deps.categories.getAll()).find((c) => c.name.toLowerCase() === wanted);
      if (existing) {
        category = existing;
      } else {
        category = await this.deps.categories.create(name);
        created = true;
      }
    } catch (error) {
      console.error('[EditFlow] Failed to create category:', errorMessage(error));
      return [{ kind: 'send', text: messages.error.categoryCreateFailed }];
    }

    const updated: Expense = { ...expense, categoryId: category.id };
    if (!(await this.save(updated))) {
      return [{ kind: 'send', text: messages.error.updateFailed('category') }];
    }

    console.log('[EditFlow] Category assigned:', expense.id, '->', category.name, created ? '(new)' : '(existing)');
    const view = { ...(await this.describe(updated)), categoryName: category.name };
    const reply = created ? messages.success.categoryCreated(view) : messages.success.fieldUpdated('category', view);
    return this.confirmUpdate(pending, updated, reply);
  }

  private async assignCategory(messageId: number, expense: Expense, categoryId: number): Promise<OutgoingMessage[]> {
    let category: Category | null;
    try {
      category = await this.deps.categories.getById(categoryId);
    } catch (error) {
      console.error('[EditFlow] Failed to load category:', errorMessage(error));
      return [{ kind: 'send', text: messages.error.updateFailed('category') }];
    }
    if (!category) {
      return NOTHING;
    }

    const updated: Expense = { ...expense, categoryId: category.id };
    if (!(await this.save(updated))) {
      return [{ kind: 'send', text: messages.error.updateFailed('category') }];
    }

    console.log('[EditFlow] Category selected:', expense.id, '->', category.name);
    const view = { ...(await this.describe(updated)), categoryName: category.name };
    return [
      { kind: 'edit', messageId, text: messages.success.fieldUpdated('category', view), keyboard: getUpdatedKeyboard(expense.id) },
    ];
  }

  private async deleteExpense(chatId: number, messageId: number, expense: Expense): Promise<OutgoingMessage[]> {
    try {
      await this.deps.expenses.delete(expense.id);
    } catch (error) {
      console.error('[EditFlow] Failed to delete expense:', expense.id, errorMessage(error));
      return [{ kind: 'edit', messageId, text: messages.error.deleteFailed }];
    }

    if (this.deps.pendingEdits.get(chatId)?.expenseId === expense.id) {
      this.deps.pendingEdits.clear(chatId);
    }
    console.log('[EditFlow] Expense deleted:', expense.id);
    return [{ kind: 'edit', messageId, text: messages.success.expenseDeleted(expense.id) }];
  }

  private confirmUpdate(pending: PendingEdit, expense: Expense, text: string): OutgoingMessage[] {
    return [{ kind: 'edit', messageId: pending.promptMessageId, text, keyboard: getUpdatedKeyboard(expense.id) }];
  }

  private async save(expense: Expense): Promise<boolean> {
    try {
      await this.deps.expenses.update(expense);
      return true;
    } catch (error) {
      console.error('[EditFlow] Failed to update expense:', expense.id, errorMessage(error));
      return false;
    }
  }

  private async loadExpense(expenseId: number, userId: number): Promise<ExpenseLookup> {
    let expense: Expense | null;
    try {
      expense = await this.deps.expenses.getById(expenseId);
    } catch (error) {
      console.error('[EditFlow] Failed to load expense:', expenseId, errorMessage(error));
      return { status: 'failed' };
    }

    if (!expense) {
      return { status: 'missing' };
    }
    if (expense.userId !== userId) {
      console.warn('[EditFlow] User mismatch on expense', expenseId);
      return { status: 'forbidden' };
    }
    return { status: 'found', expense };
  }

  private async loadCategories(): Promise<Category[]> {
    try {
      return sortCategoriesById(await this.deps.categories.getAll());
    } catch (error) {
      console.error('[EditFlow] Failed to load categories:', errorMessage(error));
      return [];
    }
  }

  private async describe(expense: Expense, withTags = false): Promise<ExpenseView> {
    let categoryName: string | null = null;
    let tags: string[] = [];
    try {
      if (expense.categoryId !== null) {
        categoryName = (await this.deps.categories.getById(expense.categoryId))?.name ?? null;
      }
      if (withTags) {
        tags = (await this.deps.tags.getExpenseTags(expense.id)).map((tag) => tag.name);
      }
    } catch (error) {
      console.debug('[EditFlow] Could not load expense details:', errorMessage(error));
    }

    return {
      id: expense.id,
      amount: expense.amount,
      currency: expense.currency,
      description: expense.description,
      merchant: expense.merchant,
      categoryName,
      tags,
    };
  }
}

function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
