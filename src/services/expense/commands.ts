import { LIST_LIMIT, MAX_TAGS_PER_COMMAND, TAG_LIST_LIMIT } from '../../config/constants';
import type { Category, Expense, Tag } from '../../types/expense';
import type { OutgoingMessage } from '../../types/edit';
import type { CategoryStore, ExpenseStore, TagStore } from '../../types/stores';
import { formatTotals, listHeaders, messages, type ListedExpense } from '../feedback/messages';
import type { PendingEditStore } from '../state/pending-edits';
import { ExpenseIdSchema, validateInput } from '../validation/schemas';
import { dayRange, weekRange } from '../../utils/date-range';
import { errorMessage } from '../../utils/errors';
import { isValidTagName } from './parser';

const DELETE_USAGE = '/delete <id>';
const TAG_USAGE = '/tag <id> #tag1 [#tag2] ...';
const UNTAG_USAGE = '/untag <id> #tag';

export interface ExpenseCommandDeps {
  expenses: ExpenseStore;
  categories: CategoryStore;
  tags: TagStore;
  pendingEdits: PendingEditStore;
  now?: () => Date;
}

type OwnedLookup = { expense: Expense } | { reply: OutgoingMessage[] };

function send(text: string): OutgoingMessage[] {
  return [{ kind: 'send', text }];
}

/**
 * Listing, deleting and tagging expenses by id. Arguments are the command
 * text after the command name.
 */
export class ExpenseCommandService {
  private readonly now: () => Date;

  constructor(private readonly deps: ExpenseCommandDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async listRecent(userId: number): Promise<OutgoingMessage[]> {
    return this.list(listHeaders.recent, () => this.deps.expenses.listRecent(userId, LIST_LIMIT));
  }

  async listToday(userId: number): Promise<OutgoingMessage[]> {
    return this.list(listHeaders.today, () => this.deps.expenses.listInRange(userId, dayRange(this.now())));
  }

  async listWeek(userId: number): Promise<OutgoingMessage[]> {
    return this.list(listHeaders.week, () => this.deps.expenses.listInRange(userId, weekRange(this.now())));
  }

  async deleteExpense(chatId: number, userId: number, args: string): Promise<OutgoingMessage[]> {
    if (!args) {
      return send(messages.error.usage(DELETE_USAGE));
    }
    const lookup = await this.loadOwned(args, userId, DELETE_USAGE);
    if ('reply' in lookup) {
      return lookup.reply;
    }

    const { expense } = lookup;
    try {
      await this.deps.expenses.delete(expense.id);
    } catch (error) {
      console.error('[Commands] Failed to delete expense:', expense.id, errorMessage(error));
      return send(messages.error.deleteFailed);
    }

    if (this.deps.pendingEdits.get(chatId)?.expenseId === expense.id) {
      this.deps.pendingEdits.clear(chatId);
    }
    console.log('[Commands] Expense deleted:', expense.id);
    return send(messages.success.expenseDeleted(expense.id));
  }

  async tagExpense(userId: number, args: string): Promise<OutgoingMessage[]> {
    const [idText, ...names] = args.split(/\s+/).filter((part) => part.length > 0);
    if (!idText || names.length === 0) {
      return send(messages.error.usage(TAG_USAGE));
    }
    if (names.length > MAX_TAGS_PER_COMMAND) {
      return send(messages.error.tooManyTags);
    }

    const wanted: string[] = [];
    for (const raw of names) {
      const name = raw.replace(/^#/, '').toLowerCase();
      if (!name) {
        continue;
      }
      if (!isValidTagName(name)) {
        return send(messages.error.invalidTagName(name));
      }
      if (!wanted.includes(name)) {
        wanted.push(name);
      }
    }
    if (wanted.length === 0) {
      return send(messages.error.usage(TAG_USAGE));
    }

    const lookup = await this.loadOwned(idText, userId, TAG_USAGE);
    if ('reply' in lookup) {
      return lookup.reply;
    }

    const { expense } = lookup;
    try {
      const tags: Tag[] = [];
      for (const name of wanted) {
        tags.push(await this.deps.tags.getOrCreate(name));
      }
      await this.deps.tags.addExpenseTags(
        expense.id,
        tags.map((tag) => tag.id),
      );
    } catch (error) {
      console.error('[Commands] Failed to tag expense:', expense.id, errorMessage(error));
      return send(messages.error.tagFailed);
    }

    console.log('[Commands] Tags added:', expense.id, wanted.join(','));
    const current = await this.tagNames(expense.id);
    return send(messages.success.tagsAdded(wanted, expense.id, current));
  }

  async untagExpense(userId: number, args: string): Promise<OutgoingMessage[]> {
    const [idText, raw] = args.split(/\s+/).filter((part) => part.length > 0);
    if (!idText || !raw) {
      return send(messages.error.usage(UNTAG_USAGE));
    }
    const name = raw.replace(/^#/, '').toLowerCase();
    if (!isValidTagName(name)) {
      return send(messages.error.invalidTagName(name));
    }

    const lookup = await this.loadOwned(idText, userId, UNTAG_USAGE);
    if ('reply' in lookup) {
      return lookup.reply;
    }

    const { expense } = lookup;
    try {
      const tag = await this.deps.tags.getByName(name);
      if (!tag) {
        return send(messages.error.tagNotFound(name));
      }
      if (!(await this.deps.tags.removeExpenseTag(expense.id, tag.id))) {
        return send(messages.error.notTagged(name, expense.id));
      }
    } catch (error) {
      console.error('[Commands] Failed to untag expense:', expense.id, errorMessage(error));
      return send(messages.error.tagFailed);
    }

    console.log('[Commands] Tag removed:', expense.id, name);
    return send(messages.success.tagRemoved(name, expense.id));
  }

  /**
   * Without arguments, the user's tags; with "#name", the expenses carrying it.
   */
  async listTags(userId: number, args: string): Promise<OutgoingMessage[]> {
    if (!args) {
      try {
        const tags = await this.deps.tags.getUserTags(userId);
        return send(messages.info.tagList(tags.map((tag) => tag.name)));
      } catch (error) {
        console.error('[Commands] Failed to fetch tags:', errorMessage(error));
        return send(messages.error.tagsUnavailable);
      }
    }

    const name = args.replace(/^#/, '').toLowerCase();
    if (!isValidTagName(name)) {
      return send(messages.error.invalidTagName(name));
    }

    let tag: Tag | null;
    try {
      tag = await this.deps.tags.getByName(name);
    } catch (error) {
      console.error('[Commands] Failed to fetch tag:', errorMessage(error));
      return send(messages.error.tagsUnavailable);
    }
    if (!tag) {
      return send(messages.error.tagNotFound(name));
    }

    const tagId = tag.id;
    return this.list(listHeaders.tagged(tag.name), () => this.deps.expenses.listByTag(userId, tagId, TAG_LIST_LIMIT));
  }

  private async list(
    header: string | ((totals: string) => string),
    load: () => Promise<Expense[]>,
  ): Promise<OutgoingMessage[]> {
    let expenses: Expense[];
    try {
      expenses = await load();
    } catch (error) {
      console.error('[Commands] Failed to fetch expenses:', errorMessage(error));
      return send(messages.error.listFailed);
    }

    const title = typeof header === 'string' ? header : header(formatTotals(expenses));
    const rows = await this.toListed(expenses);
    console.debug('[Commands] Listing', rows.length, 'expenses');
    return send(messages.info.expenseList(title, rows));
  }

  private async toListed(expenses: Expense[]): Promise<ListedExpense[]> {
    if (expenses.length === 0) {
      return [];
    }

    let categories: Category[] = [];
    try {
      categories = await this.deps.categories.getAll();
    } catch (error) {
      console.warn('[Commands] Could not load categories for listing:', errorMessage(error));
    }
    const names = new Map(categories.map((c) => [c.id, c.name]));

    const rows: ListedExpense[] = [];
    for (const expense of expenses) {
      rows.push({
        id: expense.id,
        amount: expense.amount,
        currency: expense.currency,
        label: expense.merchant || expense.description,
        categoryName: expense.categoryId === null ? null : (names.get(expense.categoryId) ?? null),
        tags: await this.tagNames(expense.id),
        createdAt: expense.createdAt,
      });
    }
    return rows;
  }

  private async tagNames(expenseId: number): Promise<string[]> {
    try {
      return (await this.deps.tags.getExpenseTags(expenseId)).map((tag) => tag.name);
    } catch (error) {
      console.warn('[Commands] Could not load tags:', expenseId, errorMessage(error));
      return [];
    }
  }

  // Someone else's expense reads as missing
  private async loadOwned(idText: string, userId: number, usage: string): Promise<OwnedLookup> {
    const id = validateInput(ExpenseIdSchema, idText);
    if (!id.valid) {
      return { reply: send(messages.error.invalidExpenseId(usage)) };
    }

    let expense: Expense | null;
    try {
      expense = await this.deps.expenses.getById(id.data);
    } catch (error) {
      console.error('[Commands] Failed to load expense:', id.data, errorMessage(error));
      return { reply: send(messages.error.loadFailed) };
    }

    if (!expense || expense.userId !== userId) {
      if (expense) {
        console.warn('[Commands] User mismatch on expense', id.data);
      }
      return { reply: send(messages.error.expenseNumberNotFound(id.data)) };
    }
    return { expense };
  }
}
