import type { Category } from '../../types/expense';
import type { OutgoingMessage } from '../../types/edit';
import type { CategoryStore } from '../../types/stores';
import { messages } from '../feedback/messages';
import { CategoryNameSchema, validateInput } from '../validation/schemas';
import { errorMessage } from '../../utils/errors';
import { sortCategoriesById } from './matcher';

const RENAME_USAGE = '/renamecategory Old Name -> New Name';
const DELETE_USAGE = '/deletecategory Food - Dining Out';

function send(text: string): OutgoingMessage[] {
  return [{ kind: 'send', text }];
}

/**
 * /categories, /addcategory, /renamecategory and /deletecategory. Names are
 * matched case-insensitively.
 */
export class CategoryAdminService {
  constructor(private readonly categories: CategoryStore) {}

  async list(): Promise<OutgoingMessage[]> {
    try {
      const categories = sortCategoriesById(await this.categories.getAll());
      return send(messages.info.categoryList(categories.map((c) => c.name)));
    } catch (error) {
      console.error('[Categories] Failed to list categories:', errorMessage(error));
      return send(messages.error.categoriesUnavailable);
    }
  }

  async add(args: string): Promise<OutgoingMessage[]> {
    if (!args) {
      return send(messages.info.addCategoryUsage);
    }
    const result = validateInput(CategoryNameSchema, args);
    if (!result.valid) {
      return send(messages.error.validation(result.error));
    }

    try {
      const existing = await this.findByName(result.data);
      if (existing) {
        return send(messages.error.categoryExists(existing.name));
      }
      const category = await this.categories.create(result.data);
      console.log('[Categories] Category created:', category.id, category.name);
      return send(messages.success.categoryAdded(category.name));
    } catch (error) {
      console.error('[Categories] Failed to create category:', errorMessage(error));
      return send(messages.error.categoryCreateFailed);
    }
  }

  /**
   * "Old Name -> New Name". A case-only rename of the same category is allowed.
   */
  async rename(args: string): Promise<OutgoingMessage[]> {
    const arrow = args.indexOf('->');
    if (arrow === -1) {
      return send(messages.error.usage(RENAME_USAGE));
    }
    const oldName = args.slice(0, arrow).trim();
    const newInput = args.slice(arrow + 2);
    if (!oldName || !newInput.trim()) {
      return send(messages.error.usage(RENAME_USAGE));
    }

    const result = validateInput(CategoryNameSchema, newInput);
    if (!result.valid) {
      return send(messages.error.validation(result.error));
    }
    const newName = result.data;

    try {
      const category = await this.findByName(oldName);
      if (!category) {
        return send(messages.error.categoryNotFound(oldName));
      }
      const clash = await this.findByName(newName);
      if (clash && clash.id !== category.id) {
        return send(messages.error.categoryExists(clash.name));
      }

      await this.categories.rename(category.id, newName);
      console.log('[Categories] Category renamed:', category.id, category.name, '->', newName);
      return send(messages.success.categoryRenamed(category.name, newName));
    } catch (error) {
      console.error('[Categories] Failed to rename category:', errorMessage(error));
      return send(messages.error.categoryRenameFailed);
    }
  }

  async remove(args: string): Promise<OutgoingMessage[]> {
    if (!args) {
      return send(messages.error.usage(DELETE_USAGE));
    }

    try {
      const category = await this.findByName(args);
      if (!category) {
        return send(messages.error.categoryNotFound(args));
      }
      const affected = await this.categories.delete(category.id);
      console.log('[Categories] Category deleted:', category.id, category.name, 'uncategorized:', affected);
      return send(messages.success.categoryDeleted(category.name, affected));
    } catch (error) {
      console.error('[Categories] Failed to delete category:', errorMessage(error));
      return send(messages.error.categoryDeleteFailed);
    }
  }

  private async findByName(name: string): Promise<Category | null> {
    const wanted = name.trim().toLowerCase();
    return (await this.categories.getAll()).find((c) => c.name.toLowerCase() === wanted) ?? null;
  }
}
