import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { DEFAULT_CATEGORIES } from '../src/config/constants';
import {
  closeDatabase,
  initializeDatabase,
  SqliteCategoryRepository,
  SqliteExpenseRepository,
  SqliteTagRepository,
  SqliteUserRepository,
} from '../src/services/database';

describe('SQLite repositories', () => {
  let db: Database.Database;
  let categories: SqliteCategoryRepository;
  let expenses: SqliteExpenseRepository;
  let tags: SqliteTagRepository;
  let users: SqliteUserRepository;

  beforeEach(async () => {
    db = initializeDatabase(':memory:');
    categories = new SqliteCategoryRepository(db);
    expenses = new SqliteExpenseRepository(db);
    tags = new SqliteTagRepository(db);
    users = new SqliteUserRepository(db);
    await users.ensure({ id: 100, username: 'tester' });
  });

  afterEach(() => {
    closeDatabase();
  });

  describe('categories', () => {
    it('should seed the defaults in order', async () => {
      const all = await categories.getAll();
      expect(all.map((c) => c.name)).toEqual(DEFAULT_CATEGORIES);
      expect(all[0].id).toBe(1);
    });

    it('should create and find categories', async () => {
      const created = await categories.create('Subscriptions');
      expect(await categories.getById(created.id)).toMatchObject({ id: created.id, name: 'Subscriptions' });
      expect(await categories.getById(999)).toBeNull();
    });

    it('should reject duplicate names in any case', async () => {
      await expect(categories.create('shopping')).rejects.toThrow();
    });

    it('should rename a category', async () => {
      await categories.rename(4, 'Retail');
      expect((await categories.getById(4))?.name).toBe('Retail');
      await expect(categories.rename(999, 'Nothing')).rejects.toThrow('Category 999 not found');
    });

    it('should uncategorize expenses when deleting a category', async () => {
      const base = { userId: 100, amount: 500n, currency: 'SGD', description: 'Bus', merchant: 'Bus' };
      const first = await expenses.create({ ...base, categoryId: 3 });
      const second = await expenses.create({ ...base, categoryId: 3 });
      const other = await expenses.create({ ...base, categoryId: 2 });

      expect(await categories.delete(3)).toBe(2);

      expect(await categories.getById(3)).toBeNull();
      expect((await expenses.getById(first.id))?.categoryId).toBeNull();
      expect((await expenses.getById(second.id))?.categoryId).toBeNull();
      expect((await expenses.getById(other.id))?.categoryId).toBe(2);
    });
  });

  describe('expense listings', () => {
    const base = { amount: 500n, currency: 'SGD', description: 'Bus', merchant: 'Bus', categoryId: null };

    async function createAt(createdAt: string, userId = 100): Promise<number> {
      const expense = await expenses.create({ ...base, userId });
      db.prepare('UPDATE expenses SET created_at = ? WHERE id = ?').run(createdAt, expense.id);
      return expense.id;
    }

    beforeEach(async () => {
      await users.ensure({ id: 200 });
    });

    it('should list a user\'s newest expenses first', async () => {
      const older = await createAt('2024-01-01T08:00:00.000Z');
      const newer = await createAt('2024-01-02T08:00:00.000Z');
      await createAt('2024-01-03T08:00:00.000Z', 200);

      expect((await expenses.listRecent(100, 10)).map((e) => e.id)).toEqual([newer, older]);
      expect((await expenses.listRecent(100, 1)).map((e) => e.id)).toEqual([newer]);
    });

    it('should list expenses inside a half-open range', async () => {
      await createAt('2024-01-01T23:59:59.999Z');
      const inside = await createAt('2024-01-02T00:00:00.000Z');
      await createAt('2024-01-03T00:00:00.000Z');

      const listed = await expenses.listInRange(100, {
        from: new Date('2024-01-02T00:00:00.000Z'),
        to: new Date('2024-01-03T00:00:00.000Z'),
      });
      expect(listed.map((e) => e.id)).toEqual([inside]);
      expect(listed[0].amount).toBe(500n);
    });

    it('should list a user\'s expenses carrying a tag', async () => {
      const tagged = await createAt('2024-01-01T08:00:00.000Z');
      await createAt('2024-01-02T08:00:00.000Z');
      const foreign = await createAt('2024-01-03T08:00:00.000Z', 200);
      const work = await tags.getOrCreate('work');
      await tags.addExpenseTags(tagged, [work.id]);
      await tags.addExpenseTags(foreign, [work.id]);

      expect((await expenses.listByTag(100, work.id, 20)).map((e) => e.id)).toEqual([tagged]);
    });
  });

  describe('expenses', () => {
    const input = {
      userId: 100,
      amount: 2550n,
      currency: 'SGD',
      description: 'Groceries',
      merchant: 'Groceries',
      categoryId: 2,
    };

    it('should store amounts exactly', async () => {
      const created = await expenses.create({ ...input, amount: 123456789012345n });
      const loaded = await expenses.getById(created.id);
      expect(loaded).toMatchObject({ ...input, amount: 123456789012345n });
      expect(typeof loaded?.id).toBe('number');
    });

    it('should keep a null category', async () => {
      const created = await expenses.create({ ...input, categoryId: null });
      expect((await expenses.getById(created.id))?.categoryId).toBeNull();
    });

    it('should update fields', async () => {
      const created = await expenses.create(input);
      await expenses.update({ ...created, amount: 990n, merchant: 'Market', description: 'Market', categoryId: 3 });

      expect(await expenses.getById(created.id)).toMatchObject({
        amount: 990n,
        merchant: 'Market',
        description: 'Market',
        categoryId: 3,
      });
    });

    it('should fail to update a missing expense', async () => {
      const created = await expenses.create(input);
      await expect(expenses.update({ ...created, id: 999 })).rejects.toThrow('Expense 999 not found');
    });

    it('should delete expenses and their tag links', async () => {
      const created = await expenses.create(input);
      const tag = await tags.getOrCreate('work');
      await tags.setExpenseTags(created.id, [tag.id]);

      await expenses.delete(created.id);

      expect(await expenses.getById(created.id)).toBeNull();
      expect(await tags.getExpenseTags(created.id)).toEqual([]);
    });

    it('should require a known user', async () => {
      await expect(expenses.create({ ...input, userId: 555 })).rejects.toThrow();
    });
  });

  describe('tags', () => {
    it('should reuse tags by lowercase name', async () => {
      const first = await tags.getOrCreate('Work');
      const second = await tags.getOrCreate('work');
      expect(first).toEqual({ id: second.id, name: 'work' });
    });

    it('should replace the tags of an expense', async () => {
      const expense = await expenses.create({
        userId: 100,
        amount: 500n,
        currency: 'SGD',
        description: 'Lunch',
        merchant: 'Lunch',
        categoryId: null,
      });
      const team = await tags.getOrCreate('team');
      const work = await tags.getOrCreate('work');
      const travel = await tags.getOrCreate('travel');

      await tags.setExpenseTags(expense.id, [work.id, team.id]);
      expect((await tags.getExpenseTags(expense.id)).map((t) => t.name)).toEqual(['team', 'work']);

      await tags.setExpenseTags(expense.id, [travel.id]);
      expect((await tags.getExpenseTags(expense.id)).map((t) => t.name)).toEqual(['travel']);
    });
  });

  describe('tag commands', () => {
    let expenseId: number;

    beforeEach(async () => {
      const expense = await expenses.create({
        userId: 100,
        amount: 800n,
        currency: 'SGD',
        description: 'Lunch',
        merchant: 'Lunch',
        categoryId: null,
      });
      expenseId = expense.id;
    });

    it('should add tags without dropping existing ones', async () => {
      const work = await tags.getOrCreate('work');
      const team = await tags.getOrCreate('team');
      await tags.setExpenseTags(expenseId, [work.id]);

      await tags.addExpenseTags(expenseId, [team.id, work.id]);

      expect((await tags.getExpenseTags(expenseId)).map((t) => t.name)).toEqual(['team', 'work']);
    });

    it('should remove a single tag', async () => {
      const work = await tags.getOrCreate('work');
      const team = await tags.getOrCreate('team');
      await tags.addExpenseTags(expenseId, [work.id, team.id]);

      expect(await tags.removeExpenseTag(expenseId, work.id)).toBe(true);
      expect(await tags.removeExpenseTag(expenseId, work.id)).toBe(false);
      expect((await tags.getExpenseTags(expenseId)).map((t) => t.name)).toEqual(['team']);
    });

    it('should find tags by name in any case', async () => {
      const work = await tags.getOrCreate('work');
      expect(await tags.getByName('WORK')).toEqual(work);
      expect(await tags.getByName('missing')).toBeNull();
    });

    it('should list only tags on the user\'s expenses', async () => {
      await users.ensure({ id: 200 });
      const foreign = await expenses.create({
        userId: 200,
        amount: 100n,
        currency: 'SGD',
        description: 'Tea',
        merchant: 'Tea',
        categoryId: null,
      });
      const work = await tags.getOrCreate('work');
      const travel = await tags.getOrCreate('travel');
      await tags.getOrCreate('unused');
      await tags.addExpenseTags(expenseId, [work.id, travel.id]);
      await tags.addExpenseTags(foreign.id, [work.id]);

      expect((await tags.getUserTags(100)).map((t) => t.name)).toEqual(['travel', 'work']);
      expect((await tags.getUserTags(200)).map((t) => t.name)).toEqual(['work']);
    });
  });

  describe('users', () => {
    it('should have no default currency until one is set', async () => {
      expect(await users.getDefaultCurrency(100)).toBeNull();
      await users.setDefaultCurrency(100, 'EUR');
      expect(await users.getDefaultCurrency(100)).toBe('EUR');
    });

    it('should keep the currency when the user is seen again', async () => {
      await users.setDefaultCurrency(100, 'EUR');
      await users.ensure({ id: 100, username: 'renamed' });
      expect(await users.getDefaultCurrency(100)).toBe('EUR');
    });

    it('should set a currency for a user not seen before', async () => {
      await users.setDefaultCurrency(300, 'JPY');
      expect(await users.getDefaultCurrency(300)).toBe('JPY');
    });
  });
});
