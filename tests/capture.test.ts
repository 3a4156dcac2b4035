import { describe, it, expect, beforeEach } from 'vitest';
import { ExpenseCaptureService } from '../src/services/expense/capture';
import { callbackData, FakeCategoryStore, FakeExpenseStore, FakeTagStore, FakeUserStore } from './helpers/fakes';

const USER = { id: 100, username: 'tester', firstName: 'Test' };

describe('Expense Capture', () => {
  let expenses: FakeExpenseStore;
  let categories: FakeCategoryStore;
  let tags: FakeTagStore;
  let users: FakeUserStore;
  let capture: ExpenseCaptureService;

  beforeEach(() => {
    expenses = new FakeExpenseStore();
    categories = new FakeCategoryStore(['Food - Dining Out', 'Food - Grocery', 'Transportation']);
    tags = new FakeTagStore();
    users = new FakeUserStore();
    capture = new ExpenseCaptureService({ expenses, categories, tags, users, defaultCurrency: 'SGD' });
  });

  it('should store a free-text expense and reply with its summary', async () => {
    const replies = await capture.captureFreeText(USER, '$10 Coffee');

    expect(expenses.expenses.get(1)).toMatchObject({
      userId: 100,
      amount: 1000n,
      currency: 'USD',
      description: 'Coffee',
      merchant: 'Coffee',
      categoryId: null,
    });
    expect(replies).toHaveLength(1);
    expect(replies?.[0].text).toBe('✅ Expense Added\n\n💰 $10.00 USD\n📝 Coffee\n📁 Uncategorized\n🆔 #1');
    expect(callbackData(replies?.[0].keyboard)).toEqual(['menu__1', 'delete__1']);
    expect(users.users.get(100)?.username).toBe('tester');
  });

  it('should fall back to the configured currency', async () => {
    await capture.captureFreeText(USER, '5.50 Coffee');
    expect(expenses.expenses.get(1)?.currency).toBe('SGD');
  });

  it('should prefer the user default currency', async () => {
    await users.setDefaultCurrency(100, 'EUR');
    await capture.captureFreeText(USER, '5.50 Coffee');
    expect(expenses.expenses.get(1)?.currency).toBe('EUR');
  });

  it('should resolve the category and attach tags', async () => {
    const replies = await capture.captureFreeText(USER, '12 Taxi transportation #work');

    expect(expenses.expenses.get(1)).toMatchObject({ description: 'Taxi', categoryId: 3 });
    expect((await tags.getExpenseTags(1)).map((tag) => tag.name)).toEqual(['work']);
    expect(replies?.[0].text).toBe('✅ Expense Added\n\n💰 S$12.00 SGD\n📝 Taxi\n📁 Transportation\n🏷️ work\n🆔 #1');
  });

  it('should ignore commands and text without an amount', async () => {
    expect(await capture.captureFreeText(USER, '/start')).toBeNull();
    expect(await capture.captureFreeText(USER, 'hello there')).toBeNull();
    expect(expenses.expenses.size).toBe(0);
  });

  it('should show usage for an unparseable /add', async () => {
    expect(await capture.captureCommand(USER, '/add')).toEqual([
      { kind: 'send', text: 'Invalid format. Use: /add 5.50 Coffee [category]' },
    ]);
  });

  it('should store /add expenses with a bracketed category', async () => {
    await capture.captureCommand(USER, '/add 5.50 Coffee [Food - Grocery]');
    expect(expenses.expenses.get(1)).toMatchObject({ amount: 550n, description: 'Coffee', categoryId: 2 });
  });

  it('should report storage failures', async () => {
    expenses.failOn.add('create');
    expect(await capture.captureFreeText(USER, '5.50 Coffee')).toEqual([
      { kind: 'send', text: '❌ Failed to save expense. Please try again.' },
    ]);
  });

  it('should reject an amount above the limit without saving', async () => {
    const replies = await capture.captureFreeText(USER, '99999999999999999999999 coffee');

    expect(replies).toEqual([{ kind: 'send', text: '❌ Amount is too large (max 999,999.99).' }]);
    expect(expenses.expenses.size).toBe(0);
  });

  it('should save uncategorized when categories cannot be loaded', async () => {
    categories.failing = true;
    await capture.captureFreeText(USER, '12 Taxi transportation');
    expect(expenses.expenses.get(1)).toMatchObject({ description: 'Taxi transportation', categoryId: null });
  });

  it('should keep the expense when tags fail', async () => {
    tags.failing = true;
    const replies = await capture.captureFreeText(USER, '8 Lunch #team');
    expect(expenses.expenses.size).toBe(1);
    expect(replies?.[0].text).toBe('✅ Expense Added\n\n💰 S$8.00 SGD\n📝 Lunch\n📁 Uncategorized\n🆔 #1');
  });
});
