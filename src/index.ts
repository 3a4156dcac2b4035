import { env } from './config/env';
import {
  closeDatabase,
  initializeDatabase,
  SqliteCategoryRepository,
  SqliteExpenseRepository,
  SqliteTagRepository,
  SqliteUserRepository,
} from './services/database';
import { CategoryAdminService } from './services/category/admin';
import { EditFlowController } from './services/edit/flow';
import { ExpenseCaptureService } from './services/expense/capture';
import { ExpenseCommandService } from './services/expense/commands';
import { startHealthServer } from './services/health/server';
import { InMemoryPendingEditStore } from './services/state/pending-edits';
import { createBot, startBot } from './services/telegram';

async function main(): Promise<void> {
  try {
    console.log('Starting expense capture bot...');

    const db = initializeDatabase(env.DB_PATH);
    console.log('Database initialized');

    const expenses = new SqliteExpenseRepository(db);
    const categories = new SqliteCategoryRepository(db);
    const tags = new SqliteTagRepository(db);
    const users = new SqliteUserRepository(db);

    const pendingEdits = new InMemoryPendingEditStore();

    const bot = createBot({
      token: env.TELEGRAM_BOT_TOKEN,
      edits: new EditFlowController({ pendingEdits, expenses, categories, tags }),
      capture: new ExpenseCaptureService({ expenses, categories, tags, users, defaultCurrency: env.DEFAULT_CURRENCY }),
      commands: new ExpenseCommandService({ expenses, categories, tags, pendingEdits }),
      categoryAdmin: new CategoryAdminService(categories),
      users,
      defaultCurrency: env.DEFAULT_CURRENCY,
    });
    console.log('Bot initialized');

    const health = startHealthServer(env.HEALTH_PORT, pendingEdits);

    const shutdown = (): void => {
      console.log('\nShutting down...');
      health.close();
      bot
        .stop()
        .catch((error: unknown) => console.error('[Bot] Failed to stop:', error))
        .finally(() => {
          closeDatabase();
          process.exit(0);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await startBot(bot);
  } catch (error) {
    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
