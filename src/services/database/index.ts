export { initializeDatabase, closeDatabase } from './db';
export { SqliteCategoryRepository } from './category-repository';
export { SqliteExpenseRepository } from './expense-repository';
export { SqliteTagRepository } from './tag-repository';
export { SqliteUserRepository } from './user-repository';
