export const DEFAULT_CATEGORIES = [
  'Food - Dining Out',
  'Food - Grocery',
  'Transportation',
  'Shopping',
  'Entertainment',
  'Health & Fitness',
  'Bills & Utilities',
  'Travel & Vacation',
  'Personal Care',
  'Gifts & Donations',
  'Other',
];

export const MAX_CATEGORY_NAME_LENGTH = 50;
export const MAX_TAG_NAME_LENGTH = 30;
export const MAX_TAGS_PER_COMMAND = 10;
/** Largest accepted amount in minor units: 999,999.99 */
export const MAX_AMOUNT = 99_999_999n;
export const LIST_LIMIT = 10;
export const TAG_LIST_LIMIT = 20;
export const DEFAULT_CURRENCY = 'SGD';
export const UNCATEGORIZED = 'Uncategorized';
