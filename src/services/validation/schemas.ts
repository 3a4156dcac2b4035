import { z } from 'zod';
import { MAX_CATEGORY_NAME_LENGTH } from '../../config/constants';
import { isSupportedCurrency } from '../../config/currencies';
import { exceedsMaxAmount, parseAmount, parseExpenseInput, stripCurrencySymbol } from '../expense/parser';
import { messages } from '../feedback/messages';

/**
 * New amount typed during an edit: "25.50", "$25.50", "S$ 25". A message
 * that starts with an amount ("5.50 Coffee") contributes just that amount.
 */
export const EditAmountSchema = z.string().transform((val, ctx) => {
  const amount = parseAmount(stripCurrencySymbol(val)) ?? parseExpenseInput(val)?.amount ?? null;
  if (amount === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Invalid amount. Please enter a valid number (e.g., 25.50).',
    });
    return z.NEVER;
  }
  if (exceedsMaxAmount(amount)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: messages.error.amountTooLargeReason });
    return z.NEVER;
  }
  return amount;
});

export const MerchantSchema = z
  .string()
  .transform((val) => val.trim())
  .pipe(z.string().min(1, 'Merchant cannot be empty.'));

/**
 * Category name typed on the create-new path
 */
export const CategoryNameSchema = z
  .string()
  .transform((val) => val.trim())
  .pipe(
    z
      .string()
      .min(1, 'Category name cannot be empty.')
      .refine(
        (val) => [...val].length <= MAX_CATEGORY_NAME_LENGTH,
        `Category name is too long (max ${MAX_CATEGORY_NAME_LENGTH} characters).`,
      )
      .refine((val) => !/\p{Cc}/u.test(val), 'Category name contains invalid characters.'),
  );

/**
 * Expense id typed after /delete, /tag or /untag
 */
export const ExpenseIdSchema = z
  .string()
  .trim()
  .regex(/^\d{1,12}$/, 'Invalid expense ID.')
  .transform((val) => Number(val))
  .refine((val) => val > 0, 'Invalid expense ID.');

export const CurrencyCodeSchema = z
  .string()
  .transform((val) => val.trim().toUpperCase())
  .refine(isSupportedCurrency, 'Unknown currency.');

/**
 * Validate and parse user input safely
 */
export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, string>,
  input: string,
): { valid: true; data: T } | { valid: false; error: string } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { valid: true, data: result.data };
  }
  return { valid: false, error: result.error.errors[0]?.message || 'Invalid input' };
}
