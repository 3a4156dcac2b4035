import {
  CURRENCY_SYMBOL_TO_CODE,
  CURRENCY_SYMBOLS_BY_LENGTH,
  CURRENCY_WORD_TO_CODE,
  isSupportedCurrency,
} from '../../config/currencies';
import { MAX_AMOUNT, MAX_TAG_NAME_LENGTH } from '../../config/constants';
import type { ParsedExpense } from '../../types/expense';

const AMOUNT_REGEX = /^(\d+(?:[.,]\d{1,2})?)/;
const WHOLE_AMOUNT_REGEX = /^\d+(?:\.\d+)?$/;

const CURRENCY_PREFIX_REGEX = /^(HK\$|NZ\$|NT\$|S\$|A\$|RM|Rp|[$€£¥฿₱₫₩₹]|[A-Z]{3})\s*/;
const CURRENCY_SUFFIX_REGEX = /\s+([A-Z]{3})$/;

const TAG_TOKEN_REGEX = /^#([a-zA-Z][a-zA-Z0-9_]{0,29})$/;
const TAG_NAME_REGEX = /^[a-zA-Z][a-zA-Z0-9_]{0,29}$/;

const BRACKET_CATEGORY_REGEX = /\s*\[([^\]]+)\]\s*$/;
const COMMAND_PREFIX_REGEX = /^\/[A-Za-z0-9_]+(?:@[A-Za-z0-9_]+)?(?=\s|$)/;

/**
 * Parse a free-text expense such as "5.50 Coffee", "$10 Lunch #work" or
 * "SGD 25.50 Groceries". Returns null when the text has no positive amount.
 *
 * When `categoryNames` is given, a known category name found in the text is
 * moved from the description into `categoryName`.
 */
export function parseExpenseInput(text: string, categoryNames?: readonly string[]): ParsedExpense | null {
  const input = text.trim();
  if (!input) {
    return null;
  }

  const prefix = parseCurrencyPrefix(input);
  const amountPart = parseLeadingAmount(prefix.rest);
  if (!amountPart) {
    return null;
  }

  let { currency, rest } = parseTrailingSymbol(prefix.currency, amountPart.rest);
  ({ currency, rest } = parseImmediateCode(currency, rest));
  ({ currency, rest } = parseSuffixCode(currency, rest));

  const { tags, cleaned } = extractTags(rest);

  let categoryName = '';
  let remaining = cleaned;
  if (categoryNames && categoryNames.length > 0) {
    ({ categoryName, remaining } = extractCategoryHint(cleaned, categoryNames));
  }

  return {
    amount: amountPart.amount,
    currency,
    description: collapseWhitespace(remaining),
    categoryName,
    tags,
  };
}

/**
 * Parse a command such as "/add 5.50 Coffee" or "/add@mybot 5.50 Coffee".
 */
export function parseCommandExpense(text: string, categoryNames?: readonly string[]): ParsedExpense | null {
  const input = text.trim().replace(COMMAND_PREFIX_REGEX, '');
  return parseExpenseInput(input, categoryNames);
}

/**
 * Strip "/command" and an optional "@botname" suffix, returning the arguments.
 */
export function extractCommandArgs(text: string, command: string): string {
  let args = text.trim();
  if (args.startsWith(command)) {
    args = args.slice(command.length);
  }
  if (args.startsWith('@')) {
    const spaceIdx = args.search(/\s/);
    args = spaceIdx === -1 ? '' : args.slice(spaceIdx);
  }
  return args.trim();
}

/**
 * Pull "#tag" tokens out of the text. Tags are lowercased and deduplicated in
 * first-occurrence order; tokens that do not fit the tag grammar are kept.
 */
export function extractTags(text: string): { tags: string[]; cleaned: string } {
  if (!text.includes('#')) {
    return { tags: [], cleaned: text };
  }

  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const tags: string[] = [];
  const remaining: string[] = [];

  for (const word of words) {
    const match = TAG_TOKEN_REGEX.exec(word);
    if (!match) {
      remaining.push(word);
      continue;
    }
    const name = match[1].toLowerCase();
    if (!tags.includes(name)) {
      tags.push(name);
    }
  }

  if (tags.length === 0) {
    return { tags: [], cleaned: text };
  }

  return { tags, cleaned: remaining.join(' ') };
}

export function isValidTagName(name: string): boolean {
  return name.length <= MAX_TAG_NAME_LENGTH && TAG_NAME_REGEX.test(name);
}

/**
 * Parse a whole string as a positive amount ("25", "25.50", "25,50").
 * Extra decimals round half-up to minor units ("10.999" -> 1100n); a value
 * that rounds to zero is rejected. Returns minor units, or null.
 */
export function parseAmount(text: string): bigint | null {
  const normalized = text.trim().replace(',', '.');
  if (!WHOLE_AMOUNT_REGEX.test(normalized)) {
    return null;
  }
  const amount = roundToMinorUnits(normalized);
  return amount > 0n ? amount : null;
}

export function exceedsMaxAmount(amount: bigint): boolean {
  return amount > MAX_AMOUNT;
}

/**
 * Strip a leading currency symbol ("$25", "S$ 25") from user input.
 */
export function stripCurrencySymbol(text: string): string {
  const input = text.trim();
  for (const symbol of CURRENCY_SYMBOLS_BY_LENGTH) {
    if (input.startsWith(symbol)) {
      return input.slice(symbol.length).trim();
    }
  }
  return input;
}

function toMinorUnits(value: string): bigint {
  const [whole, fraction = ''] = value.replace(',', '.').split('.');
  return BigInt(whole) * 100n + BigInt(fraction.padEnd(2, '0'));
}

function roundToMinorUnits(value: string): bigint {
  const [whole, fraction = ''] = value.split('.');
  const cents = BigInt(whole) * 100n + BigInt(fraction.slice(0, 2).padEnd(2, '0'));
  return fraction.length > 2 && fraction[2] >= '5' ? cents + 1n : cents;
}

function parseCurrencyPrefix(input: string): { currency: string; rest: string } {
  const match = CURRENCY_PREFIX_REGEX.exec(input);
  if (!match) {
    return { currency: '', rest: input };
  }

  const token = match[1];
  let currency = '';
  if (token in CURRENCY_SYMBOL_TO_CODE) {
    currency = CURRENCY_SYMBOL_TO_CODE[token];
  } else if (isSupportedCurrency(token)) {
    currency = token;
  }

  if (!currency) {
    return { currency: '', rest: input };
  }
  return { currency, rest: input.slice(match[0].length).trim() };
}

function parseLeadingAmount(input: string): { amount: bigint; rest: string } | null {
  const match = AMOUNT_REGEX.exec(input);
  if (!match) {
    return null;
  }

  const rest = input.slice(match[1].length);
  if (!endsNumericToken(rest)) {
    return null;
  }

  const amount = toMinorUnits(match[1]);
  if (amount <= 0n) {
    return null;
  }
  return { amount, rest: rest.trim() };
}

// "25abc" and "10.999" are not amounts; "5€" and "5 Coffee" are
function endsNumericToken(rest: string): boolean {
  if (rest === '' || /^\s/.test(rest)) {
    return true;
  }
  if (CURRENCY_SYMBOLS_BY_LENGTH.some((symbol) => hasSymbolPrefix(rest, symbol))) {
    return true;
  }
  const code = /^([A-Za-z]{3})(?![A-Za-z0-9])/.exec(rest);
  return code !== null && isSupportedCurrency(code[1].toUpperCase());
}

function hasSymbolPrefix(text: string, symbol: string): boolean {
  if (!text.startsWith(symbol)) {
    return false;
  }
  // Letter symbols ("RM", "Rp") must not run into a word
  if (/[A-Za-z]$/.test(symbol)) {
    return !/^[A-Za-z0-9]/.test(text.slice(symbol.length));
  }
  return true;
}

function parseTrailingSymbol(currency: string, rest: string): { currency: string; rest: string } {
  if (currency || !rest) {
    return { currency, rest };
  }
  for (const symbol of CURRENCY_SYMBOLS_BY_LENGTH) {
    if (!hasSymbolPrefix(rest, symbol)) {
      continue;
    }
    // A bare trailing "$" is ambiguous: drop it and let the default apply
    const detected = symbol === '$' ? '' : CURRENCY_SYMBOL_TO_CODE[symbol];
    return { currency: detected, rest: rest.slice(symbol.length).trim() };
  }
  return { currency, rest };
}

function parseImmediateCode(currency: string, rest: string): { currency: string; rest: string } {
  const fields = rest.split(/\s+/).filter((field) => field.length > 0);
  if (fields.length === 0) {
    return { currency, rest };
  }

  const token = fields[0].replace(/^[.,;:]+|[.,;:]+$/g, '').toUpperCase();
  let code = '';
  if (isSupportedCurrency(token)) {
    code = token;
  } else if (token in CURRENCY_WORD_TO_CODE) {
    code = CURRENCY_WORD_TO_CODE[token];
  }

  if (!code || (currency && currency !== code)) {
    return { currency, rest };
  }

  const trimmed = rest.trim().slice(fields[0].length).trim().replace(/^-/, '').trim();
  return { currency: currency || code, rest: trimmed };
}

function parseSuffixCode(currency: string, rest: string): { currency: string; rest: string } {
  if (currency || !rest) {
    return { currency, rest };
  }
  const match = CURRENCY_SUFFIX_REGEX.exec(rest.toUpperCase());
  if (!match || !isSupportedCurrency(match[1])) {
    return { currency, rest };
  }
  return { currency: match[1], rest: rest.slice(0, rest.length - match[0].length).trim() };
}

function extractCategoryHint(
  text: string,
  categoryNames: readonly string[],
): { categoryName: string; remaining: string } {
  const bracket = BRACKET_CATEGORY_REGEX.exec(text);
  if (bracket) {
    const wanted = bracket[1].trim().toLowerCase();
    const known = categoryNames.find((name) => name.toLowerCase() === wanted);
    if (known) {
      return { categoryName: known, remaining: text.slice(0, bracket.index) };
    }
  }

  // Longest name wins so "Food - Dining Out" beats "Food"; ties keep list order
  let best: { name: string; index: number } | null = null;
  for (const name of categoryNames) {
    if (best && name.length <= best.name.length) {
      continue;
    }
    const index = findWord(text, name);
    if (index !== -1) {
      best = { name, index };
    }
  }

  if (!best) {
    return { categoryName: '', remaining: text };
  }
  return {
    categoryName: best.name,
    remaining: `${text.slice(0, best.index)} ${text.slice(best.index + best.name.length)}`,
  };
}

// Case-insensitive position of `needle` bounded by whitespace or the ends
function findWord(text: string, needle: string): number {
  const wanted = needle.trim().toLowerCase();
  if (!wanted || wanted.length !== needle.length) {
    return -1;
  }

  for (let i = 0; i + wanted.length <= text.length; i++) {
    if (text.slice(i, i + wanted.length).toLowerCase() !== wanted) {
      continue;
    }
    const before = i === 0 ? '' : text[i - 1];
    const after = text.slice(i + wanted.length, i + wanted.length + 1);
    if ((before === '' || /\s/.test(before)) && (after === '' || /\s/.test(after))) {
      return i;
    }
  }
  return -1;
}

function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter((word) => word.length > 0).join(' ');
}
