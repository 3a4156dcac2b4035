import { EDIT_FIELDS, type EditAction, type EditField } from '../../types/edit';

/**
 * Callback tokens look like "<verb>_<arg>_<expenseId>": "edit_amount_12",
 * "cancel__12", "setcat_3_12". Anything else parses to null.
 */
export function parseEditAction(token: string): EditAction | null {
  const parts = token.split('_');
  if (parts.length < 3) {
    return null;
  }

  const [verb, arg, idPart] = parts;
  const expenseId = parseId(idPart);
  if (expenseId === null) {
    return null;
  }

  switch (verb) {
    case 'menu':
    case 'cancel':
    case 'done':
    case 'delete':
    case 'confirmdelete':
      return { verb, expenseId };
    case 'edit': {
      const field = parseEditField(arg);
      return field ? { verb, field, expenseId } : null;
    }
    case 'setcat': {
      const categoryId = parseId(arg);
      return categoryId === null ? null : { verb, categoryId, expenseId };
    }
    default:
      return null;
  }
}

export function buildActionToken(action: EditAction): string {
  switch (action.verb) {
    case 'edit':
      return `edit_${action.field}_${action.expenseId}`;
    case 'setcat':
      return `setcat_${action.categoryId}_${action.expenseId}`;
    default:
      return `${action.verb}__${action.expenseId}`;
  }
}

export function parseEditField(value: string): EditField | null {
  return EDIT_FIELDS.find((field) => field === value) ?? null;
}

function parseId(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
