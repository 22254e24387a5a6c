import { z } from 'zod';
import {
  MenuItemErrorCode,
  MenuItemInput,
  MenuItemKind,
  MenuItemResult
} from '../types/menu.js';

const menuItemFieldsSchema = z.object({
  id: z.number().int(),
  name: z.string().trim().min(1),
  price: z.number().finite().nonnegative(),
  size: z.string().trim().optional()
});

/**
 * Create a food or drink menu item from a raw record.
 * The type tag is matched case-insensitively; drinks must carry a size.
 */
export function createMenuItem(input: MenuItemInput): MenuItemResult {
  const type = input.type.trim().toLowerCase();

  if (type !== MenuItemKind.FOOD && type !== MenuItemKind.DRINK) {
    return {
      success: false,
      code: MenuItemErrorCode.INVALID_TYPE,
      error: `Invalid menu item type: ${input.type}`
    };
  }

  const fields = menuItemFieldsSchema.safeParse(input);
  if (!fields.success) {
    return {
      success: false,
      code: MenuItemErrorCode.INVALID_FIELDS,
      error: fields.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')
    };
  }

  const { id, name, price, size } = fields.data;

  if (type === MenuItemKind.FOOD) {
    return {
      success: true,
      item: { kind: MenuItemKind.FOOD, id, name, price }
    };
  }

  if (!size) {
    return {
      success: false,
      code: MenuItemErrorCode.MISSING_SIZE,
      error: `Drink '${name}' must have a size`
    };
  }

  return {
    success: true,
    item: { kind: MenuItemKind.DRINK, id, name, price, size }
  };
}
