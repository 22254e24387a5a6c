/**
 * Menu item variants
 */
export enum MenuItemKind {
  FOOD = 'food',
  DRINK = 'drink'
}

interface BaseMenuItem {
  readonly id: number;
  readonly name: string;
  readonly price: number;
}

export interface FoodItem extends BaseMenuItem {
  readonly kind: MenuItemKind.FOOD;
}

export interface DrinkItem extends BaseMenuItem {
  readonly kind: MenuItemKind.DRINK;
  readonly size: string;
}

export type MenuItem = FoodItem | DrinkItem;

/**
 * Raw menu record as supplied when seeding the catalog
 */
export interface MenuItemInput {
  type: string;
  id: number;
  name: string;
  price: number;
  size?: string;
}

export enum MenuItemErrorCode {
  INVALID_TYPE = 'INVALID_TYPE',
  INVALID_FIELDS = 'INVALID_FIELDS',
  MISSING_SIZE = 'MISSING_SIZE'
}

export type MenuItemResult =
  | { success: true; item: MenuItem }
  | { success: false; code: MenuItemErrorCode; error: string };

export function isDrink(item: MenuItem): item is DrinkItem {
  return item.kind === MenuItemKind.DRINK;
}
