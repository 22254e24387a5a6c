import { createMenuCatalog } from '../../src/services/menuCatalog';
import { MenuItem, MenuItemKind } from '../../src/types/menu';
import { FormatOptions } from '../../src/utils/formatters';

export const sandwich: MenuItem = { kind: MenuItemKind.FOOD, id: 1, name: 'Chuna Sandwich', price: 3.5 };
export const latte: MenuItem = { kind: MenuItemKind.DRINK, id: 2, name: 'Latte', price: 2.8, size: 'Medium' };
export const scone: MenuItem = { kind: MenuItemKind.FOOD, id: 3, name: 'Scone', price: 3 };

export const formatOptions: FormatOptions = { cafeName: 'Cafe', currencySymbol: '£' };

export function buildCatalog() {
  return createMenuCatalog([
    { type: 'food', id: 1, name: 'Chuna Sandwich', price: 3.5 },
    { type: 'drink', id: 2, name: 'Latte', price: 2.8, size: 'Medium' }
  ]);
}

export const MENU_LINES = [
  '===== Cafe Menu =====',
  '1. Chuna Sandwich (£3.50) - Food',
  '2. Latte (£2.80) - Drink [Medium]',
  '====================='
];
