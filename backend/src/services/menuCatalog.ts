// SPDX-FileCopyrightText: 2024 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import fs from 'node:fs/promises';
import { z } from 'zod';
import { createMenuItem } from './menuItemFactory.js';
import { MenuItem, MenuItemInput } from '../types/menu.js';
import * as logger from '../utils/logger.js';

export class MenuDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MenuDataError';
  }
}

/**
 * Holds the purchasable items, in insertion order.
 * Duplicate ids are accepted; lookups return the first match.
 */
export class MenuCatalog {
  private items: MenuItem[] = [];

  add(item: MenuItem): void {
    this.items.push(item);
  }

  /**
   * Remove every item with the given id
   * @returns how many items were removed
   */
  remove(id: number): number {
    const before = this.items.length;
    this.items = this.items.filter((item) => item.id !== id);
    return before - this.items.length;
  }

  find(id: number): MenuItem | null {
    return this.items.find((item) => item.id === id) ?? null;
  }

  list(): readonly MenuItem[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }
}

/**
 * Seed a catalog from raw records
 * @throws {MenuDataError} naming the first record the factory rejects
 */
export function createMenuCatalog(inputs: readonly MenuItemInput[]): MenuCatalog {
  const catalog = new MenuCatalog();

  inputs.forEach((input, index) => {
    const result = createMenuItem(input);
    if (!result.success) {
      throw new MenuDataError(`Menu record ${index} (${input.name}): ${result.error}`);
    }
    catalog.add(result.item);
  });

  return catalog;
}

const menuFileSchema = z.object({
  cafe: z.string(),
  items: z.array(z.object({
    type: z.string(),
    id: z.number(),
    name: z.string(),
    price: z.number(),
    size: z.string().optional()
  }))
});

/**
 * Load the menu from a JSON data file
 */
export async function loadMenuCatalog(filePath: string): Promise<MenuCatalog> {
  let raw: unknown;
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    raw = JSON.parse(content);
  } catch (error) {
    logger.error('Failed to read menu data', {
      context: 'menuCatalog.loadMenuCatalog',
      data: { filePath },
      error
    });
    throw new MenuDataError(`Could not read menu data from ${filePath}`, { cause: error });
  }

  const parsed = menuFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MenuDataError(`Menu data in ${filePath} is malformed: ${parsed.error.issues[0]?.message}`);
  }

  const catalog = createMenuCatalog(parsed.data.items);

  logger.info('Menu loaded', {
    context: 'menuCatalog.loadMenuCatalog',
    data: { cafe: parsed.data.cafe, itemCount: catalog.size }
  });

  return catalog;
}
