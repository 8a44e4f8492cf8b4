/**
 * View Basket Tool
 */

import { z } from 'zod';
import type { BasketView } from './data.js';
import type { StoreTool } from './store-tool.js';

export const noInput = z.object({});

export const viewBasketTool: StoreTool<'view_basket', typeof noInput, BasketView> = {
  name: 'view_basket',
  description: 'Show the basket: sku, name, quantity and unit price per line, plus the total.',
  parameters: { type: 'object', properties: {}, required: [] },
  input: noInput,
  run: (store) => store.viewBasket(),
};
