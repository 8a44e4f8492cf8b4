/**
 * Add To Basket Tool
 *
 * Adds units of a product to the basket. Does not look at inventory:
 * over-committing is allowed here and caught at checkout.
 */

import { z } from 'zod';
import { identifier, positiveInteger } from '../../patterns/06-tool-validation.js';
import type { Acknowledgement } from './data.js';
import type { StoreTool } from './store-tool.js';

export const basketChangeInput = z.object({
  sku: identifier,
  amount: positiveInteger,
});

export type BasketChangeArgs = z.output<typeof basketChangeInput>;

export const addToBasketTool: StoreTool<'add_to_basket', typeof basketChangeInput, Acknowledgement> = {
  name: 'add_to_basket',
  description: 'Add a quantity of a product to the shopping basket.',
  parameters: {
    type: 'object',
    properties: {
      sku: { type: 'string', description: 'Product SKU to add' },
      amount: { type: 'integer', description: 'Number of units to add', minimum: 1 },
    },
    required: ['sku', 'amount'],
  },
  input: basketChangeInput,
  run: (store, { sku, amount }) => store.addToBasket(sku, amount),
};
