/**
 * Remove From Basket Tool
 *
 * Removes up to `amount` units; removing at least what is held drops the
 * line entirely.
 */

import type { Acknowledgement } from './data.js';
import { basketChangeInput } from './add-to-basket.js';
import type { StoreTool } from './store-tool.js';

export const removeFromBasketTool: StoreTool<
  'remove_from_basket',
  typeof basketChangeInput,
  Acknowledgement
> = {
  name: 'remove_from_basket',
  description:
    'Remove a quantity of a product from the basket. If the amount reaches zero or below, ' +
    'the product is removed from the basket.',
  parameters: {
    type: 'object',
    properties: {
      sku: { type: 'string', description: 'Product SKU to remove' },
      amount: { type: 'integer', description: 'Number of units to remove', minimum: 1 },
    },
    required: ['sku', 'amount'],
  },
  input: basketChangeInput,
  run: (store, { sku, amount }) => store.removeFromBasket(sku, amount),
};
