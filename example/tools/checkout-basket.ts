/**
 * Checkout Basket Tool
 *
 * Commits the basket against inventory. If any line asks for more than is
 * available, nothing is bought and the error names the first such product
 * with its available and requested counts.
 */

import type { CheckoutReceipt } from './data.js';
import { noInput } from './view-basket.js';
import type { StoreTool } from './store-tool.js';

export const checkoutBasketTool: StoreTool<'checkout_basket', typeof noInput, CheckoutReceipt> = {
  name: 'checkout_basket',
  description:
    'Purchase everything in the basket. Fails without buying anything if any product in the ' +
    'basket exceeds available inventory; on success the basket is emptied.',
  parameters: { type: 'object', properties: {}, required: [] },
  input: noInput,
  run: (store) => store.checkout(),
};
