/**
 * Goal predicates for the purchase task.
 *
 * "Bought it" means one thing only: the latest step is a checkout that went
 * through and actually purchased something.
 */

import { afterSuccessfulAction } from '../../patterns/05-explicit-termination.js';
import type { GoalPredicate } from '../../patterns/types.js';
import { checkoutReceiptSchema } from '../tools/data.js';

export const purchaseCompleted: GoalPredicate = afterSuccessfulAction(
  'checkout_basket',
  (payload) => {
    const receipt = checkoutReceiptSchema.safeParse(payload);
    return receipt.success && receipt.data.purchased.length > 0;
  }
);
