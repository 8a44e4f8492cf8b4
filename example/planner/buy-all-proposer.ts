/**
 * Buy-All Proposer
 *
 * A rule engine for "buy every unit of <category> in stock". It keeps no
 * state: each proposal is derived from the step history alone, so it can be
 * dropped into any session at any point and pick up where things stand.
 *
 * Recovery rules:
 * - PAGE_LIMIT_EXCEEDED → re-list the same offset at the advertised maximum
 * - INSUFFICIENT_INVENTORY → remove the excess for that SKU, then check out again
 * - EMPTY_BASKET after removals → everything sold out; nothing left to do
 */

import { z } from 'zod';
import type { ActionProposer, Proposal, Step } from '../../patterns/types.js';
import { productPageSchema, type ListingEntry } from '../tools/data.js';

export interface BuyAllOptions {
  /** Product category to buy, e.g. "gpu". */
  category: string;

  /**
   * Page size to try first. If the store rejects it, the proposer adopts the
   * maximum the rejection reports.
   * Default: 3
   */
  initialPageSize?: number;
}

const pageLimitDetails = z.object({ maxLimit: z.number().int().positive() });

const shortfallDetails = z.object({
  sku: z.string(),
  available: z.number().int().nonnegative(),
  requested: z.number().int().positive(),
});

interface Discovery {
  listing: ListingEntry[];
  /** Where the next listing should start, or null once the catalog is complete. */
  nextOffset: number | null;
  pageSize: number;
}

function action(actionName: string, parameters: Record<string, unknown>, rationale: string): Proposal {
  return { kind: 'action', actionName, parameters, rationale };
}

function goalAchieved(rationale: string): Proposal {
  return { kind: 'goal_achieved', rationale };
}

export class BuyAllProposer implements ActionProposer {
  private readonly category: string;
  private readonly initialPageSize: number;

  constructor(options: BuyAllOptions) {
    this.category = options.category.toLowerCase();
    this.initialPageSize = options.initialPageSize ?? 3;
  }

  async propose(_goal: string, history: readonly Step[]): Promise<Proposal> {
    const reaction = this.reactToLastStep(history.at(-1));
    if (reaction) return reaction;

    // Catalog discovery: page until nextOffset is null
    const discovery = this.discover(history);
    if (discovery.nextOffset !== null) {
      return action(
        'list_products',
        { offset: discovery.nextOffset, limit: discovery.pageSize },
        discovery.nextOffset === 0
          ? 'List products to find every item in the catalog'
          : `List the next page of products starting at offset ${discovery.nextOffset}`
      );
    }

    const targets = discovery.listing.filter(
      (p) => p.category.toLowerCase() === this.category && p.available > 0
    );
    if (targets.length === 0) {
      return goalAchieved(`No ${this.category} products are in stock; nothing to buy`);
    }

    const added = new Set(
      history
        .filter((s) => s.action.name === 'add_to_basket' && s.observation.success)
        .map((s) => String(s.action.parameters.sku))
    );
    const pending = targets.find((p) => !added.has(p.sku));
    if (pending) {
      return action(
        'add_to_basket',
        { sku: pending.sku, amount: pending.available },
        `Add all ${pending.available} available ${pending.name} (${pending.sku}) to the basket`
      );
    }

    return action('checkout_basket', {}, `Check out every ${this.category} in the basket`);
  }

  private reactToLastStep(last: Step | undefined): Proposal | undefined {
    if (!last) return undefined;
    const { observation } = last;

    if (last.action.name === 'checkout_basket') {
      if (observation.success) {
        return goalAchieved(`Checkout succeeded; every ${this.category} in stock is purchased`);
      }
      if (observation.error.code === 'INSUFFICIENT_INVENTORY') {
        const shortfall = shortfallDetails.safeParse(observation.error.details);
        if (shortfall.success) {
          const { sku, available, requested } = shortfall.data;
          const excess = requested - available;
          return action(
            'remove_from_basket',
            { sku, amount: excess },
            `Only ${available} of ${sku} available but ${requested} in basket; remove ${excess}`
          );
        }
      }
      if (observation.error.code === 'EMPTY_BASKET') {
        return goalAchieved(`Every ${this.category} sold out before checkout; nothing left to buy`);
      }
    }

    if (last.action.name === 'remove_from_basket' && observation.success) {
      return action('checkout_basket', {}, 'Retry checkout with the adjusted basket');
    }

    return undefined;
  }

  private discover(history: readonly Step[]): Discovery {
    const listing = new Map<string, ListingEntry>();
    let pageSize = this.initialPageSize;
    let nextOffset: number | null = 0;

    for (const step of history) {
      if (step.action.name !== 'list_products') continue;
      const { observation } = step;

      if (observation.success) {
        const page = productPageSchema.safeParse(observation.payload);
        if (!page.success) continue;
        for (const product of page.data.products) listing.set(product.sku, product);
        nextOffset = page.data.nextOffset;
      } else if (observation.error.code === 'PAGE_LIMIT_EXCEEDED') {
        const limits = pageLimitDetails.safeParse(observation.error.details);
        pageSize = limits.success ? limits.data.maxLimit : 1;
        const offset = Number(step.action.parameters.offset ?? 0);
        nextOffset = Number.isInteger(offset) && offset >= 0 ? offset : 0;
      }
    }

    return { listing: [...listing.values()], nextOffset, pageSize };
  }
}
