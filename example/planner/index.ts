/**
 * Proposers and goal predicates for the purchase task.
 */

export { BuyAllProposer } from './buy-all-proposer.js';
export type { BuyAllOptions } from './buy-all-proposer.js';
export { ScriptedProposer, act } from './scripted-proposer.js';
export { purchaseCompleted } from './goal.js';

import type { ActionProposer, Tool } from '../../patterns/types.js';
import type { AgentConfig } from '../config.js';
import { createClient } from '../llm/index.js';
import { LLMActionProposer } from '../llm/proposer.js';
import { BuyAllProposer } from './buy-all-proposer.js';

/**
 * Pick the proposer named by config. The rule-based proposer starts with an
 * oversized page, so the page-limit recovery shows up in the log.
 */
export function createProposer(
  config: AgentConfig,
  tools: Tool[],
  logger: (message: string) => void = console.log
): ActionProposer {
  if (config.proposer === 'rules') {
    logger('[Planner] Using rule-based proposer');
    return new BuyAllProposer({ category: 'gpu', initialPageSize: 5 });
  }
  return new LLMActionProposer({ llm: createClient(config, logger), tools });
}
