/**
 * LLM Client Module
 *
 * Exports both real (OpenRouter) and mock clients, and the proposer that
 * turns either into an ActionProposer.
 */

export {
  OpenRouterClient,
  createOpenRouterClient,
  parseToolArguments,
  DEFAULT_OPENROUTER_MODEL,
} from './openrouter-client.js';
export { MockLLMClient, createMockClient, SCENARIOS } from './mock-client.js';
export type { MockResponse, MockScenario, MockScenarioName } from './mock-client.js';
export {
  LLMActionProposer,
  ProposerError,
  historyToMessages,
  doneTool,
  PLANNING_PROMPT,
} from './proposer.js';
export type { LLMActionProposerOptions } from './proposer.js';

import type { LLMClient } from '../../patterns/types.js';
import type { AgentConfig } from '../config.js';
import { createOpenRouterClient } from './openrouter-client.js';
import { createMockClient } from './mock-client.js';

/**
 * Create an LLM client based on config
 *
 * - PROPOSER=openrouter: OpenRouter client (OPENROUTER_API_KEY is required)
 * - anything else: mock client playing MOCK_SCENARIO
 */
export function createClient(
  config: AgentConfig,
  logger: (message: string) => void = console.log
): LLMClient {
  if (config.proposer === 'openrouter' && config.openRouterApiKey) {
    logger(`[LLM] Using OpenRouter client (${config.openRouterModel ?? 'default model'})`);
    return createOpenRouterClient(config.openRouterApiKey, config.openRouterModel);
  }

  logger(`[LLM] Using mock client with scenario: ${config.mockScenario}`);
  return createMockClient(config.mockScenario);
}
