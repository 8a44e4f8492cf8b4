/**
 * Mock LLM Client for Deterministic Runs
 *
 * Returns scripted tool calls, one reply per invocation, so the model-backed
 * proposer can be exercised without an API key. The scenarios mirror what a
 * capable model does against the default catalog.
 *
 * NOTE: Scenarios end with a `done` tool call. In practice the session often
 * ends before that reply is consumed, because the purchase predicate fires on
 * the successful checkout.
 */

import type { Message, Tool, LLMClient, LLMResponse } from '../../patterns/types.js';

export interface MockResponse {
  toolCalls?: Array<{ name: string; arguments: Record<string, unknown> }>;
  content?: string;
}

export type MockScenario = MockResponse[];

function call(name: string, args: Record<string, unknown> = {}, content = ''): MockResponse {
  return { content, toolCalls: [{ name, arguments: args }] };
}

/**
 * Pre-defined scenarios
 */
export const SCENARIOS = {
  /**
   * Buy all GPUs with a rival shopper in the way:
   * 1. Ask for too large a page, recover to the maximum of 3
   * 2. Page through the catalog
   * 3. Add both GPUs at their listed availability
   * 4. Checkout fails twice on shrunken inventory; trim the basket each time
   * 5. Checkout succeeds
   */
  gpuRace: [
    call('list_products', { offset: 0, limit: 5 }, 'List all products in one go'),
    call('list_products', { offset: 0, limit: 3 }, 'Page limit is 3; list the first page'),
    call('list_products', { offset: 3, limit: 3 }, 'List the second page'),
    call('list_products', { offset: 6, limit: 3 }, 'List the last page'),
    call('add_to_basket', { sku: 'gpu-h100', amount: 3 }, 'Add all H100s'),
    call('add_to_basket', { sku: 'gpu-a100', amount: '4' }, 'Add all A100s'),
    call('checkout_basket', {}, 'Buy the GPUs'),
    call('remove_from_basket', { sku: 'gpu-h100', amount: 2 }, 'Only 1 H100 left; trim the basket'),
    call('checkout_basket', {}, 'Retry checkout'),
    call('remove_from_basket', { sku: 'gpu-a100', amount: 1 }, 'Only 3 A100s left; trim the basket'),
    call('checkout_basket', {}, 'Retry checkout'),
    call('done', { reasoning: 'Bought every GPU that was left' }),
  ],

  /**
   * Buy all GPUs when nobody else is shopping.
   */
  quickBuy: [
    call('list_products', { offset: 0, limit: 3 }, 'List the first page'),
    call('list_products', { offset: 3, limit: 3 }, 'List the second page'),
    call('list_products', { offset: 6, limit: 3 }, 'List the last page'),
    call('add_to_basket', { sku: 'gpu-h100', amount: 3 }, 'Add all H100s'),
    call('add_to_basket', { sku: 'gpu-a100', amount: 4 }, 'Add all A100s'),
    call('checkout_basket', {}, 'Buy the GPUs'),
    call('done', { reasoning: 'Bought every GPU' }),
  ],
} satisfies Record<string, MockScenario>;

export type MockScenarioName = keyof typeof SCENARIOS;

export class MockLLMClient implements LLMClient {
  private readonly scenario: MockScenario;
  private step: number = 0;
  private readonly callLog: Array<{ messages: Message[]; response: LLMResponse }> = [];

  constructor(scenario: MockScenario = SCENARIOS.gpuRace) {
    this.scenario = scenario;
  }

  async invoke(messages: Message[], _tools: Tool[]): Promise<LLMResponse> {
    const mockResponse = this.scenario[this.step];

    if (mockResponse === undefined) {
      // Scenario exhausted - fall back to a done call
      const response: LLMResponse = {
        content: '',
        toolCalls: [
          {
            id: 'mock-fallback-done',
            name: 'done',
            arguments: { reasoning: 'Scenario exhausted' },
          },
        ],
        done: false,
      };
      this.callLog.push({ messages: [...messages], response });
      return response;
    }

    this.step++;

    const promptTokens = Math.round(
      messages.reduce((sum, m) => sum + m.content.length / 4, 0)
    );
    const response: LLMResponse = {
      content: mockResponse.content ?? '',
      toolCalls: (mockResponse.toolCalls ?? []).map((tc, i) => ({
        id: `mock-${this.step}-${i}`,
        name: tc.name,
        arguments: tc.arguments,
      })),
      done: false,
      usage: {
        prompt_tokens: promptTokens,
        completion_tokens: 100,
        total_tokens: promptTokens + 100,
      },
    };

    this.callLog.push({ messages: [...messages], response });
    return response;
  }

  /** Every invocation so far, with the messages it was given. */
  getCallLog(): ReadonlyArray<{ messages: Message[]; response: LLMResponse }> {
    return this.callLog;
  }
}

export function createMockClient(scenarioName: MockScenarioName = 'gpuRace'): MockLLMClient {
  return new MockLLMClient(SCENARIOS[scenarioName]);
}
