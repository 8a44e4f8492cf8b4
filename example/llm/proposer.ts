/**
 * LLM Action Proposer
 *
 * Adapts any LLMClient to the ActionProposer capability. The step history is
 * replayed as a tool-calling conversation: each step becomes an assistant
 * tool call followed by a tool message carrying the result envelope as JSON.
 * The model's first tool call is the proposal; a call to `done` signals the
 * goal is achieved.
 *
 * The proposer never validates the call it gets back. Invalid names and
 * parameters go to the dispatcher, which rejects them as contract failures
 * the model can read and correct on its next turn.
 */

import type {
  ActionProposer,
  LLMClient,
  Message,
  Proposal,
  Step,
  Tool,
} from '../../patterns/types.js';

export const DONE_TOOL_NAME = 'done';

/**
 * Signals the goal is met. Never dispatched: the proposer turns it into a
 * goal_achieved proposal.
 */
export const doneTool: Tool = {
  name: DONE_TOOL_NAME,
  description:
    'Signal that the task is complete. Call this only after a checkout has succeeded, ' +
    'or when the task cannot be completed at all.',
  parameters: {
    type: 'object',
    properties: {
      reasoning: { type: 'string', description: 'Why the task is complete' },
    },
    required: ['reasoning'],
  },
};

export const PLANNING_PROMPT = `You are a Planning Agent that carries out e-commerce tasks one tool call at a time.

Process:
1. Read the task and every previous tool result
2. Decide the single next step that moves the task forward
3. Call exactly one tool; explain your reasoning in the message text

Rules:
- list_products pages are small; if a page size is rejected, use the maximum the error reports
- Keep listing while nextOffset is not null
- A checkout may fail with insufficient inventory; remove the excess from the basket and retry
- Status 422 means your call itself was malformed; fix the tool name or parameters
- Call done only after a successful checkout, or when the task is impossible`;

export class ProposerError extends Error {
  constructor(message: string, public readonly attempts: number) {
    super(message);
    this.name = 'ProposerError';
  }
}

export interface LLMActionProposerOptions {
  llm: LLMClient;
  /** Tools the model may call, usually ToolDispatcher.describeTools(). */
  tools: Tool[];
  systemPrompt?: string;
  /**
   * Replies allowed per proposal before giving up. Each reply without a tool
   * call is answered with a nudge.
   * Default: 2
   */
  maxAttempts?: number;
}

/**
 * Rebuild the conversation a model needs to see to choose the next step.
 */
export function historyToMessages(
  goal: string,
  history: readonly Step[],
  systemPrompt: string = PLANNING_PROMPT
): Message[] {
  const messages: Message[] = [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: `Task: ${goal}` },
  ];

  for (const step of history) {
    const id = `step-${step.number}`;
    messages.push({
      role: 'assistant',
      content: step.rationale,
      tool_calls: [{ id, name: step.action.name, arguments: { ...step.action.parameters } }],
    });
    messages.push({
      role: 'tool',
      content: JSON.stringify(step.observation),
      tool_call_id: id,
    });
  }

  return messages;
}

export class LLMActionProposer implements ActionProposer {
  private readonly llm: LLMClient;
  private readonly tools: Tool[];
  private readonly systemPrompt: string;
  private readonly maxAttempts: number;

  constructor(options: LLMActionProposerOptions) {
    this.llm = options.llm;
    this.tools = [...options.tools, doneTool];
    this.systemPrompt = options.systemPrompt ?? PLANNING_PROMPT;
    this.maxAttempts = options.maxAttempts ?? 2;
  }

  async propose(goal: string, history: readonly Step[]): Promise<Proposal> {
    const messages = historyToMessages(goal, history, this.systemPrompt);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const response = await this.llm.invoke(messages, this.tools);
      const [toolCall] = response.toolCalls;

      if (response.done) {
        return { kind: 'goal_achieved', rationale: response.result || response.content || 'Done' };
      }

      if (toolCall) {
        if (toolCall.name === DONE_TOOL_NAME) {
          const reasoning = toolCall.arguments.reasoning;
          return {
            kind: 'goal_achieved',
            rationale: typeof reasoning === 'string' && reasoning ? reasoning : response.content || 'Done',
          };
        }
        return {
          kind: 'action',
          actionName: toolCall.name,
          parameters: toolCall.arguments,
          rationale: response.content || `Calling ${toolCall.name}`,
        };
      }

      // Text but no tool call: keep the reply in context and ask again
      messages.push({ role: 'assistant', content: response.content });
      messages.push({
        role: 'user',
        content: 'Respond with exactly one tool call for the next step.',
      });
    }

    throw new ProposerError(
      `Model returned no tool call after ${this.maxAttempts} attempts`,
      this.maxAttempts
    );
  }
}
