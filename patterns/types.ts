/**
 * Shared Types
 *
 * Two seams live here:
 * - the language-model boundary (OpenAI-compatible messages, tools, clients)
 * - the planning boundary (proposals, result envelopes, steps)
 *
 * The planning loop only depends on the second group. The first group is
 * what a model-backed proposer speaks.
 */

// =============================================================================
// LANGUAGE-MODEL BOUNDARY (OpenAI-compatible)
// =============================================================================

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface Message {
  role: MessageRole;
  content: string;
  tool_calls?: ToolCall[];
  tool_call_id?: string;
}

/**
 * JSON Schema for a tool's arguments, as advertised to the model.
 */
export interface ToolParameters {
  type: 'object';
  properties: Record<
    string,
    {
      type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
      description?: string;
      enum?: string[];
      minimum?: number;
      maximum?: number;
      items?: { type: string };
    }
  >;
  required: string[];
}

/**
 * A tool the model may call. Execution happens elsewhere (the dispatcher),
 * so this is only the advertised shape.
 */
export interface Tool {
  name: string;
  description: string;
  parameters: ToolParameters;
}

export interface LLMResponse {
  content: string;
  toolCalls: ToolCall[];
  done: boolean;
  result?: string;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export interface LLMClient {
  invoke(messages: Message[], tools: Tool[]): Promise<LLMResponse>;
}

// =============================================================================
// PLANNING BOUNDARY
// =============================================================================

/**
 * An action as the executor sees it: a name and loosely-typed parameters.
 * Nothing about the parameters is trusted until the dispatcher coerces them.
 */
export interface Action {
  readonly name: string;
  readonly parameters: Readonly<Record<string, unknown>>;
}

export type Proposal =
  | {
      kind: 'action';
      actionName: string;
      parameters: Record<string, unknown>;
      rationale: string;
    }
  | {
      kind: 'goal_achieved';
      rationale: string;
    };

/**
 * Chooses the next action from the goal and everything that has happened.
 *
 * Implementations may be scripted, rule-based or model-driven, and may
 * propose invalid actions. The executor treats them as opaque.
 */
export interface ActionProposer {
  propose(goal: string, history: readonly Step[]): Promise<Proposal>;
}

export type ErrorKind = 'domain' | 'contract';

export interface ToolError<K extends ErrorKind = ErrorKind> {
  kind: K;
  code: string;
  message: string;
  details: Record<string, unknown>;
}

export interface SuccessEnvelope<T = unknown> {
  success: true;
  statusCode: 200;
  payload: T;
}

/** The action was valid but the store rejected it. */
export interface DomainFailureEnvelope {
  success: false;
  statusCode: 400;
  error: ToolError<'domain'>;
}

/** The action itself was malformed: unknown name or uncoercible parameters. */
export interface ContractFailureEnvelope {
  success: false;
  statusCode: 422;
  error: ToolError<'contract'>;
}

export type FailureEnvelope = DomainFailureEnvelope | ContractFailureEnvelope;

export type ToolEnvelope<T = unknown> = SuccessEnvelope<T> | FailureEnvelope;

export interface Dispatcher {
  dispatch(action: Action): ToolEnvelope | Promise<ToolEnvelope>;
  actionNames(): string[];
}

/**
 * One loop iteration. Frozen once recorded.
 */
export interface Step {
  readonly number: number;
  readonly action: Action;
  readonly observation: ToolEnvelope;
  readonly rationale: string;
}

export type GoalPredicate = (history: readonly Step[]) => boolean;
