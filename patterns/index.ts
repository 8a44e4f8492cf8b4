/**
 * Planning Agent Patterns
 *
 * The store-agnostic half of the agent: the step loop, termination
 * predicates, parameter validation and the event-sourced audit trail.
 * Anything that knows about products or baskets lives under example/.
 */

// =============================================================================
// Shared Types
// =============================================================================
export type {
  Message,
  MessageRole,
  Tool,
  ToolCall,
  ToolParameters,
  LLMClient,
  LLMResponse,
  Action,
  ActionProposer,
  Proposal,
  Dispatcher,
  ErrorKind,
  ToolError,
  ToolEnvelope,
  SuccessEnvelope,
  FailureEnvelope,
  DomainFailureEnvelope,
  ContractFailureEnvelope,
  Step,
  GoalPredicate,
} from './types.js';

// =============================================================================
// Core Architecture
// =============================================================================
export { PlanningExecutor } from './01-the-loop.js';
export type {
  ExecutorState,
  PlanningExecutorOptions,
  SessionOutcome,
  TerminationReason,
} from './01-the-loop.js';

export {
  SessionClosedError,
  never,
  anyOf,
  afterSuccessfulAction,
} from './05-explicit-termination.js';

// =============================================================================
// Tool Patterns
// =============================================================================
export {
  validate,
  formatIssues,
  nonNegativeInteger,
  positiveInteger,
  identifier,
} from './06-tool-validation.js';
export type { ValidationResult } from './06-tool-validation.js';

// =============================================================================
// State Patterns
// =============================================================================
export { EventStore, deriveState } from './08-event-sourced-state.js';
export type {
  SessionEvent,
  SessionState,
  UnstampedEvent,
  SessionStartedEvent,
  ActionProposedEvent,
  ActionObservedEvent,
  StateChangedEvent,
  SessionCompletedEvent,
  ErrorOccurredEvent,
} from './08-event-sourced-state.js';
