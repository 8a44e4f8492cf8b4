/**
 * Pattern 1.1: The Loop
 *
 * The fundamental agent architecture. Every agent is a feedback loop:
 * observe → act → adjust → repeat.
 *
 * Here the loop is a small state machine:
 *
 *   planning → executing → observing → (planning | done | aborted)
 *
 * The executor is a dumb, auditable driver. It never retries a rejected
 * action and never interprets an error; a rejection is recorded exactly like
 * a success and the proposer decides what to do about it. The executor only
 * bounds the number of steps, records history in order, and detects the
 * terminal condition.
 */

import type {
  Action,
  ActionProposer,
  Dispatcher,
  GoalPredicate,
  Step,
  ToolEnvelope,
} from './types.js';
import { SessionClosedError, never } from './05-explicit-termination.js';
import type { EventStore } from './08-event-sourced-state.js';

// =============================================================================
// STATES & OUTCOME
// =============================================================================

export type ExecutorState = 'idle' | 'planning' | 'executing' | 'observing' | 'done' | 'aborted';

export type TerminationReason = 'proposer_signalled' | 'goal_predicate' | 'budget_exhausted';

export interface SessionOutcome {
  status: 'done' | 'aborted';
  goalAchieved: boolean;
  reason: TerminationReason;
  /** The complete, ordered step history. */
  steps: readonly Step[];
  stepsUsed: number;
  stepBudget: number;
  /** The proposer's closing remark when it signalled completion. */
  finalRationale?: string;
}

// =============================================================================
// EXECUTOR OPTIONS
// =============================================================================

/**
 * Configuration options for the planning loop.
 */
export interface PlanningExecutorOptions {
  proposer: ActionProposer;
  dispatcher: Dispatcher;

  /**
   * Maximum number of steps before forced termination.
   * Default: 20
   */
  stepBudget?: number;

  /**
   * Checked after every recorded step. Defaults to `never`, leaving
   * termination to the proposer and the budget.
   */
  goalPredicate?: GoalPredicate;

  /**
   * Enable verbose logging of loop activity.
   * Default: false
   */
  verbose?: boolean;

  /**
   * Custom logging function. Defaults to console.log.
   */
  logger?: (message: string) => void;

  /**
   * Event store for the audit trail (Pattern 4.2).
   */
  eventStore?: EventStore;

  /** Called once per recorded step, in order. */
  onStep?: (step: Step) => void;

  onTransition?: (from: ExecutorState, to: ExecutorState) => void;
}

const DEFAULT_STEP_BUDGET = 20;

function describeResult(envelope: ToolEnvelope): string {
  if (envelope.success) {
    const text = JSON.stringify(envelope.payload) ?? '';
    return `200 ${text.length > 100 ? text.substring(0, 100) + '...' : text}`;
  }
  return `${envelope.statusCode} ${envelope.error.code}: ${envelope.error.message}`;
}

/**
 * A frozen deep copy. Recorded steps are shared with the proposer on every
 * call, so nothing reachable from them may be writable.
 */
function snapshot<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

// =============================================================================
// THE LOOP
// =============================================================================

export class PlanningExecutor {
  private readonly proposer: ActionProposer;
  private readonly dispatcher: Dispatcher;
  private readonly goalPredicate: GoalPredicate;
  private readonly options: PlanningExecutorOptions;
  readonly stepBudget: number;

  private readonly history: Step[] = [];
  private current: ExecutorState = 'idle';

  constructor(options: PlanningExecutorOptions) {
    const stepBudget = options.stepBudget ?? DEFAULT_STEP_BUDGET;
    if (!Number.isInteger(stepBudget) || stepBudget < 0) {
      throw new RangeError(`stepBudget must be a non-negative integer, got ${stepBudget}`);
    }

    this.options = options;
    this.proposer = options.proposer;
    this.dispatcher = options.dispatcher;
    this.goalPredicate = options.goalPredicate ?? never;
    this.stepBudget = stepBudget;
  }

  get state(): ExecutorState {
    return this.current;
  }

  /** A copy of the steps recorded so far. */
  get steps(): readonly Step[] {
    return [...this.history];
  }

  get goalAchieved(): boolean {
    return this.current === 'done';
  }

  /**
   * Run the loop to a terminal state. An executor runs once.
   *
   * Budget exhaustion is an outcome, not an error. The only exception that
   * escapes is one thrown by the proposer (or an unexpected one from the
   * dispatcher), and it is recorded before it is re-thrown.
   */
  async run(goal: string): Promise<SessionOutcome> {
    if (this.current !== 'idle') {
      throw new SessionClosedError(this.current);
    }

    const { verbose = false, logger = console.log, eventStore, onStep } = this.options;
    const log = (msg: string) => verbose && logger(msg);
    const startTime = Date.now();

    await eventStore?.append({
      type: 'session_started',
      task: goal,
      actions: this.dispatcher.actionNames(),
      stepBudget: this.stepBudget,
    });

    log(`Starting session with goal: ${goal}`);

    try {
      while (this.history.length < this.stepBudget) {
        const number = this.history.length + 1;
        log(`--- Step ${number} ---`);

        // 1. PLAN: ask for the next action
        await this.transition('planning');
        const proposal = await this.proposer.propose(goal, this.steps);

        if (proposal.kind === 'goal_achieved') {
          log(`Proposer signalled goal achieved: ${proposal.rationale}`);
          return await this.finish('done', 'proposer_signalled', startTime, proposal.rationale);
        }

        const action: Action = Object.freeze({
          name: proposal.actionName,
          parameters: snapshot(proposal.parameters),
        });

        await eventStore?.append({
          type: 'action_proposed',
          step: number,
          action: action.name,
          parameters: { ...action.parameters },
          rationale: proposal.rationale,
        });

        // 2. EXECUTE: rejections come back as envelopes, never as exceptions
        await this.transition('executing');
        log(`  → ${action.name}(${JSON.stringify(action.parameters)})`);
        const actionStartTime = Date.now();
        const observation = await this.dispatcher.dispatch(action);

        // 3. OBSERVE: record the step exactly as it happened
        await this.transition('observing');
        const step: Step = Object.freeze({
          number,
          action,
          observation: snapshot(observation),
          rationale: proposal.rationale,
        });
        this.history.push(step);

        await eventStore?.append({
          type: 'action_observed',
          step: number,
          action: action.name,
          success: observation.success,
          statusCode: observation.statusCode,
          errorCode: observation.success ? undefined : observation.error.code,
          durationMs: Date.now() - actionStartTime,
        });

        log(`  ${observation.success ? '←' : '✗'} ${describeResult(observation)}`);
        onStep?.(step);

        if (this.goalPredicate(this.steps)) {
          log('Goal predicate satisfied.');
          return await this.finish('done', 'goal_predicate', startTime);
        }
      }
    } catch (error) {
      await eventStore?.append({
        type: 'error_occurred',
        error: error instanceof Error ? error.message : String(error),
        recoverable: false,
        context: { state: this.current, stepsRecorded: this.history.length },
      });
      throw error;
    }

    log(`Step budget (${this.stepBudget}) exhausted without reaching the goal.`);
    return this.finish('aborted', 'budget_exhausted', startTime);
  }

  private async transition(to: ExecutorState): Promise<void> {
    const from = this.current;
    this.current = to;
    this.options.onTransition?.(from, to);
    await this.options.eventStore?.append({
      type: 'state_changed',
      key: 'executor',
      oldValue: from,
      newValue: to,
    });
  }

  private async finish(
    status: 'done' | 'aborted',
    reason: TerminationReason,
    startTime: number,
    finalRationale?: string
  ): Promise<SessionOutcome> {
    await this.transition(status);
    await this.options.eventStore?.append({
      type: 'session_completed',
      status,
      reason,
      success: status === 'done',
      totalSteps: this.history.length,
      totalDurationMs: Date.now() - startTime,
    });

    return {
      status,
      goalAchieved: status === 'done',
      reason,
      steps: this.steps,
      stepsUsed: this.history.length,
      stepBudget: this.stepBudget,
      ...(finalRationale !== undefined ? { finalRationale } : {}),
    };
  }
}
