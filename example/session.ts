/**
 * Task Session
 *
 * One task, start to finish: a fresh store built from the seed, a dispatcher
 * over it, and an executor driving the proposer. The session is the unit of
 * ownership; nothing outside it mutates its store unless a store is passed in
 * explicitly to be shared.
 */

import { PlanningExecutor, type ExecutorState, type SessionOutcome } from '../patterns/01-the-loop.js';
import type { EventStore } from '../patterns/08-event-sourced-state.js';
import type { ActionProposer, GoalPredicate, Step } from '../patterns/types.js';
import { purchaseCompleted } from './planner/goal.js';
import { loadCatalogSeed, type CatalogSeed } from './tools/data.js';
import { ToolDispatcher } from './tools/dispatcher.js';
import { ResourceStore, type ResourceStoreOptions } from './tools/resource-store.js';

export interface TaskSessionOptions {
  proposer: ActionProposer;

  /** Defaults to the bundled catalog.json. Ignored when `store` is given. */
  seed?: CatalogSeed;

  /** Share an existing store instead of building one from the seed. */
  store?: ResourceStore;
  storeOptions?: ResourceStoreOptions;

  /** Default: 20 */
  stepBudget?: number;

  /** Default: purchaseCompleted */
  goalPredicate?: GoalPredicate;

  verbose?: boolean;
  logger?: (message: string) => void;
  eventStore?: EventStore;
  onStep?: (step: Step) => void;
  onTransition?: (from: ExecutorState, to: ExecutorState) => void;
}

export class TaskSession {
  readonly store: ResourceStore;
  readonly dispatcher: ToolDispatcher;
  private readonly executor: PlanningExecutor;

  constructor(options: TaskSessionOptions) {
    this.store =
      options.store ?? new ResourceStore(options.seed ?? loadCatalogSeed(), options.storeOptions);
    this.dispatcher = new ToolDispatcher(this.store);
    this.executor = new PlanningExecutor({
      proposer: options.proposer,
      dispatcher: this.dispatcher,
      stepBudget: options.stepBudget,
      goalPredicate: options.goalPredicate ?? purchaseCompleted,
      verbose: options.verbose,
      logger: options.logger,
      eventStore: options.eventStore,
      onStep: options.onStep,
      onTransition: options.onTransition,
    });
  }

  get state(): ExecutorState {
    return this.executor.state;
  }

  get steps(): readonly Step[] {
    return this.executor.steps;
  }

  get goalAchieved(): boolean {
    return this.executor.goalAchieved;
  }

  get stepBudget(): number {
    return this.executor.stepBudget;
  }

  run(goal: string): Promise<SessionOutcome> {
    return this.executor.run(goal);
  }
}
