import { describe, expect, it } from 'vitest';
import { PlanningExecutor, type ExecutorState } from '../patterns/01-the-loop.js';
import { SessionClosedError, afterSuccessfulAction } from '../patterns/05-explicit-termination.js';
import { EventStore } from '../patterns/08-event-sourced-state.js';
import type { ActionProposer, Proposal } from '../patterns/types.js';
import { ScriptedProposer, act } from '../example/planner/scripted-proposer.js';
import { ToolDispatcher } from '../example/tools/dispatcher.js';
import { ResourceStore } from '../example/tools/resource-store.js';
import { gpuSeed } from './fixtures.js';

function executorFor(script: Proposal[], options: { stepBudget?: number; eventStore?: EventStore } = {}) {
  const proposer = new ScriptedProposer(script);
  const store = new ResourceStore(gpuSeed());
  const transitions: ExecutorState[] = [];
  const executor = new PlanningExecutor({
    proposer,
    dispatcher: new ToolDispatcher(store),
    onTransition: (_from, to) => transitions.push(to),
    ...options,
  });
  return { executor, proposer, store, transitions };
}

describe('PlanningExecutor', () => {
  it('walks planning → executing → observing for each step', async () => {
    const { executor, transitions } = executorFor([act('view_basket')]);

    const outcome = await executor.run('look around');

    expect(transitions).toEqual(['planning', 'executing', 'observing', 'planning', 'done']);
    expect(outcome).toMatchObject({
      status: 'done',
      goalAchieved: true,
      reason: 'proposer_signalled',
      stepsUsed: 1,
      finalRationale: 'Script exhausted',
    });
    expect(executor.state).toBe('done');
  });

  it('records rejected actions without retrying them', async () => {
    const { executor, proposer } = executorFor([
      act('list_products', { offset: 0, limit: 5 }),
      act('buy_everything'),
      act('checkout_basket'),
    ]);

    const outcome = await executor.run('buy');

    expect(outcome.steps.map((s) => s.observation.statusCode)).toEqual([400, 422, 400]);
    expect(outcome.steps.map((s) => s.action.name)).toEqual(['list_products', 'buy_everything', 'checkout_basket']);
    expect(proposer.getCallLog().map((c) => c.historyLength)).toEqual([0, 1, 2, 3]);
  });

  it('numbers steps from 1 and keeps the rationale', async () => {
    const { executor } = executorFor([act('view_basket', {}, 'Peek'), act('view_basket', {}, 'Peek again')]);

    const outcome = await executor.run('peek');

    expect(outcome.steps.map((s) => [s.number, s.rationale])).toEqual([
      [1, 'Peek'],
      [2, 'Peek again'],
    ]);
  });

  it('aborts when the budget runs out', async () => {
    const { executor, transitions } = executorFor(
      [act('view_basket'), act('view_basket'), act('view_basket')],
      { stepBudget: 2 }
    );

    const outcome = await executor.run('loop');

    expect(outcome).toMatchObject({
      status: 'aborted',
      goalAchieved: false,
      reason: 'budget_exhausted',
      stepsUsed: 2,
      stepBudget: 2,
    });
    expect(outcome.finalRationale).toBeUndefined();
    expect(transitions.at(-1)).toBe('aborted');
  });

  it('aborts immediately with a zero budget', async () => {
    const { executor, proposer, transitions } = executorFor([act('view_basket')], { stepBudget: 0 });

    const outcome = await executor.run('nothing');

    expect(outcome).toMatchObject({ status: 'aborted', stepsUsed: 0 });
    expect(proposer.getCallLog()).toEqual([]);
    expect(transitions).toEqual(['aborted']);
  });

  it('rejects an invalid budget', () => {
    const proposer = new ScriptedProposer([]);
    const dispatcher = new ToolDispatcher(new ResourceStore(gpuSeed()));

    expect(() => new PlanningExecutor({ proposer, dispatcher, stepBudget: -1 })).toThrow(RangeError);
    expect(() => new PlanningExecutor({ proposer, dispatcher, stepBudget: 1.5 })).toThrow(RangeError);
  });

  it('stops as soon as the goal predicate holds', async () => {
    const proposer = new ScriptedProposer([
      act('add_to_basket', { sku: 'gpu-h100', amount: 1 }),
      act('checkout_basket'),
      act('view_basket'),
    ]);
    const executor = new PlanningExecutor({
      proposer,
      dispatcher: new ToolDispatcher(new ResourceStore(gpuSeed())),
      goalPredicate: afterSuccessfulAction('checkout_basket'),
    });

    const outcome = await executor.run('buy one');

    expect(outcome).toMatchObject({ status: 'done', reason: 'goal_predicate', stepsUsed: 2 });
    expect(proposer.getCallLog()).toHaveLength(2);
  });

  it('runs only once', async () => {
    const { executor } = executorFor([]);
    await executor.run('first');

    await expect(executor.run('second')).rejects.toThrow(SessionClosedError);
    await expect(executor.run('second')).rejects.toThrow('Session already terminated in state "done"');
  });

  it('hands out deeply frozen steps and a copy of the history', async () => {
    const { executor } = executorFor([act('list_products', { offset: 0, limit: 5 })]);
    await executor.run('peek');

    const [step] = executor.steps;
    expect(Object.isFrozen(step)).toBe(true);
    expect(Object.isFrozen(step.action.parameters)).toBe(true);
    expect(Object.isFrozen(step.observation)).toBe(true);
    expect(step.observation.success).toBe(false);
    if (!step.observation.success) {
      expect(Object.isFrozen(step.observation.error)).toBe(true);
      expect(Object.isFrozen(step.observation.error.details)).toBe(true);
    }
    expect(executor.steps).not.toBe(executor.steps);
  });

  it('keeps recorded steps out of reach of the proposer', async () => {
    const writes: boolean[] = [];
    const tampering: ActionProposer = {
      propose: async (_goal, history) => {
        const [first] = history;
        if (!first) return act('checkout_basket');
        writes.push(Reflect.set(first.observation, 'statusCode', 200));
        if (!first.observation.success) {
          writes.push(Reflect.set(first.observation.error.details, 'sku', 'gpu-h100'));
        }
        return { kind: 'goal_achieved', rationale: 'Rewrote history' };
      },
    };
    const executor = new PlanningExecutor({
      proposer: tampering,
      dispatcher: new ToolDispatcher(new ResourceStore(gpuSeed())),
    });

    const outcome = await executor.run('check out');

    expect(writes).toEqual([false, false]);
    expect(outcome.steps[0].observation).toEqual({
      success: false,
      statusCode: 400,
      error: { kind: 'domain', code: 'EMPTY_BASKET', message: 'basket is empty', details: {} },
    });
  });

  it('does not freeze objects the proposer still owns', async () => {
    const parameters = { sku: 'gpu-h100', amount: 1 };
    const { executor } = executorFor([act('add_to_basket', parameters)]);

    await executor.run('add one');

    expect(Object.isFrozen(parameters)).toBe(false);
  });

  it('records and re-throws a proposer failure', async () => {
    const failing: ActionProposer = {
      propose: async () => {
        throw new Error('model unavailable');
      },
    };
    const eventStore = new EventStore();
    const executor = new PlanningExecutor({
      proposer: failing,
      dispatcher: new ToolDispatcher(new ResourceStore(gpuSeed())),
      eventStore,
    });

    await expect(executor.run('anything')).rejects.toThrow('model unavailable');
    expect(eventStore.filter('error_occurred')).toMatchObject([
      { error: 'model unavailable', recoverable: false, context: { state: 'planning', stepsRecorded: 0 } },
    ]);
    expect(eventStore.getState().status).toBe('failed');
  });

  it('writes an audit trail to the event store', async () => {
    const eventStore = new EventStore();
    const { executor } = executorFor([act('checkout_basket')], { eventStore });

    await executor.run('check out');

    expect(eventStore.all().map((e) => e.type)).toEqual([
      'session_started',
      'state_changed',
      'action_proposed',
      'state_changed',
      'state_changed',
      'action_observed',
      'state_changed',
      'state_changed',
      'session_completed',
    ]);
    expect(eventStore.filter('action_observed')).toMatchObject([
      { step: 1, action: 'checkout_basket', success: false, statusCode: 400, errorCode: 'EMPTY_BASKET' },
    ]);
    expect(eventStore.getState()).toMatchObject({
      status: 'done',
      task: 'check out',
      steps: 1,
      actions: { total: 1, successful: 0, failed: 1, byErrorCode: { EMPTY_BASKET: 1 } },
      variables: { executor: 'done' },
    });
  });

  it('logs through the supplied logger when verbose', async () => {
    const lines: string[] = [];
    const executor = new PlanningExecutor({
      proposer: new ScriptedProposer([act('view_basket')]),
      dispatcher: new ToolDispatcher(new ResourceStore(gpuSeed())),
      verbose: true,
      logger: (message) => lines.push(message),
    });

    await executor.run('peek');

    expect(lines).toEqual([
      'Starting session with goal: peek',
      '--- Step 1 ---',
      '  → view_basket({})',
      '  ← 200 {"items":[],"total":0}',
      '--- Step 2 ---',
      'Proposer signalled goal achieved: Script exhausted',
    ]);
  });

  it('stays quiet by default', async () => {
    const lines: string[] = [];
    const executor = new PlanningExecutor({
      proposer: new ScriptedProposer([act('view_basket')]),
      dispatcher: new ToolDispatcher(new ResourceStore(gpuSeed())),
      logger: (message) => lines.push(message),
    });

    await executor.run('peek');

    expect(lines).toEqual([]);
  });
});
