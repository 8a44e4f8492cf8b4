/**
 * Pattern 3.2: Explicit Termination
 *
 * An agent stops for one of two reasons: something says the goal is met, or
 * the budget runs out. "Something" is either the proposer (it signals
 * goal_achieved) or a predicate the caller plugs in over the step history.
 *
 * Predicates stay narrow. A purchase task is "done" when a
 * checkout went through; nothing here tries to generalize beyond what the
 * caller states.
 */

import type { GoalPredicate, Step } from './types.js';

/**
 * Thrown when a finished executor is asked to run again.
 * Sessions are terminal and cannot be resumed.
 */
export class SessionClosedError extends Error {
  constructor(public readonly finalState: string) {
    super(`Session already terminated in state "${finalState}"`);
    this.name = 'SessionClosedError';
  }
}

/** Never fires; only the proposer can end the session. */
export const never: GoalPredicate = () => false;

export function anyOf(...predicates: GoalPredicate[]): GoalPredicate {
  return (history) => predicates.some((predicate) => predicate(history));
}

/**
 * Fires when the most recent step is a successful call to `actionName`
 * and, if given, `accept` agrees with its payload.
 */
export function afterSuccessfulAction(
  actionName: string,
  accept: (payload: unknown, step: Step) => boolean = () => true
): GoalPredicate {
  return (history) => {
    const last = history.at(-1);
    if (!last || last.action.name !== actionName) return false;
    if (!last.observation.success) return false;
    return accept(last.observation.payload, last);
  };
}
