/**
 * Scripted Proposer
 *
 * Replays a fixed list of proposals in order, ignoring history. Once the
 * script runs out it signals goal achieved. Handy for driving the executor
 * deterministically, including through invalid proposals.
 */

import type { ActionProposer, Proposal, Step } from '../../patterns/types.js';

export class ScriptedProposer implements ActionProposer {
  private position = 0;
  private readonly calls: Array<{ goal: string; historyLength: number }> = [];

  constructor(private readonly script: readonly Proposal[]) {}

  async propose(goal: string, history: readonly Step[]): Promise<Proposal> {
    this.calls.push({ goal, historyLength: history.length });

    const next = this.script[this.position];
    if (next === undefined) {
      return { kind: 'goal_achieved', rationale: 'Script exhausted' };
    }
    this.position++;
    return next;
  }

  /** What each call saw, for assertions. */
  getCallLog(): ReadonlyArray<{ goal: string; historyLength: number }> {
    return this.calls;
  }
}

/** Shorthand for an action proposal. */
export function act(
  actionName: string,
  parameters: Record<string, unknown> = {},
  rationale = `Calling ${actionName}`
): Proposal {
  return { kind: 'action', actionName, parameters, rationale };
}
