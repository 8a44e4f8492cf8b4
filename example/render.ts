/**
 * Step log rendering.
 *
 *   step_1: List all products in one go
 *     tool='list_products' offset=0 limit=5
 *     OUTPUT {"success":false,"statusCode":400,...}
 */

import type { Step, ToolEnvelope } from '../patterns/types.js';

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
}

/** `k=v` pairs separated by spaces; empty when there are no parameters. */
export function formatParameters(parameters: Readonly<Record<string, unknown>>): string {
  return Object.entries(parameters)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

export function formatEnvelope(envelope: ToolEnvelope): string {
  return JSON.stringify(envelope);
}

export function renderStep(step: Step): string[] {
  const parameters = formatParameters(step.action.parameters);
  return [
    `step_${step.number}: ${step.rationale}`,
    `  tool='${step.action.name}'${parameters ? ' ' + parameters : ''}`,
    `  OUTPUT ${formatEnvelope(step.observation)}`,
  ];
}

export function renderStepLog(steps: readonly Step[]): string {
  return steps.flatMap(renderStep).join('\n');
}
