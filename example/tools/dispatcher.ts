/**
 * Tool Dispatcher
 *
 * Maps an action name to a store operation. Three jobs:
 *
 * 1. Coerce loosely-typed parameters into a tagged ActionCall, one variant
 *    per action, so every operation receives validated, typed arguments.
 * 2. Run the operation against the injected store.
 * 3. Fold the outcome into a uniform envelope: 200 on success, 400 when the
 *    store refused, 422 when the proposal itself was malformed.
 *
 * The dispatcher holds no state of its own. Errors that are neither domain
 * nor contract failures are bugs and propagate.
 */

import type { z } from 'zod';
import type { Action, Dispatcher, Tool, ToolEnvelope } from '../../patterns/types.js';
import { validate } from '../../patterns/06-tool-validation.js';
import { addToBasketTool, type BasketChangeArgs } from './add-to-basket.js';
import { checkoutBasketTool } from './checkout-basket.js';
import { ContractError, DomainError, ParameterCoercionError, UnknownActionError } from './errors.js';
import { listProductsTool, type ListProductsArgs } from './list-products.js';
import { removeFromBasketTool } from './remove-from-basket.js';
import type { ResourceStore } from './resource-store.js';
import { viewBasketTool } from './view-basket.js';

export type ActionCall =
  | { name: 'list_products'; args: ListProductsArgs }
  | { name: 'add_to_basket'; args: BasketChangeArgs }
  | { name: 'remove_from_basket'; args: BasketChangeArgs }
  | { name: 'view_basket'; args: Record<string, never> }
  | { name: 'checkout_basket'; args: Record<string, never> };

export type ActionName = ActionCall['name'];

export const storeTools = [
  listProductsTool,
  addToBasketTool,
  removeFromBasketTool,
  viewBasketTool,
  checkoutBasketTool,
] as const;

export const ACTION_NAMES: readonly ActionName[] = storeTools.map((tool) => tool.name);

/** Tool definitions to advertise to a language model. */
export function describeStoreTools(): Tool[] {
  return storeTools.map(({ name, description, parameters }) => ({ name, description, parameters }));
}

export function isActionName(name: string): name is ActionName {
  return ACTION_NAMES.some((known) => known === name);
}

function coerceArgs<S extends z.ZodTypeAny>(
  actionName: ActionName,
  schema: S,
  parameters: unknown
): z.output<S> {
  const result = validate(schema, parameters ?? {});
  if (!result.valid) {
    throw new ParameterCoercionError(actionName, result.issues);
  }
  return result.value;
}

/**
 * Turn a raw action into its typed variant.
 *
 * @throws UnknownActionError for names outside the registry
 * @throws ParameterCoercionError when the parameters cannot be coerced
 */
export function coerceAction(action: Action): ActionCall {
  // Proposers written in plain JavaScript can hand over anything here
  const raw: unknown = action.name;
  if (typeof raw !== 'string') {
    throw new UnknownActionError(String(raw), ACTION_NAMES);
  }
  const name = raw.trim();
  if (!isActionName(name)) {
    throw new UnknownActionError(action.name, ACTION_NAMES);
  }

  switch (name) {
    case 'list_products':
      return { name, args: coerceArgs(name, listProductsTool.input, action.parameters) };
    case 'add_to_basket':
      return { name, args: coerceArgs(name, addToBasketTool.input, action.parameters) };
    case 'remove_from_basket':
      return { name, args: coerceArgs(name, removeFromBasketTool.input, action.parameters) };
    case 'view_basket':
      coerceArgs(name, viewBasketTool.input, action.parameters);
      return { name, args: {} };
    case 'checkout_basket':
      coerceArgs(name, checkoutBasketTool.input, action.parameters);
      return { name, args: {} };
  }
}

export class ToolDispatcher implements Dispatcher {
  constructor(private readonly store: ResourceStore) {}

  actionNames(): string[] {
    return [...ACTION_NAMES];
  }

  describeTools(): Tool[] {
    return describeStoreTools();
  }

  dispatch(action: Action): ToolEnvelope {
    try {
      const payload = this.execute(coerceAction(action));
      return { success: true, statusCode: 200, payload };
    } catch (error) {
      if (error instanceof DomainError) {
        return { success: false, statusCode: 400, error: error.toToolError() };
      }
      if (error instanceof ContractError) {
        return { success: false, statusCode: 422, error: error.toToolError() };
      }
      throw error;
    }
  }

  /** Run an already-coerced call. Domain failures are thrown, not wrapped. */
  execute(call: ActionCall): unknown {
    switch (call.name) {
      case 'list_products':
        return listProductsTool.run(this.store, call.args);
      case 'add_to_basket':
        return addToBasketTool.run(this.store, call.args);
      case 'remove_from_basket':
        return removeFromBasketTool.run(this.store, call.args);
      case 'view_basket':
        return viewBasketTool.run(this.store, call.args);
      case 'checkout_basket':
        return checkoutBasketTool.run(this.store, call.args);
    }
  }
}
