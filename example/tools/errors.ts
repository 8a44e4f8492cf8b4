/**
 * Store and dispatcher errors.
 *
 * DomainError: the action was well-formed and the store said no. Expected,
 * recoverable, reported to the proposer with status 400.
 *
 * ContractError: the proposal itself was malformed (unknown action,
 * parameters that cannot be coerced). Reported with status 422 so a proposer
 * can tell "my call was invalid" from "my call was refused".
 */

import type { ErrorKind, ToolError } from '../../patterns/types.js';

abstract class ToolFailure<K extends ErrorKind> extends Error {
  abstract readonly kind: K;
  abstract readonly code: string;

  constructor(message: string, readonly details: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
  }

  toToolError(): ToolError<K> {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      details: { ...this.details },
    };
  }
}

export abstract class DomainError extends ToolFailure<'domain'> {
  readonly kind = 'domain' as const;
}

export abstract class ContractError extends ToolFailure<'contract'> {
  readonly kind = 'contract' as const;
}

// =============================================================================
// DOMAIN
// =============================================================================

export class PageLimitExceededError extends DomainError {
  readonly code = 'PAGE_LIMIT_EXCEEDED';

  constructor(readonly limit: number, readonly maxLimit: number) {
    super(`page limit exceeded: requested ${limit}, maximum is ${maxLimit}`, {
      limit,
      maxLimit,
    });
  }
}

export class UnknownProductError extends DomainError {
  readonly code = 'UNKNOWN_PRODUCT';

  constructor(readonly sku: string) {
    super(`product ${sku} not found`, { sku });
  }
}

export class NotInBasketError extends DomainError {
  readonly code = 'NOT_IN_BASKET';

  constructor(readonly sku: string) {
    super(`product ${sku} not in basket`, { sku });
  }
}

export class InsufficientInventoryError extends DomainError {
  readonly code = 'INSUFFICIENT_INVENTORY';

  constructor(readonly sku: string, readonly available: number, readonly requested: number) {
    super(
      `insufficient inventory for product ${sku} during checkout: available ${available}, in basket ${requested}`,
      { sku, available, requested }
    );
  }
}

export class EmptyBasketError extends DomainError {
  readonly code = 'EMPTY_BASKET';

  constructor() {
    super('basket is empty', {});
  }
}

// =============================================================================
// CONTRACT
// =============================================================================

export class UnknownActionError extends ContractError {
  readonly code = 'UNKNOWN_ACTION';

  constructor(readonly actionName: string, readonly knownActions: readonly string[]) {
    super(`unknown action "${actionName}"; expected one of: ${knownActions.join(', ')}`, {
      actionName,
      knownActions: [...knownActions],
    });
  }
}

export class ParameterCoercionError extends ContractError {
  readonly code = 'PARAMETER_COERCION';

  constructor(readonly actionName: string, readonly issues: readonly string[]) {
    super(`invalid parameters for ${actionName}: ${issues.join('; ')}`, {
      actionName,
      issues: [...issues],
    });
  }
}
