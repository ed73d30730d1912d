/**
 * @fileoverview Planner error hierarchy
 *
 * Only InvalidQueryError and ConfigurationError are ever thrown out of the
 * planner. ExpansionFailure and GraphAccessFailure are constructed so the
 * tracer and logs carry a typed payload, then planning carries on.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class PlannerError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// QUERY ERRORS
// ============================================================================

export class InvalidQueryError extends PlannerError {
  readonly code = 'INVALID_QUERY';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super(`Invalid query ${field}: ${reason}`);
    this.name = 'InvalidQueryError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// EXPANSION ERRORS
// ============================================================================

export class ExpansionFailure extends PlannerError {
  readonly code = 'EXPANSION_FAILURE';
  readonly retryable = true;

  constructor(
    message: string,
    readonly cause?: Error,
  ) {
    super(`Topic expansion failed: ${message}`);
    this.name = 'ExpansionFailure';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// GRAPH ACCESS ERRORS
// ============================================================================

export type GraphAccessOperation = 'entities' | 'relationship_types' | 'entity_features';

export class GraphAccessFailure extends PlannerError {
  readonly code = 'GRAPH_ACCESS_FAILURE';
  readonly retryable = true;

  constructor(
    readonly operation: GraphAccessOperation,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Graph ${operation} lookup failed: ${message}`);
    this.name = 'GraphAccessFailure';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends PlannerError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly issues: string[],
    readonly source?: string,
  ) {
    super(`Invalid planner configuration${source ? ` (${source})` : ''}: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        issues: this.issues,
        source: this.source,
      },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isPlannerError(error: unknown): error is PlannerError {
  return error instanceof PlannerError;
}

export function isRecoverable(error: unknown): boolean {
  return error instanceof ExpansionFailure || error instanceof GraphAccessFailure;
}
