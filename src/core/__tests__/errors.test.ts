import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ExpansionFailure,
  GraphAccessFailure,
  InvalidQueryError,
  isPlannerError,
  isRecoverable,
} from '../errors.js';
import { getErrorMessage, toError } from '../../utils/errors.js';

describe('planner errors', () => {
  it('formats invalid query errors by field', () => {
    const error = new InvalidQueryError('priority', 'expected low, normal or high');

    expect(error.message).toBe('Invalid query priority: expected low, normal or high');
    expect(error.toString()).toBe('[INVALID_QUERY] Invalid query priority: expected low, normal or high');
    expect(error.toJSON().details).toEqual({ field: 'priority', reason: 'expected low, normal or high' });
    expect(error.retryable).toBe(false);
  });

  it('carries the cause of recoverable failures', () => {
    const expansion = new ExpansionFailure('index offline', new Error('ECONNREFUSED'));
    expect(expansion.message).toBe('Topic expansion failed: index offline');
    expect(expansion.toJSON().details).toEqual({ cause: 'ECONNREFUSED' });

    const graph = new GraphAccessFailure('entities', 'timeout');
    expect(graph.message).toBe('Graph entities lookup failed: timeout');
    expect(graph.toJSON().details).toEqual({ operation: 'entities', cause: undefined });
  });

  it('joins configuration issues and names the source', () => {
    const error = new ConfigurationError(['a: bad', 'b: worse'], 'planner.yaml');
    expect(error.message).toBe('Invalid planner configuration (planner.yaml): a: bad; b: worse');
    expect(new ConfigurationError(['a: bad']).message).toBe('Invalid planner configuration: a: bad');
  });

  it('classifies recoverable errors', () => {
    expect(isRecoverable(new ExpansionFailure('x'))).toBe(true);
    expect(isRecoverable(new GraphAccessFailure('entity_features', 'x'))).toBe(true);
    expect(isRecoverable(new InvalidQueryError('queryVector', 'x'))).toBe(false);
    expect(isRecoverable(new Error('x'))).toBe(false);

    expect(isPlannerError(new ConfigurationError([]))).toBe(true);
    expect(isPlannerError(new Error('x'))).toBe(false);
  });
});

describe('error utilities', () => {
  it('extracts messages from anything thrown', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage({ message: 404 })).toBe('404');
    expect(getErrorMessage(undefined)).toBe('Unknown error');
  });

  it('wraps non-errors', () => {
    const original = new Error('boom');
    expect(toError(original)).toBe(original);
    expect(toError('plain').message).toBe('plain');
  });
});
