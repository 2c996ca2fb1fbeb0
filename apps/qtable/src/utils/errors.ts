/**
 * Q-Table Error Classes
 *
 * Every failure raised by the table, the learner or the configuration layer
 * derives from QTableError and carries a machine-readable code.
 */

/**
 * Base error
 */
export class QTableError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'QTableError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Lookup of a state the table does not contain
 */
export class UnknownStateError extends QTableError {
  constructor(stateKey: string) {
    super(`State '${stateKey}' is not in the Q-table`, 'UNKNOWN_STATE', { stateKey });
    this.name = 'UnknownStateError';
  }
}

/**
 * Action selection requested on a state with no legal actions
 */
export class TerminalStateError extends QTableError {
  constructor(stateKey?: string) {
    const message = stateKey
      ? `State '${stateKey}' is terminal and has no actions to select from`
      : 'Cannot select an action from an empty action list';
    super(message, 'TERMINAL_STATE', stateKey ? { stateKey } : undefined);
    this.name = 'TerminalStateError';
  }
}

/**
 * Update for an action that is not legal in the given state
 */
export class UnknownActionError extends QTableError {
  constructor(stateKey: string, action: unknown) {
    super(
      `Action '${String(action)}' is not a legal action of state '${stateKey}'`,
      'UNKNOWN_ACTION',
      { stateKey, action: String(action) }
    );
    this.name = 'UnknownActionError';
  }
}

/**
 * Traversal discovered more states than the configured limit
 */
export class StateSpaceLimitError extends QTableError {
  constructor(limit: number) {
    super(
      `State space exceeds the limit of ${limit} states`,
      'STATE_SPACE_LIMIT',
      { limit }
    );
    this.name = 'StateSpaceLimitError';
  }
}

/**
 * Invalid option or hyperparameter
 */
export class ValidationError extends QTableError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Invalid configuration
 */
export class ConfigurationError extends QTableError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Type guard for QTableError
 */
export const isQTableError = (error: unknown): error is QTableError => {
  return error instanceof QTableError;
};

/**
 * Normalize anything thrown into a QTableError
 */
export const handleError = (error: unknown): QTableError => {
  if (isQTableError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new QTableError(error.message, 'UNKNOWN_ERROR', { originalError: error.name });
  }

  return new QTableError('An unknown error occurred', 'UNKNOWN_ERROR', {
    originalError: String(error),
  });
};
