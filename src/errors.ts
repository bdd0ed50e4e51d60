/**
 * Error types surfaced by prompts.
 * Every prompt either resolves with an answer or rejects with one of these.
 */

export class PromptError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PromptError';
  }
}

/**
 * The user pressed Escape. An expected outcome rather than a failure;
 * see {@link skippable} for treating it as "no answer".
 */
export class OperationCanceledError extends PromptError {
  public constructor() {
    super('Operation was canceled by the user');
    this.name = 'OperationCanceledError';
  }
}

/** The user pressed Ctrl+C. */
export class OperationInterruptedError extends PromptError {
  public constructor() {
    super('Operation was interrupted by the user');
    this.name = 'OperationInterruptedError';
  }
}

/** The confirmation entry differed from the first entry. Not retried. */
export class ConfirmationMismatchError extends PromptError {
  public constructor() {
    super('The confirmation entry does not match the first entry');
    this.name = 'ConfirmationMismatchError';
  }
}

/** Thrown before the prompt starts reading keys. */
export class InvalidConfigurationError extends PromptError {
  public constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'InvalidConfigurationError';
  }
}

export class EndOfInputError extends PromptError {
  public constructor() {
    super('Input stream ended before an answer was submitted');
    this.name = 'EndOfInputError';
  }
}

/** A read or write fault reported by the terminal backend. */
export class BackendError extends PromptError {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BackendError';
  }
}

/**
 * Resolves to `null` when the prompt was canceled with Escape.
 * Every other rejection propagates.
 */
export async function skippable<T>(pending: Promise<T>): Promise<T | null> {
  try {
    return await pending;
  } catch (err) {
    if (err instanceof OperationCanceledError) {
      return null;
    }
    throw err;
  }
}
