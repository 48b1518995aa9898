/**
 * Error taxonomy for the task core. Validation errors are thrown to the
 * caller; persistence errors are logged and handed back as values.
 */

export type TodoErrorCode = 'validation' | 'persistence_read' | 'persistence_write';

export class TodoError extends Error {
  constructor(
    public readonly code: TodoErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TodoError';
  }

  toJSON(): { error: string; code: TodoErrorCode; message: string } {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

export class ValidationError extends TodoError {
  constructor(public readonly issues: readonly string[]) {
    super('validation', issues.join('; '));
    this.name = 'ValidationError';
  }
}

export class PersistenceReadError extends TodoError {
  constructor(
    public readonly filePath: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super('persistence_read', `Could not read tasks from ${filePath}: ${reason}`, options);
    this.name = 'PersistenceReadError';
  }
}

export class PersistenceWriteError extends TodoError {
  constructor(
    public readonly filePath: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super('persistence_write', `Could not save tasks to ${filePath}: ${reason}`, options);
    this.name = 'PersistenceWriteError';
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
