export class MigratorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MigratorError';
  }
}

export class ConfigurationError extends MigratorError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class DiscoveryError extends MigratorError {
  constructor(message: string) {
    super(message);
    this.name = 'DiscoveryError';
  }
}

export class LoadError extends MigratorError {
  readonly file: string;

  constructor(file: string, reason: string, cause?: unknown) {
    super(`Failed to load migration ${file}: ${reason}`, { cause });
    this.name = 'LoadError';
    this.file = file;
  }
}

export class PrerequisiteError extends MigratorError {
  readonly migration: string;
  readonly missingOrder: number;

  constructor(migration: string, missingOrder: number) {
    super(`Previous migration with order ${missingOrder} has not been applied (required by ${migration})`);
    this.name = 'PrerequisiteError';
    this.migration = migration;
    this.missingOrder = missingOrder;
  }
}

export type OperationPhase = 'apply' | 'rollback';

export class OperationError extends MigratorError {
  readonly migration: string;
  readonly phase: OperationPhase;

  constructor(migration: string, phase: OperationPhase, cause: unknown) {
    super(`Migration ${migration} failed during ${phase}: ${getErrorMessage(cause)}`, { cause });
    this.name = 'OperationError';
    this.migration = migration;
    this.phase = phase;
  }
}

/**
 * Extracts error message from unknown error type
 * @param error - The caught error (unknown type)
 * @returns Error message as string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
