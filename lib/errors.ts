/**
 * Thrown when a required top-level argument is missing or malformed.
 * Unknown ids are reported with this error as well.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Thrown by caller-side guards that refuse a change which would create a
 * disallowed overlap. Detection itself reports conflicts as data.
 */
export class StateConflictError extends Error {
  readonly conflictIds: string[];

  constructor(message: string, conflictIds: string[] = []) {
    super(message);
    this.name = 'StateConflictError';
    this.conflictIds = conflictIds;
  }
}

export function requireArgument<T>(value: T | null | undefined, name: string): T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(`${name} is required`);
  }
  return value;
}
