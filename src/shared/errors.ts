// shared/errors.ts — Domain errors (recoverable) and the terminal GameOver signal

export type DomainErrorCode =
  | 'INVALID_TRANSITION'
  | 'NOT_ENOUGH_MATERIAL'
  | 'UNKNOWN_LOCATION'
  | 'UNKNOWN_MATERIAL'
  | 'INVALID_COMMAND';

export interface DomainErrorJSON {
  code: DomainErrorCode;
  message: string;
}

/**
 * A precondition failure. The dispatcher catches these, logs them and
 * drops the command without touching the simulation.
 */
export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;

  toJSON(): DomainErrorJSON {
    return { code: this.code, message: this.message };
  }
}

export class InvalidTransition extends DomainError {
  readonly code = 'INVALID_TRANSITION';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidTransition';
  }
}

export class NotEnoughMaterial extends DomainError {
  readonly code = 'NOT_ENOUGH_MATERIAL';

  constructor(message: string) {
    super(message);
    this.name = 'NotEnoughMaterial';
  }
}

export class UnknownLocation extends DomainError {
  readonly code = 'UNKNOWN_LOCATION';

  constructor(readonly input: string) {
    super(`Unknown location: ${JSON.stringify(input)}`);
    this.name = 'UnknownLocation';
  }
}

export class UnknownMaterial extends DomainError {
  readonly code = 'UNKNOWN_MATERIAL';

  constructor(readonly input: string) {
    super(`Unknown material: ${JSON.stringify(input)}`);
    this.name = 'UnknownMaterial';
  }
}

export class InvalidCommand extends DomainError {
  readonly code = 'INVALID_COMMAND';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidCommand';
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}

/** Terminal signal: the robot roster reached the configured limit. */
export class GameOver extends Error {
  constructor(
    readonly robotsNb: number,
    readonly elapsedSeconds: number,
  ) {
    super(`Game over: ${robotsNb} robots after ${elapsedSeconds}s`);
    this.name = 'GameOver';
  }
}

export interface InvalidSettingsIssue {
  field: string;
  message: string;
}

export class InvalidSettingsError extends Error {
  readonly issues: InvalidSettingsIssue[];

  constructor(issues: InvalidSettingsIssue[]) {
    super(`Invalid settings: ${issues.map((i) => `${i.field} ${i.message}`).join('; ')}`);
    this.name = 'InvalidSettingsError';
    this.issues = issues;
  }
}
