import { errorMessage, SimpleError } from './util/flow';

/**
 * The configuration file exists but could not be evaluated
 */
export class ConfigParseError extends SimpleError {
  constructor(public readonly fileName: string, cause: unknown) {
    super(`"${fileName}" cannot be parsed.\n${errorMessage(cause)}`);
  }
}

export class UnknownCommandError extends SimpleError {
  constructor(public readonly commandName: string) {
    super(`Unknown command ${commandName}`);
  }
}

export class ProjectNotConfiguredError extends SimpleError {
  constructor(public readonly commandName: string) {
    super('This command needs to run inside an existing Nikola site.');
  }
}

export class InvalidCommandLineError extends SimpleError {
  constructor(public readonly commandName: string, reason: string) {
    super(`Invalid arguments for '${commandName}': ${reason}`);
  }
}

/**
 * Raised for every warning while running with --strict
 */
export class StrictModeError extends SimpleError {
}

export class TaskGraphError extends SimpleError {
}
