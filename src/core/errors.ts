/**
 * Errors raised by the descriptor pipeline
 *
 * Every fatal error is thrown before the write step, so the descriptor on
 * disk is left as it was.
 */

/**
 * Thrown when a required section marker is missing or unterminated
 */
export class MalformedDescriptorError extends Error {
  constructor(message: string, public missingSections: string[] = []) {
    super(message);
    this.name = 'MalformedDescriptorError';
  }
}

/**
 * Thrown when an insertion point (main group, sources build phase) cannot be located
 */
export class AnchorNotFoundError extends Error {
  constructor(public anchor: string, detail?: string) {
    super(detail ? `Could not locate ${anchor}: ${detail}` : `Could not locate ${anchor}`);
    this.name = 'AnchorNotFoundError';
  }
}

/**
 * Thrown when applying an operation would leave a dangling or duplicate identifier.
 * Indicates a planner defect.
 */
export class ReferentialIntegrityError extends Error {
  constructor(public operation: string, public referenceId: string, message: string) {
    super(`${operation}: ${message}`);
    this.name = 'ReferentialIntegrityError';
  }
}

/**
 * Thrown when no project descriptor can be found for the given path
 */
export class ProjectNotFoundError extends Error {
  constructor(public inputPath: string, reason: string) {
    super(`No Xcode project found at ${inputPath}: ${reason}`);
    this.name = 'ProjectNotFoundError';
  }
}

/**
 * Thrown when a configuration file is unreadable or invalid
 */
export class ConfigError extends Error {
  constructor(public configPath: string, message: string) {
    super(`Invalid configuration in ${configPath}: ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when xcodebuild exits non-zero. `outputTail` holds the last lines of its output.
 */
export class BuildFailedError extends Error {
  constructor(public exitCode: number, public outputTail: string) {
    super(`xcodebuild failed with exit code ${exitCode}`);
    this.name = 'BuildFailedError';
  }
}

/**
 * Thrown when a simulator command fails or a device cannot be found
 */
export class SimulatorError extends Error {
  constructor(public command: string, message: string) {
    super(`${command}: ${message}`);
    this.name = 'SimulatorError';
  }
}
