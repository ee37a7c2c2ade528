/**
 * ProvisionError - Error hierarchy for provision
 *
 * All errors extend the native JavaScript Error class so they can be thrown
 * from plugins and caught by the engine without special casing.
 *
 * Error types:
 * - ConfigError: Configuration parsing/validation errors (fatal)
 * - CycleError: Dependency cycle between resources (fatal, a ConfigError)
 * - UnknownDependencyError: dependsOn names a missing resource (fatal, a ConfigError)
 * - ProbeError: Reading a resource's state failed (error)
 * - ApplyError: Changing a resource's state failed (error)
 * - CommandError: External tool exited non-zero or could not start (error)
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  resourceId?: string;
  resourceType?: string;
  filePath?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of ProvisionError
 */
export interface ProvisionErrorJSON {
  code: string;
  severity: 'fatal' | 'error' | 'warning';
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all provision errors.
 */
export abstract class ProvisionError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'fatal' | 'error' | 'warning';
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ProvisionErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - invalid config file, unknown plugin type, bad dependency graph
 *
 * Severity: fatal (always). Raised before any resource is touched.
 * Codes: ERR_CONFIG_INVALID, ERR_CONFIG_VERSION, ERR_UNKNOWN_RESOURCE_TYPE,
 *        ERR_DUPLICATE_RESOURCE, ERR_DEPENDENCY_CYCLE, ERR_UNKNOWN_DEPENDENCY
 */
export class ConfigError extends ProvisionError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Thrown when the resource dependency relation contains a cycle.
 * `cycle` lists the ids along the cycle, ending with a repeat of the first.
 */
export class CycleError extends ConfigError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(
      `Dependency cycle detected: ${cycle.join(' -> ')}`,
      'ERR_DEPENDENCY_CYCLE',
      { cycle },
      'Remove one of the dependsOn entries along the cycle'
    );
    this.cycle = cycle;
  }
}

/**
 * Thrown when a dependsOn entry names a resource that is not declared.
 */
export class UnknownDependencyError extends ConfigError {
  readonly resourceId: string;
  readonly dependency: string;

  constructor(resourceId: string, dependency: string) {
    super(
      `Resource "${resourceId}" depends on unknown resource "${dependency}"`,
      'ERR_UNKNOWN_DEPENDENCY',
      { resourceId, dependency },
      `Declare "${dependency}" or remove it from dependsOn`
    );
    this.resourceId = resourceId;
    this.dependency = dependency;
  }
}

/**
 * Probe error - the state query itself failed (tool missing, unparseable output)
 *
 * Severity: error. Code: ERR_PROBE_FAILED
 */
export class ProbeError extends ProvisionError {
  readonly code = 'ERR_PROBE_FAILED';
  readonly severity = 'error' as const;
}

/**
 * Apply error - the corrective action failed or is not supported
 *
 * Severity: error. Code: ERR_APPLY_FAILED
 */
export class ApplyError extends ProvisionError {
  readonly code = 'ERR_APPLY_FAILED';
  readonly severity = 'error' as const;
}

/**
 * Command error - an external tool exited non-zero or could not be started
 *
 * Severity: error. Code: ERR_COMMAND_FAILED
 */
export class CommandError extends ProvisionError {
  readonly code = 'ERR_COMMAND_FAILED';
  readonly severity = 'error' as const;
  readonly argv: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(argv: readonly string[], exitCode: number | null, stderr: string, cause?: string) {
    const detail = cause ?? (stderr.trim() || `exit code ${exitCode}`);
    super(`Command failed: ${argv.join(' ')}: ${detail}`, { argv: [...argv], exitCode });
    this.argv = argv;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Extract a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
