/**
 * Error hierarchy for the modhost engine.
 *
 * Every error carries a machine-readable `code` and, where one applies, the
 * offending module identity.
 */

export interface ErrorOptions {
  cause?: Error;
  moduleId?: string | null;
  suggestion?: string | null;
}

export const ErrorCodes = Object.freeze({
  STORAGE_BOOTSTRAP_FAILURE: 'STORAGE_BOOTSTRAP_FAILURE',
  DESCRIPTOR_PARSE_ERROR: 'DESCRIPTOR_PARSE_ERROR',
  CYCLIC_DEPENDENCY: 'CYCLIC_DEPENDENCY',
  MISSING_REQUIRED_SERVICE: 'MISSING_REQUIRED_SERVICE',
  PHASE2_TIMEOUT: 'PHASE2_TIMEOUT',
  STARTUP_DEADLINE_EXCEEDED: 'STARTUP_DEADLINE_EXCEEDED',
  SHUTDOWN_HOOK_TIMEOUT: 'SHUTDOWN_HOOK_TIMEOUT',
  SHUTDOWN_HOOK_ERROR: 'SHUTDOWN_HOOK_ERROR',
  DUPLICATE_SERVICE_REGISTRATION: 'DUPLICATE_SERVICE_REGISTRATION',
  MODULE_LIFECYCLE_ERROR: 'MODULE_LIFECYCLE_ERROR',
  PHASE_VIOLATION: 'PHASE_VIOLATION',
  HOOK_CANCELLED: 'HOOK_CANCELLED',
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  GENERAL_INVALID_INPUT: 'GENERAL_INVALID_INPUT',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class EngineError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly moduleId: string | null;
  readonly timestamp: string;
  readonly suggestion: string | null;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'EngineError';
    this.code = code;
    this.details = details ?? {};
    this.cause = options?.cause;
    this.moduleId = options?.moduleId ?? null;
    this.timestamp = new Date().toISOString();
    this.suggestion = options?.suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (this.moduleId !== null) {
      obj.module_id = this.moduleId;
    }
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

export class ConfigNotFoundError extends EngineError {
  constructor(configPath: string, options?: ErrorOptions) {
    super(ErrorCodes.CONFIG_NOT_FOUND, `Configuration path not found: ${configPath}`, { configPath }, options);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCodes.CONFIG_INVALID, message, details, options);
    this.name = 'ConfigError';
  }
}

export class InvalidInputError extends EngineError {
  constructor(message: string = 'Invalid input', options?: ErrorOptions) {
    super(ErrorCodes.GENERAL_INVALID_INPUT, message, {}, options);
    this.name = 'InvalidInputError';
  }
}

export class StorageBootstrapError extends EngineError {
  constructor(message: string, databaseName: string | null = null, options?: ErrorOptions) {
    super(
      ErrorCodes.STORAGE_BOOTSTRAP_FAILURE,
      `Storage bootstrap failed: ${message}`,
      databaseName !== null ? { databaseName } : {},
      options,
    );
    this.name = 'StorageBootstrapError';
  }
}

export class DescriptorParseError extends EngineError {
  constructor(moduleId: string, reason: string, source: string | null = null, options?: ErrorOptions) {
    super(
      ErrorCodes.DESCRIPTOR_PARSE_ERROR,
      `Invalid descriptor for ${moduleId}: ${reason}`,
      source !== null ? { reason, source } : { reason },
      { ...options, moduleId },
    );
    this.name = 'DescriptorParseError';
  }
}

export class CyclicDependencyError extends EngineError {
  constructor(cyclePath: string[], options?: ErrorOptions) {
    super(
      ErrorCodes.CYCLIC_DEPENDENCY,
      `Cyclic dependency detected: ${cyclePath.join(' -> ')}`,
      { cyclePath },
      options,
    );
    this.name = 'CyclicDependencyError';
  }

  get cyclePath(): string[] {
    const path = this.details['cyclePath'];
    return Array.isArray(path) ? path.map(String) : [];
  }
}

export class MissingRequiredServiceError extends EngineError {
  constructor(moduleId: string, serviceName: string, options?: ErrorOptions) {
    super(
      ErrorCodes.MISSING_REQUIRED_SERVICE,
      `Module ${moduleId} requires service '${serviceName}' which is not registered`,
      { serviceName },
      { ...options, moduleId },
    );
    this.name = 'MissingRequiredServiceError';
  }

  get serviceName(): string {
    return String(this.details['serviceName']);
  }
}

export class Phase2TimeoutError extends EngineError {
  constructor(moduleId: string, timeoutMs: number, options?: ErrorOptions) {
    super(
      ErrorCodes.PHASE2_TIMEOUT,
      `Phase 2 of ${moduleId} timed out after ${timeoutMs}ms`,
      { timeoutMs },
      { ...options, moduleId },
    );
    this.name = 'Phase2TimeoutError';
  }
}

export class StartupDeadlineError extends EngineError {
  constructor(deadlineMs: number, pending: string[], options?: ErrorOptions) {
    super(
      ErrorCodes.STARTUP_DEADLINE_EXCEEDED,
      `Phase 2 did not finish within ${deadlineMs}ms; pending: ${pending.join(', ') || 'none'}`,
      { deadlineMs, pending },
      options,
    );
    this.name = 'StartupDeadlineError';
  }
}

export class ShutdownHookTimeoutError extends EngineError {
  constructor(moduleId: string, phase: 'graceful' | 'forced', timeoutMs: number, options?: ErrorOptions) {
    super(
      ErrorCodes.SHUTDOWN_HOOK_TIMEOUT,
      `${phase} shutdown of ${moduleId} exceeded ${timeoutMs}ms`,
      { phase, timeoutMs },
      { ...options, moduleId },
    );
    this.name = 'ShutdownHookTimeoutError';
  }
}

export class ShutdownHookError extends EngineError {
  constructor(moduleId: string, phase: 'graceful' | 'forced', message: string, options?: ErrorOptions) {
    super(
      ErrorCodes.SHUTDOWN_HOOK_ERROR,
      `${phase} shutdown of ${moduleId} failed: ${message}`,
      { phase },
      { ...options, moduleId },
    );
    this.name = 'ShutdownHookError';
  }
}

export class DuplicateServiceRegistrationError extends EngineError {
  constructor(serviceName: string, existingModuleId: string, moduleId: string, options?: ErrorOptions) {
    super(
      ErrorCodes.DUPLICATE_SERVICE_REGISTRATION,
      `Service '${serviceName}' is already registered by ${existingModuleId}`,
      { serviceName, existingModuleId },
      { ...options, moduleId },
    );
    this.name = 'DuplicateServiceRegistrationError';
  }
}

export class ModuleLifecycleError extends EngineError {
  constructor(moduleId: string, stage: string, message: string, options?: ErrorOptions) {
    super(
      ErrorCodes.MODULE_LIFECYCLE_ERROR,
      `${stage} failed for ${moduleId}: ${message}`,
      { stage },
      { ...options, moduleId },
    );
    this.name = 'ModuleLifecycleError';
  }
}

export class PhaseViolationError extends EngineError {
  constructor(message: string, options?: ErrorOptions) {
    super(ErrorCodes.PHASE_VIOLATION, message, {}, options);
    this.name = 'PhaseViolationError';
  }
}

export class HookCancelledError extends EngineError {
  constructor(reason: string, options?: ErrorOptions) {
    super(ErrorCodes.HOOK_CANCELLED, `Hook cancelled: ${reason}`, { reason }, options);
    this.name = 'HookCancelledError';
  }
}

/** Wrap an arbitrary thrown value as an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
