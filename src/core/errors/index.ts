export enum ConfigErrorCode {
  INVALID_JSON = 'INVALID_JSON',
  INVALID_VALUE = 'INVALID_VALUE',
  ENV_VAR_NOT_SET = 'ENV_VAR_NOT_SET',
  ENV_VAR_INVALID = 'ENV_VAR_INVALID',
}

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly suggestion?: string;

  constructor(message: string, code: ConfigErrorCode, suggestion?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    this.code = code;
    this.suggestion = suggestion;

    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export enum EngineErrorCode {
  INVALID_RULE = 'INVALID_RULE',
  INVALID_ADDON = 'INVALID_ADDON',
  LIFECYCLE_CONFLICT = 'LIFECYCLE_CONFLICT',
  ADDON_NOT_FOUND = 'ADDON_NOT_FOUND',
  ADDON_INIT_FAILURE = 'ADDON_INIT_FAILURE',
  ADDON_RUNTIME_FAILURE = 'ADDON_RUNTIME_FAILURE',
  REGISTRY_CONSISTENCY = 'REGISTRY_CONSISTENCY',
}

/**
 * One field-level problem found while validating a declaration.
 * `path` is dotted, e.g. `hooks.blockAds.match[0].op`.
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

export class EngineError extends Error {
  public readonly code: EngineErrorCode;
  public readonly suggestion?: string;

  constructor(message: string, code: EngineErrorCode, suggestion?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, EngineError.prototype);
  }
}

export class InvalidRuleError extends EngineError {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], context?: string) {
    const head = issues[0];
    const summary = head ? `${head.path}: ${head.message}` : 'no detail';
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
    super(
      `Invalid rule${context ? ` in ${context}` : ''}: ${summary}${more}`,
      EngineErrorCode.INVALID_RULE,
      'Check the hook declarations against the rule configuration format.',
    );
    this.name = 'InvalidRuleError';
    this.issues = issues;

    Object.setPrototypeOf(this, InvalidRuleError.prototype);
  }
}

export class InvalidAddonError extends EngineError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message, EngineErrorCode.INVALID_ADDON);
    this.name = 'InvalidAddonError';
    this.issues = issues;

    Object.setPrototypeOf(this, InvalidAddonError.prototype);
  }
}

export class LifecycleConflictError extends EngineError {
  public readonly addonId: string;
  public readonly state: string;
  public readonly operation: string;

  constructor(addonId: string, state: string, operation: string, allowed: readonly string[] = []) {
    super(
      `Cannot ${operation} addon "${addonId}" while it is ${state}`,
      EngineErrorCode.LIFECYCLE_CONFLICT,
      allowed.length > 0 ? `${operation} is accepted from: ${allowed.join(', ')}` : undefined,
    );
    this.name = 'LifecycleConflictError';
    this.addonId = addonId;
    this.state = state;
    this.operation = operation;

    Object.setPrototypeOf(this, LifecycleConflictError.prototype);
  }
}

export class AddonNotFoundError extends EngineError {
  public readonly addonId: string;

  constructor(addonId: string) {
    super(`Addon "${addonId}" is not installed`, EngineErrorCode.ADDON_NOT_FOUND);
    this.name = 'AddonNotFoundError';
    this.addonId = addonId;

    Object.setPrototypeOf(this, AddonNotFoundError.prototype);
  }
}

export class AddonInitError extends EngineError {
  public readonly addonId: string;

  constructor(addonId: string, reason: string, cause?: unknown) {
    super(`Addon "${addonId}" failed to initialize: ${reason}`, EngineErrorCode.ADDON_INIT_FAILURE, undefined, {
      cause,
    });
    this.name = 'AddonInitError';
    this.addonId = addonId;

    Object.setPrototypeOf(this, AddonInitError.prototype);
  }
}

export class AddonRuntimeError extends EngineError {
  public readonly addonId: string;
  public readonly hookName: string;
  public readonly timedOut: boolean;

  constructor(addonId: string, hookName: string, reason: string, timedOut = false) {
    super(`Hook ${addonId}/${hookName} failed: ${reason}`, EngineErrorCode.ADDON_RUNTIME_FAILURE);
    this.name = 'AddonRuntimeError';
    this.addonId = addonId;
    this.hookName = hookName;
    this.timedOut = timedOut;

    Object.setPrototypeOf(this, AddonRuntimeError.prototype);
  }
}

export class RegistryConsistencyError extends EngineError {
  constructor(message: string) {
    super(message, EngineErrorCode.REGISTRY_CONSISTENCY);
    this.name = 'RegistryConsistencyError';

    Object.setPrototypeOf(this, RegistryConsistencyError.prototype);
  }
}

/**
 * Flattens an unknown thrown value into a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
