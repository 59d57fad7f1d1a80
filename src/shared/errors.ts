export type CompileErrorCode = 'configuration' | 'validation' | 'sanitization' | 'invariant';

export interface CompileErrorDetails {
  skill?: string;
  param?: string;
  hint?: string;
}

export interface CompileErrorBody {
  error: string;
  code: CompileErrorCode;
  message: string;
  skill?: string;
  param?: string;
  hint?: string;
  issues?: string[];
}

/**
 * Base class for every error the compiler raises on purpose.
 * No partially compiled command is ever returned alongside one of these.
 */
export class CompileError extends Error {
  readonly code: CompileErrorCode;
  readonly skill?: string;
  readonly param?: string;
  readonly hint?: string;

  constructor(code: CompileErrorCode, message: string, details: CompileErrorDetails = {}) {
    super(message);
    this.name = 'CompileError';
    this.code = code;
    this.skill = details.skill;
    this.param = details.param;
    this.hint = details.hint;
  }

  toJSON(): CompileErrorBody {
    const body: CompileErrorBody = { error: this.name, code: this.code, message: this.message };
    if (this.skill !== undefined) body.skill = this.skill;
    if (this.param !== undefined) body.param = this.param;
    if (this.hint !== undefined) body.hint = this.hint;
    return body;
  }
}

/** Unknown skill, cyclic sub-pipeline, malformed skill definition. */
export class ConfigurationError extends CompileError {
  constructor(message: string, details: CompileErrorDetails = {}) {
    super('configuration', message, details);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends CompileError {
  readonly issues: string[];

  constructor(message: string, details: CompileErrorDetails = {}, issues: string[] = [message]) {
    super('validation', message, details);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  override toJSON(): CompileErrorBody {
    return { ...super.toJSON(), issues: this.issues };
  }
}

/** Path traversal, disallowed extension, missing referenced file. Aborts the whole compile. */
export class SanitizationError extends CompileError {
  readonly path?: string;

  constructor(message: string, path?: string, details: CompileErrorDetails = {}) {
    super('sanitization', message, details);
    this.name = 'SanitizationError';
    this.path = path;
  }
}

// Internal bug. Never reachable from user input.
export class CompileInvariantViolation extends CompileError {
  constructor(message: string, details: CompileErrorDetails = {}) {
    super('invariant', message, details);
    this.name = 'CompileInvariantViolation';
  }
}

export function isCompileError(err: unknown): err is CompileError {
  return err instanceof CompileError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
