/**
 * Peripheral Codegen - Custom Error Classes
 *
 * Structured error taxonomy with full context for debugging
 */

import type { Diagnostic, StageId } from '../types';

export interface ErrorContext {
  operation: string;
  timestamp: Date;
  artifactPath?: string;
  stage?: StageId | 'metadata' | 'import' | 'render' | 'manifest';
  file?: string;
  line?: number;
  column?: number;
  suggestion?: string;
  [key: string]: unknown;
}

export class CodegenError extends Error {
  public readonly code: string;
  public readonly kind: string;
  public readonly context: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    kind: string,
    context?: Partial<ErrorContext>,
    isOperational = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.kind = kind;
    this.context = {
      ...(context || {}),
      operation: context?.operation || 'unknown',
      timestamp: new Date(),
    };
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      kind: this.kind,
      context: this.context,
    };
  }
}

// Metadata Errors
export type MetadataErrorKind = 'Syntax' | 'MissingField' | 'TypeMismatch';

export class MetadataError extends CodegenError {
  public readonly field?: string;

  constructor(kind: MetadataErrorKind, message: string, context?: Partial<ErrorContext> & { field?: string }) {
    super(message, `METADATA_${kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`, kind, { stage: 'metadata', ...context });
    this.field = context?.field;
  }

  static syntax(message: string, file: string, line?: number, column?: number): MetadataError {
    const where = line !== undefined ? `${file}:${line}${column !== undefined ? `:${column}` : ''}` : file;
    return new MetadataError('Syntax', `Syntax error in ${where}: ${message}`, {
      operation: 'load',
      file,
      line,
      column,
    });
  }

  static missingField(field: string, file: string): MetadataError {
    return new MetadataError('MissingField', `Missing required field '${field}' in ${file}`, {
      operation: 'load',
      file,
      field,
      suggestion: `Add '${field}' to the descriptor`,
    });
  }

  static typeMismatch(field: string, expected: string, actual: string, file: string): MetadataError {
    return new MetadataError(
      'TypeMismatch',
      `Field '${field}' in ${file} has type ${actual}, expected ${expected}`,
      { operation: 'load', file, field, expected, actual }
    );
  }

  static unknownField(field: string, file: string): MetadataError {
    return new MetadataError('TypeMismatch', `Unrecognized field '${field}' in ${file}`, {
      operation: 'load',
      file,
      field,
      suggestion: `Remove '${field}' or check its spelling`,
    });
  }

  static codeSyntax(method: string, file: string, line: number, column: number, detail: string): MetadataError {
    const field = `policy_methods.${method}.code`;
    return new MetadataError('Syntax', `Syntax error in ${file} at ${field} line ${line}: ${detail}`, {
      operation: 'load',
      file,
      field,
      line,
      column,
    });
  }
}

// Import Errors
export type ImportErrorKind = 'MalformedDocument' | 'UnknownQuirkTarget' | 'Conflict';

export class ImportError extends CodegenError {
  constructor(kind: ImportErrorKind, message: string, context?: Partial<ErrorContext>) {
    super(message, `IMPORT_${kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`, kind, {
      stage: 'import',
      ...context,
    });
  }
}

// Render Errors
export type RenderErrorKind = 'MissingVariable' | 'TemplateSyntax' | 'UnresolvedRegisterReference' | 'FieldOutOfRange';

export class RenderError extends CodegenError {
  constructor(kind: RenderErrorKind, message: string, context?: Partial<ErrorContext>) {
    super(message, `RENDER_${kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`, kind, {
      stage: 'render',
      ...context,
    });
  }

  static missingVariable(name: string, template: string): RenderError {
    return new RenderError('MissingVariable', `Missing template variable '${name}' in ${template}`, {
      operation: 'render',
      variable: name,
      template,
    });
  }

  static templateSyntax(template: string, line: number, column: number, detail: string): RenderError {
    return new RenderError('TemplateSyntax', `Template syntax error in ${template} at ${line}:${column}: ${detail}`, {
      operation: 'compileTemplate',
      template,
      line,
      column,
    });
  }

  static unresolvedRegister(register: string, peripheral: string): RenderError {
    return new RenderError(
      'UnresolvedRegisterReference',
      `Register '${register}' is not defined for peripheral ${peripheral}`,
      { operation: 'render', register, peripheral }
    );
  }

  static fieldOutOfRange(register: string, field: string, lastBit: number, size: number): RenderError {
    return new RenderError(
      'FieldOutOfRange',
      `Field ${register}.${field} ends at bit ${lastBit}, outside the ${size}-bit register`,
      { operation: 'render', register, field }
    );
  }
}

// Semantic mismatch kinds double as diagnostic codes
export type SemanticMismatchKind =
  | 'Address'
  | 'Offset'
  | 'BitfieldPosition'
  | 'BitfieldWidth'
  | 'MissingPeripheral';

export const SemanticMismatchCodes: Record<SemanticMismatchKind, string> = {
  Address: 'SEMANTIC_ADDRESS_MISMATCH',
  Offset: 'SEMANTIC_OFFSET_MISMATCH',
  BitfieldPosition: 'SEMANTIC_BITFIELD_POSITION_MISMATCH',
  BitfieldWidth: 'SEMANTIC_BITFIELD_WIDTH_MISMATCH',
  MissingPeripheral: 'SEMANTIC_MISSING_PERIPHERAL',
};

export class SemanticMismatch extends CodegenError {
  constructor(kind: SemanticMismatchKind, message: string, context?: Partial<ErrorContext>) {
    super(message, SemanticMismatchCodes[kind], kind, { stage: 'semantic', ...context });
  }
}

// Tool Errors
export type ToolErrorKind = 'Timeout' | 'Cancelled' | 'NonZeroExit' | 'ToolNotFound';

const ToolErrorCodes: Record<ToolErrorKind, string> = {
  Timeout: 'TOOL_TIMEOUT',
  Cancelled: 'TOOL_CANCELLED',
  NonZeroExit: 'TOOL_NON_ZERO_EXIT',
  ToolNotFound: 'TOOL_NOT_FOUND',
};

export class ToolError extends CodegenError {
  public readonly tool: string;

  constructor(kind: ToolErrorKind, tool: string, message: string, context?: Partial<ErrorContext>) {
    super(message, ToolErrorCodes[kind], kind, {
      ...context,
      tool,
    });
    this.tool = tool;
  }

  static timeout(tool: string, timeoutMs: number): ToolError {
    return new ToolError('Timeout', tool, `${tool} timed out after ${timeoutMs}ms`, {
      operation: 'run',
      timeoutMs,
    });
  }

  static cancelled(tool: string): ToolError {
    return new ToolError('Cancelled', tool, `${tool} was cancelled`, { operation: 'run', cancelled: true });
  }

  static nonZeroExit(tool: string, exitCode: number, stderr: string): ToolError {
    const detail = stderr.trim().split('\n')[0] || 'no output';
    return new ToolError('NonZeroExit', tool, `${tool} exited with code ${exitCode}: ${detail}`, {
      operation: 'run',
      exitCode,
    });
  }

  static notFound(tool: string): ToolError {
    return new ToolError('ToolNotFound', tool, `Tool not found: ${tool}`, {
      operation: 'run',
      suggestion: `Install ${tool} or point the toolchain configuration at it`,
    });
  }
}

// Cache Errors
export type CacheErrorKind = 'Corrupt' | 'Unreadable' | 'Cycle';

export class CacheError extends CodegenError {
  constructor(kind: CacheErrorKind, message: string, context?: Partial<ErrorContext>) {
    super(message, `CACHE_${kind.toUpperCase()}`, kind, { stage: 'manifest', ...context });
  }
}

// Internal Errors
export class InternalError extends CodegenError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'INTERNAL_ERROR', 'Internal', context, false);
  }
}

export function isCodegenError(error: unknown): error is CodegenError {
  return error instanceof CodegenError;
}

/** Matched by shape: errors thrown by Node's modules may belong to another realm. */
function isErrorLike(error: unknown): error is { message: string; name?: unknown; stack?: unknown } {
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

export function errorMessage(error: unknown): string {
  return isErrorLike(error) ? error.message : String(error);
}

/** The `code` of a system error such as `ENOENT`. */
export function errorCode(error: unknown): string | undefined {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

export function handleError(error: unknown): CodegenError {
  if (isCodegenError(error)) {
    return error;
  }

  if (isErrorLike(error)) {
    return new InternalError(error.message, {
      operation: 'unknown',
      originalError: typeof error.name === 'string' ? error.name : 'Error',
      ...(errorCode(error) !== undefined && { errorCode: errorCode(error) }),
      stack: typeof error.stack === 'string' ? error.stack : undefined,
    });
  }

  return new InternalError('An unexpected error occurred', {
    operation: 'unknown',
    originalError: String(error),
  });
}

/**
 * Convert any error into a diagnostic that can be surfaced without
 * re-deriving state.
 */
export function toDiagnostic(error: unknown): Diagnostic {
  const normalized = handleError(error);
  const { file, line, column, suggestion } = normalized.context;
  return {
    severity: 'error',
    code: normalized.code,
    message: normalized.message,
    ...(file !== undefined && { file }),
    ...(line !== undefined && { line }),
    ...(column !== undefined && { column }),
    ...(suggestion !== undefined && { suggestion }),
  };
}
