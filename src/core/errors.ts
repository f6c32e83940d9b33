import type { CallKey } from '../trace/types.js';

export type RteStage = 'config' | 'source' | 'records' | 'attach' | 'trace' | 'render';

export class RteError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: RteStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'RteError';
  }
}

export class ConfigError extends RteError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class ParseError extends RteError {
  constructor(message: string, public readonly line: number) {
    super(`${message} (line ${line})`, 'PARSE_ERROR', 'source');
    this.name = 'ParseError';
  }
}

export class SourceNotFoundError extends RteError {
  constructor(public readonly module: string, public readonly searched: string[] = []) {
    super(`No source found for module '${module}'`, 'SOURCE_NOT_FOUND', 'source');
    this.name = 'SourceNotFoundError';
  }
}

export class FunctionNotFoundError extends RteError {
  constructor(
    public readonly module: string,
    public readonly fn: string,
    public readonly arity: number,
  ) {
    super(`Function ${module}:${fn}/${arity} not found`, 'FUNCTION_NOT_FOUND', 'source');
    this.name = 'FunctionNotFoundError';
  }
}

export class AttachFailureError extends RteError {
  constructor(message: string, public readonly module: string, cause?: Error) {
    super(message, 'ATTACH_FAILURE', 'attach', cause);
    this.name = 'AttachFailureError';
  }
}

export class BreakpointFailureError extends RteError {
  constructor(
    public readonly module: string,
    public readonly fn: string,
    public readonly arity: number,
    cause?: Error,
  ) {
    super(`Unable to set breakpoint on ${module}:${fn}/${arity}`, 'BREAKPOINT_FAILURE', 'attach', cause);
    this.name = 'BreakpointFailureError';
  }
}

export class TraceCorruptionError extends RteError {
  constructor(message: string, public readonly line: number, public readonly key?: CallKey) {
    super(
      key
        ? `${message} at ${key.module}:${key.function}/${key.arity} depth ${key.depth} line ${line}`
        : `${message} at line ${line}`,
      'TRACE_CORRUPTION',
      'trace',
    );
    this.name = 'TraceCorruptionError';
  }
}

export class UnsupportedExpressionError extends RteError {
  constructor(public readonly expressionType: string, public readonly line: number) {
    super(`Unsupported expression '${expressionType}' at line ${line}`, 'UNSUPPORTED_EXPRESSION', 'render');
    this.name = 'UnsupportedExpressionError';
  }
}

export class UnresolvedRecordError extends RteError {
  constructor(public readonly record: string, public readonly field?: string) {
    super(
      field ? `Record #${record} has no field '${field}'` : `No definition stored for record #${record}`,
      'UNRESOLVED_RECORD',
      'records',
    );
    this.name = 'UnresolvedRecordError';
  }
}

export class TraceScriptError extends RteError {
  constructor(message: string, public readonly source?: string, cause?: Error) {
    super(source ? `${message} in ${source}` : message, 'INVALID_TRACE_SCRIPT', 'trace', cause);
    this.name = 'TraceScriptError';
  }
}
