/**
 * rte — reconstructs a traced call as its own source, one function body
 * per call, with variables replaced by the values they held.
 *
 * @example
 * ```typescript
 * import { TraceSession, ModuleCatalog, FileSourceLocator, ScriptedDebugger } from 'rte-trace';
 *
 * const catalog = new ModuleCatalog(new FileSourceLocator(['src']));
 * const session = new TraceSession({ backend: new ScriptedDebugger(events), catalog });
 * const { document } = await session.run('shapes', 'area', '{square, 3}');
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, type ConfigOverrides } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export { AsyncMutex } from './core/mutex.js';
export {
  RteError,
  ConfigError,
  ParseError,
  SourceNotFoundError,
  FunctionNotFoundError,
  AttachFailureError,
  BreakpointFailureError,
  TraceCorruptionError,
  UnsupportedExpressionError,
  UnresolvedRecordError,
  TraceScriptError,
} from './core/errors.js';
export { RteConfigSchema, type RteConfig, type RenderOptions, type RteEvents } from './core/types.js';

// Syntax
export type { Expr, Clause, FunctionForm, RecordDefForm, ModuleForms } from './syntax/ast.js';
export { parseModule, parseExpression, parseExpressions } from './syntax/parser.js';
export { printExpr, printFunction, printRecordDefinition } from './syntax/printer.js';
export { formatTerm, termToExpr, termFromExpr, TermSchema, type Term } from './syntax/terms.js';

// Source
export { FileSourceLocator, InMemorySourceLocator, type SourceLocator } from './source/locator.js';
export { ModuleCatalog, parseLambdaName } from './source/catalog.js';

// Records
export { RecordStore, type RecordDefinition, type RecordLookup } from './records/store.js';
export { RecordExpander } from './records/expand.js';

// Trace
export { CallTree, type UpdateAction, type UpdateOutcome } from './trace/call-tree.js';
export { extractClauseStructure, markReached, isRepeatPass } from './trace/clauses.js';
export { substituteFunction, renderFunction } from './trace/substitute.js';
export { buildDocument } from './trace/document.js';
export { TraceSession, type RunResult, type DisplaySink, type SessionState } from './trace/session.js';
export type { CallKey, ClauseNode, TraceNode, Bindings } from './trace/types.js';

// Debugger
export type { StopEvent, BreakAt, ExitAt, DebuggerBackend, CallChannel } from './debugger/types.js';
export { ScriptedDebugger } from './debugger/scripted.js';
export { parseTraceScript, scriptEvents, TraceScriptSchema } from './debugger/script.js';

// Version
export { VERSION, NAME } from './version.js';
