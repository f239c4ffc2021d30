/**
 * Interactive PHP input resolution: completion, incompleteness detection and
 * scope resolution for a REPL.
 */

export * from './completion'

export { createPhpParser, offsetAt } from './core'
export type { PhpParser, ParseResult, ParseErrorKind, ErrorInfo, ScanToken } from './core'

export { detect, scanBrackets } from './input/detector'
export type { InputStatus, DetectionResult, DetectorOptions, BracketScan } from './input/detector'
export { InputBuffer } from './input/buffer'
export { createCommandTable, splitCommand, detectInput } from './input/commands'
export type { CommandSpec, CommandTable, SplitInput, InputDetection } from './input/commands'

export { createSnapshotResolver, splitChain, EMPTY_RESOLVER } from './scope/resolver'
export type { ScopeResolver, SymbolKind, MemberAccess } from './scope/resolver'
export { parseSnapshot, emptySnapshot, mergeRegistries } from './scope/snapshot'
export type {
  RuntimeSnapshot,
  VariableInfo,
  ClassInfo,
  ClassKind,
  MemberInfo,
  MemberKind,
} from './scope/snapshot'
