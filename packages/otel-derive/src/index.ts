// Public barrel for @otel-derive/engine
export { deriveProject, deriveSource } from './Derive.js'
export type {
  CompanionDecision,
  CompanionModuleV1,
  DeriveFileResult,
  DeriveMode,
  DeriveProjectArgs,
  DeriveResultV1,
  DeriveSourceArgs,
  DerivedModule,
} from './Derive.js'
export { DEFAULT_DERIVE_CONFIG, DeriveConfig, DeriveConfigTag } from './DeriveConfig.js'
export type { DeriveConfigShape, DeriveConfigSnapshot } from './DeriveConfig.js'
export { DeriveError, DeriveIoError } from './internal/errors.js'
export { formatDiagnostic } from './internal/format.js'
export type { Diagnostic } from './internal/diagnostic.js'
export { DiagnosticCodes, ReasonCodes } from './internal/reasonCodes.js'
export type { DiagnosticCode, ReasonCode } from './internal/reasonCodes.js'
export type { Pos, Span } from './internal/span.js'
export { CAPABILITIES } from './internal/grammar/deriveList.js'
export type { Capability } from './internal/grammar/deriveList.js'
export type { FunctionSource, GeneratedConversion } from './internal/synthesize/model.js'
