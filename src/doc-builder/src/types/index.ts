/**
 * Core types for the docstring synthesis pipeline.
 *
 * Data flows one way:
 *   source text -> CodeElement[] -> (type/complexity augmentation)
 *   -> per-element refinement loop -> DocstringResult[] -> rewritten text
 */

import type { BlockStatement } from '../core/SyntaxTree';

// ============================================================================
// SOURCE LOCATION
// ============================================================================

/**
 * A region of the original text. Offsets are indices into the JS string
 * (end exclusive); lines are 1-based and inclusive.
 */
export interface SourceSpan {
  startOffset: number;
  endOffset: number;
  startLine: number;
  endLine: number;
}

/** Stable key for a span, used to match results back to elements */
export type SpanKey = `${number}:${number}`;

export function spanKey(span: SourceSpan): SpanKey {
  return `${span.startOffset}:${span.endOffset}`;
}

// ============================================================================
// DOCUMENTATION STYLES
// ============================================================================

/** google = labeled sections, numpy = underlined sections, rst = directive-prefixed */
export type DocstringStyle = 'google' | 'numpy' | 'rst';

export const DOCSTRING_STYLES: readonly DocstringStyle[] = ['google', 'numpy', 'rst'];

export function isDocstringStyle(value: string): value is DocstringStyle {
  return DOCSTRING_STYLES.some((style) => style === value);
}

// ============================================================================
// CODE ELEMENTS
// ============================================================================

export type ElementKind = 'function' | 'method' | 'constructor' | 'class';

export type ParameterKind =
  | 'positional'
  | 'positionalOnly'
  | 'keywordOnly'
  | 'variadic'
  | 'keywordVariadic';

/** Usage evidence collected for a parameter or return expression */
export type EvidenceTag =
  | 'arithmetic'
  | 'stringConcat'
  | 'indexed'
  | 'keyAccess'
  | 'iterated'
  | 'membership'
  | 'sized'
  | 'attributeAccess'
  | 'called'
  | 'stringMethod'
  | 'listMethod'
  | 'setMethod'
  | 'mappingMethod';

/**
 * Outcome of heuristic inference. `unknown` is an explicit marker and is
 * never rendered as a concrete type.
 */
export type InferredType =
  | { kind: 'known'; name: string; evidence: EvidenceTag[] }
  | { kind: 'unknown'; reason: 'no-evidence' | 'conflicting-evidence'; evidence: EvidenceTag[] };

export interface Parameter {
  name: string;
  kind: ParameterKind;
  declaredType?: string;
  /** Default value expression as written, never evaluated */
  defaultValue?: string;
  inferredType?: InferredType;
}

export interface ReturnInfo {
  declaredType?: string;
  inferredType?: InferredType;
  isGenerator: boolean;
  isMultiValue: boolean;
}

export interface ExceptionInfo {
  kind: string;
  description?: string;
}

export interface ExistingDoc {
  /** Raw literal including prefix and quotes */
  text: string;
  span: SourceSpan;
}

export type ElementModifier =
  | 'async'
  | 'decorated'
  | 'classmethod'
  | 'staticmethod'
  | 'property'
  | 'nested';

/** Facts needed to compute where a new block goes */
export interface HeaderInfo {
  /** Offset just past the ':' that ends the header */
  colonOffset: number;
  /** Offset just past the line terminator of the line holding the ':' */
  lineEndOffset: number;
  /** Whitespace preceding the header keyword on its line */
  indent: string;
  /** Whitespace used by the first body line, or a computed one for inline bodies */
  bodyIndent: string;
  /** True when the body starts on the header line (`def f(): return 1`) */
  inlineBody: boolean;
  /** Offset of the first body statement */
  bodyStartOffset: number;
}

/** A non-fatal inference gap, surfaced downstream as a warning */
export interface InferenceAmbiguity {
  target: 'parameter' | 'return';
  name: string;
  reason: 'no-evidence' | 'conflicting-evidence';
  evidence: EvidenceTag[];
}

export interface CodeElement {
  readonly kind: ElementKind;
  readonly name: string;
  readonly qualifiedName: string;
  /** Enclosing class for methods and constructors */
  readonly ownerName?: string;
  readonly parameters: readonly Parameter[];
  /** Absent for classes, constructors and functions that produce no value */
  readonly returns?: ReturnInfo;
  readonly raises: readonly ExceptionInfo[];
  readonly existingDoc?: ExistingDoc;
  readonly sourceSpan: SourceSpan;
  readonly decoratorSpan?: SourceSpan;
  readonly decorators: readonly string[];
  readonly header: HeaderInfo;
  readonly complexityScore: number;
  readonly modifiers: readonly ElementModifier[];
  readonly bodyDigest: string;
  /** Text of sourceSpan */
  readonly sourceText: string;
  readonly ambiguities: readonly InferenceAmbiguity[];
  /** Parsed body, consumed by the inferencer */
  readonly body: BlockStatement;
}

// ============================================================================
// REFINEMENT
// ============================================================================

export interface CriticReview {
  /** 0.0 - 1.0 */
  score: number;
  issues: string[];
  suggestions: string[];
  /** Whether an external evaluation was blended in */
  evaluator: 'objective' | 'blended';
}

export interface GeneratedCandidate {
  text: string;
  source: 'model' | 'rule-based';
  /** Set when a model was configured but its output was not used */
  fallbackReason?: string;
}

export interface RefinementStep {
  iteration: number;
  candidate: GeneratedCandidate;
  review: CriticReview;
  confidence: number;
}

export type RefinementPhase = 'init' | 'generated' | 'reviewed' | 'accepted' | 'exhausted';

export interface RefinementState {
  phase: RefinementPhase;
  iteration: number;
  bestCandidate?: GeneratedCandidate;
  bestScore: number;
  history: RefinementStep[];
}

export interface DocstringResult {
  elementName: string;
  qualifiedName: string;
  /** Key of the element's sourceSpan */
  spanKey: SpanKey;
  text: string;
  confidenceScore: number;
  style: DocstringStyle;
  iterationsUsed: number;
  outcome: 'accepted' | 'exhausted';
  warnings: string[];
  /** Diagnostics only; never consulted by the injector */
  history: RefinementStep[];
}

// ============================================================================
// PIPELINE
// ============================================================================

export type ProviderName = 'none' | 'groq' | 'ollama';

export interface PipelineConfig {
  readonly style: DocstringStyle;
  /** Confidence needed to accept a candidate; values above 1 are never reached */
  readonly threshold: number;
  readonly maxIterations: number;
  readonly overwrite: boolean;
  /** Files processed at once */
  readonly concurrency: number;
  /** Elements refined at once within a file */
  readonly elementConcurrency: number;
  readonly fileTimeoutMs: number;
  readonly provider: ProviderName;
  readonly model?: string;
  readonly apiKey?: string;
  readonly baseUrl?: string;
  readonly requestTimeoutMs: number;
  readonly maxRetries: number;
  readonly include: readonly string[];
  readonly exclude: readonly string[];
}

export interface SkippedElement {
  qualifiedName: string;
  reason: 'existing-doc';
}

export interface InjectionEdit {
  qualifiedName: string;
  action: 'inserted' | 'replaced';
  line: number;
  text: string;
}

export type FileStatus = 'processed' | 'unchanged' | 'failed' | 'cached';

export interface FileResult {
  path: string;
  status: FileStatus;
  /** Rewritten text; equals the input when nothing changed, absent on failure */
  output?: string;
  results: DocstringResult[];
  skipped: SkippedElement[];
  edits: InjectionEdit[];
  fingerprint: string;
  error?: {
    name: string;
    message: string;
    line?: number;
    column?: number;
  };
  durationMs: number;
}

export interface BatchStatistics {
  files_total: number;
  files_processed: number;
  files_unchanged: number;
  files_cached: number;
  files_failed: number;
  elements_documented: number;
  elements_skipped: number;
  elements_exhausted: number;
  average_confidence: number;
  duration_ms: number;
}

export interface BatchResult {
  runId: string;
  startedAt: string;
  style: DocstringStyle;
  files: FileResult[];
  statistics: BatchStatistics;
}
