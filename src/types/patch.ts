/**
 * Patch Types
 */

export type LineEditKind = 'replace' | 'insert' | 'delete';

/**
 * One changed line, positioned in the original text.
 */
export interface LineEdit {
  /** Disambiguates blank-line edits from pure insertions and deletions */
  kind: LineEditKind;
  /** 1-based line in the original; insertions use the line they precede */
  lineNumber: number;
  /** Empty for a pure insertion */
  oldText: string;
  /** Empty for a pure deletion */
  newText: string;
}

export type PatchSource = 'ai' | 'fallback';

/**
 * Why a patch came from the fallback table instead of the inference backend.
 */
export const PatchGenerationFailure = {
  BACKEND_UNAVAILABLE: 'BackendUnavailable',
  BACKEND_TIMEOUT: 'BackendTimeout',
  MALFORMED_RESPONSE: 'MalformedResponse',
} as const;

export type PatchGenerationFailure =
  (typeof PatchGenerationFailure)[keyof typeof PatchGenerationFailure];

export interface PatchRecord {
  /** Iteration whose failure this patch responds to */
  iteration: number;
  originalCode: string;
  fixedCode: string;
  unifiedDiff: string;
  lineEdits: LineEdit[];
  explanation: string;
  reasoning: string;
  source: PatchSource;
  generationTimeSeconds: number;
  /** Explicit "no change recommended" signal; fixedCode equals originalCode */
  noChange: boolean;
  /** Set when source is 'fallback' */
  fallbackCause: PatchGenerationFailure | null;
}
