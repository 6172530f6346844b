/**
 * Non-fatal conditions are reported as data next to the result they
 * affect, so callers get a best-effort output annotated with what was
 * dropped and why.
 */

/** Build-time: a point could not be classified into a model or category. */
export interface UnresolvedPointWarning {
  kind: 'unresolved-point';
  key: string;
  reason: 'orphaned' | 'unknown-category';
  message: string;
}

/** Build-time: a correction rule key never matched any entry. */
export interface CorrectionMismatchWarning {
  kind: 'correction-mismatch';
  pass: string;
  ruleKey: string;
  message: string;
}

export type BuildWarning = UnresolvedPointWarning | CorrectionMismatchWarning;

/** Runtime: a raw point has no canonical mapping. */
export interface UnknownPointWarning {
  kind: 'unknown-point';
  deviceId: string;
  pointName: string;
  vocabulary: string;
}

/** Runtime: a value transform rejected the raw value. */
export interface TransformFailureIssue {
  kind: 'transform-failure';
  deviceId: string;
  pointName: string;
  canonicalName: string;
  message: string;
}

/** Runtime: two raw points resolved to the same canonical name. */
export interface DuplicateCanonicalCollision {
  kind: 'duplicate-canonical';
  deviceId: string;
  canonicalName: string;
  keptPointName: string;
  droppedPointName: string;
}

export type NormalizationIssue =
  | UnknownPointWarning
  | TransformFailureIssue
  | DuplicateCanonicalCollision;
