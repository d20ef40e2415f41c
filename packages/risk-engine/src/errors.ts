import type { ExtractorName } from './schemas/extractors.js';

export type RiskEngineErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'MANDATORY_EXTRACTOR_MISSING'
  | 'PIPELINE_STATE_ERROR';

/**
 * Base class for failures that abort an assessment.
 * Recoverable conditions are reported as notices instead.
 */
export abstract class RiskEngineError extends Error {
  abstract readonly code: RiskEngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A scoring override or catalog is invalid. Raised before any scoring runs.
 */
export class ConfigurationError extends RiskEngineError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid scoring configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.issues = Object.freeze([...issues]);
  }
}

export type MandatoryMissingReason = 'absent' | 'unavailable' | 'malformed';

/**
 * A mandatory extractor (manifest, permissions) produced no usable result.
 */
export class MandatoryExtractorMissingError extends RiskEngineError {
  readonly code = 'MANDATORY_EXTRACTOR_MISSING';
  readonly extractor: ExtractorName;
  readonly reason: MandatoryMissingReason;

  constructor(extractor: ExtractorName, reason: MandatoryMissingReason, options?: { cause?: unknown }) {
    super(`Mandatory extractor '${extractor}' is ${reason}`, options);
    this.extractor = extractor;
    this.reason = reason;
  }
}

/**
 * The pipeline was asked to make a transition its state machine forbids.
 */
export class PipelineStateError extends RiskEngineError {
  readonly code = 'PIPELINE_STATE_ERROR';

  constructor(from: string, to: string) {
    super(`Illegal pipeline transition ${from} -> ${to}`);
  }
}
