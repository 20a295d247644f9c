/**
 * Pipeline error taxonomy. Every stage fails the run with its own subclass so
 * the CLI can name the failing stage.
 */

export type PipelineStage =
  | 'configuration'
  | 'generation'
  | 'synthesis'
  | 'source'
  | 'encode'
  | 'upload';

export abstract class PipelineError extends Error {
  abstract readonly stage: PipelineStage;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PipelineError {
  readonly stage = 'configuration';
}

export class GenerationError extends PipelineError {
  readonly stage = 'generation';
}

export class SynthesisError extends PipelineError {
  readonly stage = 'synthesis';
}

export class SourceError extends PipelineError {
  readonly stage = 'source';
}

export class EncodeError extends PipelineError {
  readonly stage = 'encode';
}

export class UploadError extends PipelineError {
  readonly stage = 'upload';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Re-throw pipeline errors untouched; wrap anything else in the stage's class.
 */
export function wrapStageError<E extends PipelineError>(
  err: unknown,
  ErrorClass: new (message: string, cause?: unknown) => E,
  context: string,
): PipelineError {
  if (err instanceof PipelineError) return err;
  return new ErrorClass(`${context}: ${errorMessage(err)}`, err);
}

/** One-line, user-facing summary of a failed run. */
export function describeFailure(err: unknown): string {
  if (err instanceof PipelineError) return `${err.stage} stage failed: ${err.message}`;
  return `unexpected failure: ${errorMessage(err)}`;
}
