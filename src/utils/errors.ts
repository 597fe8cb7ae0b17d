/**
 * Error taxonomy for the render/merge/assembly pipeline.
 *
 * Scene and merge failures are normally returned inside result unions; these
 * classes give those results a typed, loggable reason.
 */

export class PipelineError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** A transcoding job exited non-zero or could not be spawned. */
export class MediaEngineError extends PipelineError {
  constructor(
    public readonly label: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    cause?: unknown,
  ) {
    super(`Media job ${label} failed (exit ${exitCode ?? 'n/a'})`, cause);
  }
}

export type SceneFailureReason =
  | 'missing_video'
  | 'missing_narration'
  | 'invalid_duration'
  | 'transcode_failed'
  | 'caption_failed'
  | 'undersized_clip';

export class SceneRenderError extends PipelineError {
  constructor(
    public readonly sceneId: number,
    public readonly reason: SceneFailureReason,
    message: string,
    cause?: unknown,
  ) {
    super(`Scene ${sceneId}: ${message}`, cause);
  }
}

export type MergeFailureReason = 'no_clips' | 'incomplete' | 'normalize_failed' | 'concat_failed';

export class MergeError extends PipelineError {
  constructor(
    public readonly unitId: string,
    public readonly reason: MergeFailureReason,
    message: string,
    public readonly missing: readonly number[] = [],
    cause?: unknown,
  ) {
    super(`Merge ${unitId}: ${message}`, cause);
  }
}

/** A script, project or manual-map file did not match its schema. */
export class ManifestError extends PipelineError {
  constructor(public readonly filePath: string, message: string, cause?: unknown) {
    super(`${filePath}: ${message}`, cause);
  }
}
