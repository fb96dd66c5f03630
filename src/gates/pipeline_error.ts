export type ErrorBucket = "admission" | "extraction" | "tool" | "policy" | "synthesis" | "internal";

export type PipelineStage =
  | "admission"
  | "routing"
  | "suitability"
  | "fan_out"
  | "evidence"
  | "synthesis"
  | "render"
  | "audit";

const STAGE_BUCKETS: Record<PipelineStage, ErrorBucket> = {
  admission: "admission",
  routing: "extraction",
  suitability: "policy",
  fan_out: "tool",
  evidence: "tool",
  synthesis: "synthesis",
  render: "synthesis",
  audit: "internal",
};

export interface AdvisoryPipelineErrorDetails {
  bucket: ErrorBucket;
  stage: PipelineStage;
  message: string;
  cause?: string;
}

export class AdvisoryPipelineError extends Error {
  public readonly bucket: ErrorBucket;
  public readonly stage: PipelineStage;
  public readonly details: AdvisoryPipelineErrorDetails;

  constructor(details: AdvisoryPipelineErrorDetails) {
    super(details.message);
    this.name = "AdvisoryPipelineError";
    this.bucket = details.bucket;
    this.stage = details.stage;
    this.details = details;
  }

  /** Map anything thrown inside a stage onto the nearest taxonomy bucket. */
  static fromUnknown(stage: PipelineStage, err: unknown): AdvisoryPipelineError {
    if (err instanceof AdvisoryPipelineError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new AdvisoryPipelineError({
      bucket: STAGE_BUCKETS[stage],
      stage,
      message: `stage ${stage} failed`,
      cause: message.slice(0, 300),
    });
  }

  toJSON() {
    return {
      error: "pipeline_error",
      bucket: this.bucket,
      stage: this.stage,
      message: this.message,
      ...(this.details.cause ? { cause: this.details.cause } : {}),
    };
  }
}
