import { errors as playwrightErrors } from "playwright";

export type AgentPhase = "launch" | "navigation" | "settle" | "extraction" | "action";

export type RetrievalFailureReason =
  | "navigation_failed"
  | "timeout"
  | "no_results"
  | "no_confident_match"
  | "thin_content";

/**
 * Fatal startup problem: missing or broken prompt template, invalid environment,
 * unresolvable model endpoint. Never raised while serving a request.
 */
export class ConfigurationError extends Error {
  readonly code = "configuration_error";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class TransientAgentError extends Error {
  readonly code: string = "transient_agent_error";
  readonly phase: AgentPhase;

  constructor(message: string, phase: AgentPhase, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientAgentError";
    this.phase = phase;
  }
}

export class RetrievalError extends TransientAgentError {
  override readonly code = "retrieval_error";
  readonly reason: RetrievalFailureReason;
  readonly term: string;

  constructor(
    message: string,
    options: {
      reason: RetrievalFailureReason;
      term: string;
      phase: AgentPhase;
      cause?: unknown;
    },
  ) {
    super(message, options.phase, { cause: options.cause });
    this.name = "RetrievalError";
    this.reason = options.reason;
    this.term = options.term;
  }
}

export class ClassificationAmbiguous extends Error {
  readonly code = "classification_ambiguous";
  readonly classifier: string;
  readonly payloadPreview: string;

  constructor(classifier: string, payload: string) {
    super(`Unexpected ${classifier} classification payload`);
    this.name = "ClassificationAmbiguous";
    this.classifier = classifier;
    this.payloadPreview = payload.slice(0, 200);
  }
}

export class PlanValidationError extends Error {
  readonly code = "plan_validation_error";
  /** Index of the first invalid step, or null when the payload is not a step list at all. */
  readonly stepIndex: number | null;
  readonly issues: string[];

  constructor(message: string, stepIndex: number | null, issues: string[] = []) {
    super(message);
    this.name = "PlanValidationError";
    this.stepIndex = stepIndex;
    this.issues = issues;
  }
}

/** The saved-task file exists but cannot be read back, so it is left untouched. */
export class TaskStoreError extends Error {
  readonly code = "task_store_error";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TaskStoreError";
  }
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof playwrightErrors.TimeoutError;
}

/**
 * Wrap a raw browser failure so callers only ever see TransientAgentError
 * from the web agent.
 */
export function toTransientAgentError(
  error: unknown,
  phase: AgentPhase,
  context: string,
): TransientAgentError {
  if (error instanceof TransientAgentError) return error;
  const reason = errorMessage(error);
  const label = isTimeoutError(error) ? "timed out" : "failed";
  return new TransientAgentError(`${context} ${label}: ${reason}`, phase, {
    cause: error,
  });
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
