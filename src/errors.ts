// src/errors.ts

export class PipelineError extends Error {
  /** Record the failure is about, when there is one. */
  recordId?: string;
  constructor(message: string, recordId?: string) {
    super(recordId ? `${message} (${recordId})` : message);
    this.name = new.target.name;
    this.recordId = recordId;
  }
}

/** Front matter is unterminated or is not a flat key/value mapping. */
export class MalformedRecordError extends PipelineError {}

export class NotFoundError extends PipelineError {}

export class ConflictError extends PipelineError {}

export class EmptySelectionError extends PipelineError {
  constructor(message = "No unsent articles to bundle") {
    super(message);
  }
}

export class SelectionCancelledError extends PipelineError {
  constructor() {
    super("Selection cancelled");
  }
}

export class InvalidTransitionError extends PipelineError {}

export class ConfigError extends PipelineError {}

/** Carries the collaborator's stderr when it produced any. */
export class CollaboratorError extends PipelineError {
  stderr: string;
  constructor(message: string, stderr = "") {
    super(stderr.trim() ? `${message}: ${stderr.trim()}` : message);
    this.stderr = stderr;
  }
}

export class ConversionFailedError extends CollaboratorError {}

export class DeliveryFailedError extends CollaboratorError {}

/**
 * The bundle went out but not every record could be flagged as sent.
 * Nothing is retried: running the export again would deliver them twice.
 */
export class PartialMarkError extends PipelineError {
  marked: string[];
  uncertain: Array<{ id: string; reason: string }>;
  constructor(marked: string[], uncertain: Array<{ id: string; reason: string }>) {
    super(
      `Bundle delivered but ${uncertain.length} record(s) could not be marked as sent: ` +
        uncertain.map((u) => u.id).join(", ")
    );
    this.marked = marked;
    this.uncertain = uncertain;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Input ended (Ctrl-C or end of stream) while a question was open. */
export class PromptClosedError extends PipelineError {
  constructor() {
    super("Input closed");
  }
}
