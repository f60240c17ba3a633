export class AssertDiffError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Thrown when a message template and its arguments do not fit together. */
export class FormatError extends AssertDiffError {
  readonly template: string;

  constructor(message: string, template: string) {
    super(message);
    this.template = template;
  }
}

export class ToleranceError extends AssertDiffError {}

/** Thrown by a sink whose target can no longer take text. */
export class SinkError extends AssertDiffError {}
