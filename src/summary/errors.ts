export interface RecordIssue {
  path: string;
  message: string;
}

export class ExperimentRecordValidationError extends Error {
  readonly issues: readonly RecordIssue[];

  constructor(issues: RecordIssue[]) {
    super(
      ["Invalid experiment record.", ...issues.map((issue) => `  ${issue.path}: ${issue.message}`)].join("\n")
    );
    this.name = "ExperimentRecordValidationError";
    this.issues = issues;
  }
}
