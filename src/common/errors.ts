// errors.ts - Error taxonomy for the analyzer
//
// Only ConfigurationError is allowed to reach the process boundary. Tool
// failures come back as ToolResult values and become "no data" markers.

export type AnalyzerErrorCode = 'CONFIGURATION';

export class AnalyzerError extends Error {
  public readonly code: AnalyzerErrorCode;

  constructor(code: AnalyzerErrorCode, message: string) {
    super(message);
    this.name = 'AnalyzerError';
    this.code = code;
  }
}

export class ConfigurationError extends AnalyzerError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIGURATION', `Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
