export class RuleSetLoadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'RuleSetLoadError';
  }
}

export class ApplicantParseError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ApplicantParseError';
  }
}

export function extractMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
