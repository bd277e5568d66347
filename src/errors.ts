export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}

export class ClassifierHttpError extends Error {
  constructor(public readonly status: number, body: string) {
    super(`Classifier HTTP ${status}: ${body}`);
    this.name = 'ClassifierHttpError';
  }
}

/** The classifier did not answer within the request deadline. */
export class ClassifierTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Classifier request timed out after ${timeoutMs}ms`);
    this.name = 'ClassifierTimeoutError';
  }
}

/** The classifier answered, but not with one category map per commit. */
export class ClassifierResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassifierResponseError';
  }
}

export class NoCommitsError extends Error {
  constructor(repoCount: number) {
    super(`No commits found in ${repoCount} repositor${repoCount === 1 ? 'y' : 'ies'}`);
    this.name = 'NoCommitsError';
  }
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
