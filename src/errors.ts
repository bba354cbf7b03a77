export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export type ServiceName = 'whisparr' | 'stash';

export class TransportError extends Error {
  readonly service: ServiceName;
  readonly operation: string;
  readonly status?: number;
  readonly body?: unknown;

  constructor(
    service: ServiceName,
    operation: string,
    message: string,
    details: { status?: number; body?: unknown; cause?: unknown } = {}
  ) {
    super(`${service} ${operation} failed: ${message}`, { cause: details.cause });
    this.name = 'TransportError';
    this.service = service;
    this.operation = operation;
    this.status = details.status;
    this.body = details.body;
  }
}

export class FilesystemOperationError extends Error {
  readonly source: string;
  readonly destination: string;

  constructor(source: string, destination: string, message: string, cause?: unknown) {
    super(`${source} -> ${destination}: ${message}`, { cause });
    this.name = 'FilesystemOperationError';
    this.source = source;
    this.destination = destination;
  }
}

export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
