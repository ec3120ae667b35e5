export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class UpstreamError extends AppError {
  readonly provider: string;

  constructor(provider: string, status: number, body = "") {
    const detail = body.length > 200 ? `${body.slice(0, 200)}…` : body;
    super(`${provider} error: ${status}${detail ? ` ${detail}` : ""}`, status);
    this.provider = provider;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
