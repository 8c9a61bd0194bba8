export class ExternalTaskClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DuplicateTopicError extends ExternalTaskClientError {
  readonly topicName: string;

  constructor(topicName: string) {
    super(`topic_already_subscribed:${topicName}`);
    this.topicName = topicName;
  }
}

export class ValueMapperError extends ExternalTaskClientError {}

export interface EngineErrorBody {
  type?: string;
  message?: string;
  code?: number;
}

/**
 * Any failed call against the engine's REST API. `status` is null when no HTTP
 * response was received at all.
 */
export class EngineClientError extends ExternalTaskClientError {
  readonly status: number | null;
  readonly engineType: string | null;

  constructor(
    message: string,
    status: number | null,
    body: EngineErrorBody = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.status = status;
    this.engineType = body.type ?? null;
  }
}

export class BadRequestError extends EngineClientError {}
export class NotFoundError extends EngineClientError {}
export class EngineError extends EngineClientError {}
export class UnknownHttpError extends EngineClientError {}
export class ConnectionLostError extends EngineClientError {}

export function engineErrorFor(
  operation: string,
  status: number,
  body: EngineErrorBody
): EngineClientError {
  const message = `${operation}_failed:HTTP ${status}${body.message ? `: ${body.message}` : ""}`;
  switch (status) {
    case 400:
      return new BadRequestError(message, status, body);
    case 404:
      return new NotFoundError(message, status, body);
    case 500:
      return new EngineError(message, status, body);
    default:
      return new UnknownHttpError(message, status, body);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
