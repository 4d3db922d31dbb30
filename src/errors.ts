export class AppError extends Error {
  code: string;
  status: number;

  constructor(code: string, status: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Malformed or missing credential source, or an option the backend needs is absent. */
export class ConfigurationError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIGURATION_ERROR", 500, message, options);
  }
}

/** A store client the configuration asks for is not available in this process. */
export class DependencyUnavailableError extends AppError {
  constructor(message: string) {
    super("DEPENDENCY_UNAVAILABLE", 500, message);
  }
}

/** Any failure reported by the remote object store, tagged with the operation that failed. */
export class RemoteServiceError extends AppError {
  readonly operation: string;

  constructor(
    operation: string,
    message: string,
    options?: ErrorOptions,
    code = "REMOTE_SERVICE_ERROR",
    status = 502,
  ) {
    super(code, status, message, options);
    this.operation = operation;
  }

  static wrap(operation: string, err: unknown): RemoteServiceError {
    if (err instanceof RemoteServiceError) return err;
    const detail = err instanceof Error ? err.message : String(err);
    return new RemoteServiceError(operation, `${operation} failed: ${detail}`, { cause: err });
  }
}

export class ObjectNotFoundError extends RemoteServiceError {
  readonly path: string;

  constructor(operation: string, container: string, path: string) {
    super(operation, `Object ${path} not found in container ${container}`, undefined, "NOT_FOUND", 404);
    this.path = path;
  }
}

export function notFoundError(entity: string, id: string): AppError {
  return new AppError("NOT_FOUND", 404, `${entity} with id ${id} not found`);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
