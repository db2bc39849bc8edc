export class ControllerApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly controllerMessage: string,
  ) {
    super(`Controller API error ${statusCode}: ${controllerMessage}`);
    this.name = "ControllerApiError";
  }
}

/** Thrown when a controller response doesn't match the expected record shape. */
export class MalformedControllerResponse extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Malformed controller response from ${path}: ${detail}`);
    this.name = "MalformedControllerResponse";
    this.path = path;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof ControllerApiError && err.statusCode === 404;
}
