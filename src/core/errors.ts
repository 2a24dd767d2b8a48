export class SolsticeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed module, action or event listener declaration. The owning module
 * is disabled; the manager keeps running.
 */
export class ConfigurationError extends SolsticeError {}

/**
 * Template could not be read or rendered.
 */
export class TemplateError extends SolsticeError {
  constructor(
    message: string,
    readonly templatePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

// Node errors may come from another realm (Jest's sandbox), so these read
// properties instead of testing `instanceof Error`.
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * The `code` of a Node system error (`ENOENT`, `EXDEV`, ...), if it has one.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
