/** Invalid flags or configuration, caught before any side effect (exit code 2). */
export class InputValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputValidationError";
  }
}

export function formatError(err: unknown) {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
