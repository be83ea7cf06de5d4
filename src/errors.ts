export class TagwatchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A pattern string with a malformed marker, or without any numeric slot. */
export class PatternSyntaxError extends TagwatchError {
  constructor(
    readonly pattern: string,
    readonly offset: number,
    detail: string,
  ) {
    super(`Invalid pattern \`${pattern}\` at position ${offset}: ${detail}`);
  }
}

/** The tag currently in use does not match its own pattern. */
export class CurrentTagMismatchError extends TagwatchError {
  constructor(
    readonly tag: string,
    readonly pattern: string,
  ) {
    super(`The current tag \`${tag}\` does not match the pattern \`${pattern}\``);
  }
}

export class RegistryError extends TagwatchError {
  constructor(
    message: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** The manifest itself is missing, unreadable or malformed. Aborts the whole run. */
export class ManifestError extends TagwatchError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
