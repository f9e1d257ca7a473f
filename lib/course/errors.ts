/** Base class for every condition that aborts a course build. */
export class CourseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends CourseError {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
  }
}

/** The input artifact could not be read or parsed as JSON. */
export class InputError extends CourseError {
  constructor(readonly path: string, cause: unknown) {
    super(
      `unable to load ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class ProcessError extends CourseError {
  constructor(
    readonly command: string,
    readonly code: number,
    readonly stderr: string,
    readonly timedOut: boolean,
  ) {
    super(
      timedOut
        ? `${command} timed out`
        : `${command} exited with non-zero code ${code}${stderr ? `: ${stderr.trim()}` : ""}`,
    );
  }
}

export class ManifestError extends CourseError {
  constructor(readonly path: string, issues: string[]) {
    super(`malformed manifest ${path}: ${issues.join("; ")}`);
  }
}
