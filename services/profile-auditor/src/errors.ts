export class AuditError extends Error {
  public readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(message);
    this.name = "AuditError";
    this.filePath = filePath;
  }
}

export class DecodeError extends AuditError {
  constructor(filePath: string, diagnostic: string) {
    super(diagnostic, filePath);
    this.name = "DecodeError";
  }
}

export class ExtractError extends AuditError {
  constructor(filePath: string, diagnostic: string) {
    super(diagnostic, filePath);
    this.name = "ExtractError";
  }
}

export class ParseError extends AuditError {
  constructor(filePath: string, diagnostic: string) {
    super(diagnostic, filePath);
    this.name = "ParseError";
  }
}

/** Workspace or input directory failures; these abort the whole run. */
export class OrchestrationFatal extends AuditError {
  constructor(filePath: string, diagnostic: string) {
    super(`${filePath}: ${diagnostic}`, filePath);
    this.name = "OrchestrationFatal";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
