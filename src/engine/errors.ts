import type { ZodError } from "zod";

export class StructuralModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** An entity failed schema validation while being constructed. */
export class ValidationError extends StructuralModelError {
  readonly entity: string;
  readonly issues: readonly ValidationIssue[];

  constructor(entity: string, issues: readonly ValidationIssue[]) {
    const detail = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
    super(`Invalid ${entity}: ${detail}`);
    this.entity = entity;
    this.issues = issues;
  }

  static fromZod(entity: string, error: ZodError): ValidationError {
    return new ValidationError(
      entity,
      error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    );
  }
}

/** The model broke a structural cross-reference invariant; nothing was registered. */
export class TranslationError extends StructuralModelError {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Model cannot be translated: ${problems.join("; ")}`);
    this.problems = problems;
  }
}

/** Raised when the translator is driven out of order or with an unknown option. */
export class UsageError extends StructuralModelError {}
