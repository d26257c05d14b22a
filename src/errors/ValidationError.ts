import type { ZodError } from 'zod';

export interface ValidationIssue {
  /** Dotted path of the offending field; empty for the value itself. */
  path: string;
  message: string;
}

/** Raised synchronously when an entity is constructed from values that break its invariants. */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZod(entity: string, error: ZodError): ValidationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    return new ValidationError(`Invalid ${entity}: ${summary}`, issues);
  }
}

/** A polymorphic projection carried a discriminator that names no known variant. */
export class InvalidVariantError extends ValidationError {
  readonly variant: unknown;

  constructor(family: string, variant: unknown) {
    super(`Unknown ${family} type: ${String(variant)}`, [
      { path: 'type', message: `Unknown ${family} type` },
    ]);
    this.name = 'InvalidVariantError';
    this.variant = variant;
  }
}
