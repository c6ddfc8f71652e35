import type { z } from 'zod';

export interface FieldIssue {
  field: string;
  message: string;
}

export class ValidationError extends Error {
  readonly entity: string;
  readonly issues: FieldIssue[];

  constructor(entity: string, issues: FieldIssue[]) {
    const details = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    super(`Invalid ${entity}: ${details}`);
    this.name = 'ValidationError';
    this.entity = entity;
    this.issues = issues;
  }

  static fromZod(entity: string, error: z.ZodError): ValidationError {
    const issues = error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.map((p) => String(p)).join('.') : '(root)',
      message: issue.message
    }));
    return new ValidationError(entity, issues);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
