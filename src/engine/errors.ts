import type { z } from 'zod';

/**
 * Ett enskilt valideringsfel, samma form som API:t returnerar
 */
export interface FieldIssue {
  field: string;
  message: string;
  code: string;
}

/**
 * Base class for errors that map to an HTTP status
 */
export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(message: string, code: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Felaktig användarinput (negativa mängder, okända enum-värden)
 */
export class ValidationError extends AppError {
  readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[] = []) {
    super(message, 'VALIDATION_ERROR', 400, issues);
    this.issues = issues;
  }

  static fromZod(message: string, error: z.ZodError): ValidationError {
    return new ValidationError(message, toFieldIssues(error));
  }
}

/**
 * Faktortabellen saknar en post som giltig input behöver - ett datafel, inte ett användarfel
 */
export class ConfigurationError extends AppError {
  readonly entries: string[];

  constructor(message: string, entries: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', 500, entries);
    this.entries = entries;
  }
}

export function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/** Helper to extract error message from unknown error */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
