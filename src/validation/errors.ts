import { ZodError, ZodIssue } from 'zod';
import { ValidationError } from '../errors/validation-error';

function formatField(issue: ZodIssue): string {
  if (!issue.path || issue.path.length === 0) {
    return 'value';
  }
  return issue.path
    .map((segment) => (typeof segment === 'number' ? `[${segment}]` : String(segment)))
    .join('.')
    .replace(/\.\[/g, '[');
}

export function formatZodIssue(issue: ZodIssue): string {
  const field = formatField(issue);
  switch (issue.code) {
    case 'invalid_type':
      if (issue.received === 'undefined') {
        return `Parameter "${field}" is required`;
      }
      return `Parameter "${field}" must be of type ${issue.expected}`;
    case 'invalid_enum_value':
      return `Invalid ${field}: must be one of ${issue.options.join(', ')}`;
    case 'unrecognized_keys':
      return `Unrecognized ${issue.keys.length === 1 ? 'key' : 'keys'} in ${field}: ${issue.keys.join(', ')}`;
    case 'too_small': {
      const comparator = issue.inclusive ? 'at least' : 'greater than';
      if (issue.type === 'string') {
        return `${field} must be ${comparator} ${issue.minimum} characters`;
      }
      if (issue.type === 'array') {
        return `${field} must contain ${comparator} ${issue.minimum} items`;
      }
      return `${field} must be ${comparator} ${issue.minimum}`;
    }
    case 'too_big': {
      const comparator = issue.inclusive ? 'at most' : 'less than';
      if (issue.type === 'string') {
        return `${field} must be ${comparator} ${issue.maximum} characters`;
      }
      if (issue.type === 'array') {
        return `${field} must contain ${comparator} ${issue.maximum} items`;
      }
      return `${field} must be ${comparator} ${issue.maximum}`;
    }
    default:
      return issue.message || `Invalid ${field}`;
  }
}

export function normalizeValidationError(
  error: unknown,
  fallbackMessage = 'Input validation failed'
): ValidationError {
  if (error instanceof ValidationError) {
    return error;
  }

  if (error instanceof ZodError) {
    const formattedIssues = error.issues.map((issue) => formatZodIssue(issue));
    const message = formattedIssues.length === 0 ? fallbackMessage : formattedIssues.join('; ');
    return new ValidationError(message, {
      code: 'VALIDATION_SCHEMA_MISMATCH',
      cause: error,
      context: { data: { messages: formattedIssues } },
    });
  }

  if (error instanceof Error) {
    return new ValidationError(error.message, { cause: error });
  }

  return new ValidationError(fallbackMessage, { cause: error });
}
