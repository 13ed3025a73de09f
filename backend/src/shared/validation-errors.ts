import { badInput, toHttpException } from './outcome';

/** The part of a class-validator `ValidationError` read here. */
export interface FieldViolation {
  property: string;
  constraints?: Record<string, string>;
  children?: FieldViolation[];
}

// Type mismatches explain a value better than the length or size checks
// that fail alongside them.
const LEADING_CONSTRAINTS = ['isDefined', 'isInt', 'isString', 'isArray'];

function childPath(parent: string, property: string): string {
  if (/^\d+$/.test(property)) {
    return `${parent}[${property}]`;
  }
  return parent ? `${parent}.${property}` : property;
}

function firstViolation(
  violations: readonly FieldViolation[],
  parent = '',
): { field: string; message: string } | null {
  for (const violation of violations) {
    const field = childPath(parent, violation.property);
    const constraints = violation.constraints ?? {};
    const key =
      LEADING_CONSTRAINTS.find((name) => name in constraints) ??
      Object.keys(constraints)[0];
    if (key !== undefined) {
      return { field, message: constraints[key] };
    }
    const nested = firstViolation(violation.children ?? [], field);
    if (nested) {
      return nested;
    }
  }
  return null;
}

/**
 * `ValidationPipe` exception factory: reports the first failing field in the
 * same body the endpoints use for BadInput.
 */
export function toValidationException(violations: FieldViolation[]) {
  const first = firstViolation(violations);
  if (!first) {
    return toHttpException(badInput('Request body is invalid.'));
  }
  return toHttpException(badInput(first.message, first.field));
}
