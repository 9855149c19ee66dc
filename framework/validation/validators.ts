/**
 * Field Validators
 *
 * Small composable checks for request payloads. A validator returns an
 * error message, or null when the value passes.
 */

export type Validator = (value: unknown, field: string) => string | null;

export type ValidationSchema = Record<string, Validator[]>;

export const validators = {
  /**
   * Reject a missing or null value
   */
  required(): Validator {
    return (value, field) => {
      if (value === undefined || value === null) {
        return `${field} is required`;
      }
      return null;
    };
  },

  /**
   * Reject a present value that is not a string
   */
  string(): Validator {
    return (value, field) => {
      if (value !== undefined && value !== null && typeof value !== 'string') {
        return `${field} must be a string`;
      }
      return null;
    };
  },
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Run a schema over an object. Fields are checked in schema order and
 * each field reports at most its first failure.
 */
export function validate(data: Record<string, unknown>, schema: ValidationSchema): string[] {
  const errors: string[] = [];

  for (const [field, checks] of Object.entries(schema)) {
    for (const check of checks) {
      const error = check(data[field], field);
      if (error) {
        errors.push(error);
        break;
      }
    }
  }

  return errors;
}
