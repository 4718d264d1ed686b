import type { z } from 'zod';

/** One entry of a 422 response body */
export interface ValidationErrorDetail {
  /** Where the error is, starting with the request part ('query', 'body', ...) */
  loc: (string | number)[];
  msg: string;
  type: string;
}

export interface ValidationErrorBody {
  detail: ValidationErrorDetail[];
}

function valueAt(input: unknown, path: PropertyKey[]): unknown {
  let current = input;
  for (const segment of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

/**
 * Converts a zod error into a 422 body listing location, message and type of
 * every issue. Absent fields are reported as `missing` / 'Field required'.
 *
 * @param error - Error from a failed `safeParse`
 * @param input - The value that was parsed
 * @param location - Request part the input came from
 * @returns Body for a 422 response
 */
export function formatValidationErrors(
  error: z.ZodError,
  input: unknown,
  location: 'query' | 'body' | 'path' | 'header',
): ValidationErrorBody {
  return {
    detail: error.issues.map((issue) => {
      const loc = [
        location,
        ...issue.path.map((segment) =>
          typeof segment === 'symbol' ? segment.toString() : segment,
        ),
      ];
      if (issue.code === 'invalid_type' && valueAt(input, issue.path) === undefined) {
        return { loc, msg: 'Field required', type: 'missing' };
      }
      return { loc, msg: issue.message, type: issue.code };
    }),
  };
}
