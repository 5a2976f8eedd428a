// src/lib/form.utils.ts

/**
 * Reads a form field as a string. Missing or non-string values become ''.
 */
export const formField = (body: unknown, name: string, { trim = true } = {}): string => {
  if (typeof body !== 'object' || body === null || !(name in body)) {
    return '';
  }
  const value: unknown = Reflect.get(body, name);
  if (typeof value !== 'string') {
    return '';
  }
  return trim ? value.trim() : value;
};

/**
 * Reads every named field (trimmed). Returns null if any of them is blank.
 */
export const requiredFields = <F extends string>(body: unknown, names: readonly F[]): Record<F, string> | null => {
  const values: Partial<Record<F, string>> = {};
  for (const name of names) {
    const value = formField(body, name);
    if (!value) {
      return null;
    }
    values[name] = value;
  }
  return isComplete(values, names) ? values : null;
};

const isComplete = <F extends string>(values: Partial<Record<F, string>>, names: readonly F[]): values is Record<F, string> =>
  names.every((name) => typeof values[name] === 'string');

export const MISSING_FIELDS_ERROR = 'Please fill in all fields.';
