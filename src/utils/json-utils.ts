// Central JSON helpers so parse/stringify failures are logged in one place.

/**
 * Safely parses a JSON string, returning `fallback` when the text is not valid JSON.
 */
export const safeJsonParse = (jsonString: string, fallback: unknown = null): unknown => {
  try {
    const parsed: unknown = JSON.parse(jsonString);
    return parsed;
  } catch (error) {
    console.error('Failed to parse JSON string:', error);
    return fallback;
  }
};

/**
 * Converts a value to a JSON string. Returns an empty string when the value cannot be serialized.
 */
export const safeJsonStringify = (value: unknown, space?: string | number): string => {
  try {
    return JSON.stringify(value, null, space);
  } catch (error) {
    console.error('Failed to stringify value:', error);
    return '';
  }
};
