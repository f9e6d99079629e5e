const PLACEHOLDER_PATTERN = /\{(\w+)\}/g;

function stringify(value: unknown): string | null {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }

  return null;
}

/** Replaces `{name}` tokens with scalar values from `values`; unknown tokens are left as written. */
export function fillPlaceholders(template: string, values: Record<string, unknown>): string {
  return template.replace(PLACEHOLDER_PATTERN, (token, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, name)) {
      return token;
    }

    return stringify(values[name]) ?? token;
  });
}
