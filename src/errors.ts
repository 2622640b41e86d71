/**
 * Thrown when a caller breaks the API contract (wrong input types, missing
 * index). Data-quality problems in diffs or issues are never thrown; they are
 * reported as parse errors or rejected outcomes.
 */
export class ContractViolationError extends TypeError {
  override name = "ContractViolationError";
}

export class ConfigError extends Error {
  override name = "ConfigError";

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.join("\n")}` : message);
  }
}

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return typeof value;
}

/** `Array.isArray` without narrowing a typed readonly array to `any[]` */
export function isArray(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}
