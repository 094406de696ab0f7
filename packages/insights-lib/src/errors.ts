/**
 * Base class for every fatal error raised by the toolkit.
 */
export class InsightsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InsightsError";
  }
}

/**
 * Error thrown when configuration cannot be found or parsed
 */
export class ConfigError extends InsightsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export type SourceKind = "orders" | "vip" | "chat-logs";

const SOURCE_LABELS: Record<SourceKind, string> = {
  orders: "Failed to load orders file",
  vip: "Failed to load VIP customer IDs",
  "chat-logs": "Failed to load chat logs",
};

/**
 * An input source could not be read or decoded. `source` tells the caller
 * which one.
 */
export class SourceLoadError extends InsightsError {
  readonly source: SourceKind;
  readonly path: string;

  constructor(source: SourceKind, path: string, cause: unknown) {
    super(`${SOURCE_LABELS[source]}: ${describeCause(cause)}`, { cause });
    this.name = "SourceLoadError";
    this.source = source;
    this.path = path;
  }
}

/**
 * A flattened value does not fit its column type. Raised only after
 * flattening, where every value should already be well typed.
 */
export class SchemaEnforcementError extends InsightsError {
  readonly column: string;
  readonly rowIndex: number;
  readonly expected: string;
  readonly value: unknown;

  constructor(
    rowIndex: number,
    column: string,
    expected: string,
    value: unknown,
  ) {
    super(
      `Cannot coerce column "${column}" at row ${rowIndex} to ${expected}: got ${describeValue(value)}`,
    );
    this.name = "SchemaEnforcementError";
    this.column = column;
    this.rowIndex = rowIndex;
    this.expected = expected;
    this.value = value;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function describeValue(value: unknown): string {
  if (value instanceof Date) {
    return `Date(${Number.isNaN(value.getTime()) ? "Invalid" : value.toISOString()})`;
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  return String(value);
}
