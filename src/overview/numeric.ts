import { known, unavailable, type MetricValue } from "../contracts/overview_report";

// Plain decimal grammar. Rejects "inf", "nan", hex and empty strings, which
// Number() would otherwise accept or coerce to 0.
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function parseDecimal(raw: string | number): MetricValue<number> {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? known(raw) : unavailable("malformed_field");
  }
  const text = raw.trim();
  if (!DECIMAL_PATTERN.test(text)) {
    return unavailable("malformed_field");
  }
  const value = Number(text);
  return Number.isFinite(value) ? known(value) : unavailable("malformed_field");
}

/**
 * Read a numeric field from a flat record. A missing key and an unparseable
 * value are kept apart so the report can say which one happened.
 */
export function readDecimalField(
  record: Readonly<Record<string, string | number>>,
  field: string
): MetricValue<number> {
  if (!Object.prototype.hasOwnProperty.call(record, field)) {
    return unavailable("missing_field");
  }
  return parseDecimal(record[field]);
}

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(3)}s`;
}

export function formatPercent(percent: number): string {
  return `${percent.toFixed(2)}%`;
}
