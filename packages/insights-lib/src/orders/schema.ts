import { SchemaEnforcementError } from "../errors";
import {
  ORDER_COLUMNS,
  ORDER_COLUMN_TYPES,
  type ColumnType,
  type ColumnValue,
  type OrderColumn,
  type OrderColumnTypes,
  type OrderRow,
  type OrderTable,
  type UntypedRow,
} from "./types";
import { parseTimestampText } from "./valueParsers";

/**
 * Each coercer returns `undefined` when the value cannot be represented in
 * its column type.
 */
type Coercers = {
  [T in ColumnType]: (value: unknown) => ColumnValue<T> | undefined;
};

const COERCERS: Coercers = {
  int64: (value) =>
    typeof value === "number" && Number.isSafeInteger(value) ?
      value
    : undefined,
  float64: (value) =>
    typeof value === "number" && Number.isFinite(value) ? value : undefined,
  string: (value) => (typeof value === "string" ? value : undefined),
  bool: (value) => (typeof value === "boolean" ? value : undefined),
  datetime: (value) => {
    if (value === null || value === undefined) return null;
    const date =
      value instanceof Date ? value
      : typeof value === "string" ? parseTimestampText(value)
      : undefined;
    return date && !Number.isNaN(date.getTime()) ? date : undefined;
  },
};

export function coerceValue<T extends ColumnType>(
  type: T,
  value: unknown,
): ColumnValue<T> | undefined {
  const coerce: Coercers[T] = COERCERS[type];
  return coerce(value);
}

function coerceField<K extends OrderColumn>(
  row: UntypedRow,
  column: K,
  rowIndex: number,
): ColumnValue<OrderColumnTypes[K]> {
  const expected = ORDER_COLUMN_TYPES[column];
  const coerced = coerceValue(expected, row[column]);
  if (coerced === undefined) {
    throw new SchemaEnforcementError(rowIndex, column, expected, row[column]);
  }
  return coerced;
}

/**
 * Applies the fixed column contract to every row.
 *
 * @throws {SchemaEnforcementError} on the first value that does not fit its
 * column. Values reaching this stage come from the flattener, so a failure
 * is a contract violation upstream and is never defaulted.
 */
export function enforceSchema(
  rows: readonly UntypedRow[],
): Readonly<OrderRow>[] {
  return rows.map((row, index) =>
    Object.freeze({
      customer_id: coerceField(row, "customer_id", index),
      customer_name: coerceField(row, "customer_name", index),
      registration_date: coerceField(row, "registration_date", index),
      is_vip: coerceField(row, "is_vip", index),
      order_id: coerceField(row, "order_id", index),
      order_date: coerceField(row, "order_date", index),
      product_id: coerceField(row, "product_id", index),
      product_name: coerceField(row, "product_name", index),
      category: coerceField(row, "category", index),
      unit_price: coerceField(row, "unit_price", index),
      item_quantity: coerceField(row, "item_quantity", index),
      total_item_price: coerceField(row, "total_item_price", index),
      total_order_value_percentage: coerceField(
        row,
        "total_order_value_percentage",
        index,
      ),
    }),
  );
}

export function compareOrderRows(
  a: Readonly<OrderRow>,
  b: Readonly<OrderRow>,
): number {
  return (
    a.customer_id - b.customer_id ||
    a.order_id - b.order_id ||
    a.product_id - b.product_id
  );
}

/**
 * Stable sort by (customer_id, order_id, product_id). Returns a new array;
 * positions in it are the dense row index 0..n-1.
 */
export function sortRows(
  rows: readonly Readonly<OrderRow>[],
): Readonly<OrderRow>[] {
  return [...rows].sort(compareOrderRows);
}

/**
 * Enforce the column contract, then sort.
 */
export function buildOrderTable(rows: readonly UntypedRow[]): OrderTable {
  return {
    columns: ORDER_COLUMNS,
    rows: Object.freeze(sortRows(enforceSchema(rows))),
  };
}
