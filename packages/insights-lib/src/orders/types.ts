/**
 * Raw snapshot shapes. Every leaf is `unknown`: the snapshot is
 * semi-structured and the flattener parses each field defensively.
 */
export interface RawItem {
  item_id?: unknown;
  product_name?: unknown;
  category?: unknown;
  price?: unknown;
  quantity?: unknown;
  [key: string]: unknown;
}

export interface RawOrder {
  order_id?: unknown;
  order_date?: unknown;
  items?: unknown;
  [key: string]: unknown;
}

export interface RawCustomer {
  id?: unknown;
  name?: unknown;
  registration_date?: unknown;
  orders?: unknown;
  [key: string]: unknown;
}

export type CategoryLabel =
  | "Electronics"
  | "Apparel"
  | "Books"
  | "Home Goods"
  | "Misc";

export type CategoryTable = ReadonlyMap<number, CategoryLabel>;

export const DEFAULT_CATEGORY: CategoryLabel = "Misc";

export const CATEGORY_LABELS: CategoryTable = new Map<number, CategoryLabel>([
  [1, "Electronics"],
  [2, "Apparel"],
  [3, "Books"],
  [4, "Home Goods"],
]);

export type ColumnType = "int64" | "float64" | "string" | "bool" | "datetime";

export interface ColumnValueMap {
  int64: number;
  float64: number;
  string: string;
  bool: boolean;
  datetime: Date | null;
}

export type ColumnValue<T extends ColumnType> = ColumnValueMap[T];

/**
 * Type contract of the output table, in column order.
 */
export const ORDER_COLUMN_TYPES = Object.freeze({
  customer_id: "int64",
  customer_name: "string",
  registration_date: "datetime",
  is_vip: "bool",
  order_id: "int64",
  order_date: "datetime",
  product_id: "int64",
  product_name: "string",
  category: "string",
  unit_price: "float64",
  item_quantity: "int64",
  total_item_price: "float64",
  total_order_value_percentage: "float64",
} as const satisfies Record<string, ColumnType>);

export type OrderColumnTypes = typeof ORDER_COLUMN_TYPES;

export type OrderColumn = keyof OrderColumnTypes;

/**
 * One row per (customer, order, item).
 */
export type OrderRow = {
  [K in OrderColumn]: ColumnValue<OrderColumnTypes[K]>;
};

/**
 * A row as assembled, before its columns are checked against the contract.
 */
export type UntypedRow = { readonly [K in OrderColumn]?: unknown };

export const ORDER_COLUMNS: readonly OrderColumn[] = Object.freeze([
  "customer_id",
  "customer_name",
  "registration_date",
  "is_vip",
  "order_id",
  "order_date",
  "product_id",
  "product_name",
  "category",
  "unit_price",
  "item_quantity",
  "total_item_price",
  "total_order_value_percentage",
]);

/**
 * Final table. A row's index is its array position.
 */
export interface OrderTable {
  columns: readonly OrderColumn[];
  rows: readonly Readonly<OrderRow>[];
}
