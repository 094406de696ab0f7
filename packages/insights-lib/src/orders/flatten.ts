import {
  CATEGORY_LABELS,
  DEFAULT_CATEGORY,
  type CategoryTable,
  type OrderRow,
  type RawCustomer,
  type RawItem,
  type RawOrder,
} from "./types";
import {
  parsePrice,
  parseText,
  parseTimestamp,
  toInt,
} from "./valueParsers";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Nested collections that are missing or not arrays read as empty. Non-object
 * entries are skipped.
 */
function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

export function categoryLabel(
  code: unknown,
  categories: CategoryTable = CATEGORY_LABELS,
): string {
  return typeof code === "number" ?
      (categories.get(code) ?? DEFAULT_CATEGORY)
    : DEFAULT_CATEGORY;
}

function itemTotal(item: RawItem): number {
  return parsePrice(item.price) * toInt(item.quantity);
}

/**
 * Sum of price × quantity over the order's items.
 */
export function orderTotal(items: readonly RawItem[]): number {
  return items.reduce((sum, item) => sum + itemTotal(item), 0);
}

/**
 * Rows of a single customer, in nesting order. Customers are independent of
 * each other, so callers may flatten them in any order.
 */
export function flattenCustomer(
  customer: RawCustomer,
  vipIds: ReadonlySet<number>,
  categories: CategoryTable = CATEGORY_LABELS,
): Readonly<OrderRow>[] {
  const customerId = toInt(customer.id);
  const customerName = parseText(customer.name);
  const registrationDate = parseTimestamp(customer.registration_date);
  const isVip = vipIds.has(customerId);

  const orders: RawOrder[] = records(customer.orders);
  const rows: Readonly<OrderRow>[] = [];
  for (const order of orders) {
    const orderId = toInt(order.order_id);
    const orderDate = parseTimestamp(order.order_date);
    const items: RawItem[] = records(order.items);
    // Every percentage below depends on the whole order.
    const total = orderTotal(items);

    for (const item of items) {
      const unitPrice = parsePrice(item.price);
      const quantity = toInt(item.quantity);
      const totalItemPrice = unitPrice * quantity;

      rows.push(
        Object.freeze({
          customer_id: customerId,
          customer_name: customerName,
          registration_date: registrationDate,
          is_vip: isVip,
          order_id: orderId,
          order_date: orderDate,
          product_id: toInt(item.item_id),
          product_name: parseText(item.product_name),
          category: categoryLabel(item.category, categories),
          unit_price: unitPrice,
          item_quantity: quantity,
          total_item_price: totalItemPrice,
          total_order_value_percentage:
            total > 0 ? (totalItemPrice / total) * 100 : 0,
        }),
      );
    }
  }
  return rows;
}

/**
 * Flattens customer → order → item records into one row per item.
 */
export function flattenCustomers(
  customers: readonly RawCustomer[],
  vipIds: ReadonlySet<number>,
  categories: CategoryTable = CATEGORY_LABELS,
): Readonly<OrderRow>[] {
  return customers.flatMap((customer) =>
    flattenCustomer(customer, vipIds, categories),
  );
}
