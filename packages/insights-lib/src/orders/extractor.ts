import fs from "node:fs";
import { z } from "zod";
import { SourceLoadError } from "../errors";
import { logger } from "../utils/logger";
import { flattenCustomers } from "./flatten";
import { buildOrderTable } from "./schema";
import { CATEGORY_LABELS, type OrderTable, type RawCustomer } from "./types";
import { loadVipIds } from "./vipLoader";

const log = logger.scope("orders");

/**
 * Only the outer shape is checked here; field-level leniency is the
 * flattener's job.
 */
const CustomerSnapshotSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * Reads a JSON snapshot holding an array of customer records.
 *
 * @throws {SourceLoadError} with `source: "orders"` when the file is
 * unreadable, not JSON, or not an array of objects
 */
export function loadCustomerSnapshot(filePath: string): RawCustomer[] {
  try {
    const content = fs.readFileSync(filePath, "utf-8");
    const customers = CustomerSnapshotSchema.parse(JSON.parse(content));
    log.debug(`Loaded ${customers.length} customers from ${filePath}`);
    return customers;
  } catch (error) {
    throw new SourceLoadError("orders", filePath, error);
  }
}

export interface CustomerDataExtractorOptions {
  ordersFile: string;
  vipFile: string;
}

/**
 * Loads customer orders plus the VIP list and flattens them into an
 * {@link OrderTable}.
 *
 * @example
 * ```ts
 * const extractor = new CustomerDataExtractor({
 *   ordersFile: "customer_orders.json",
 *   vipFile: "vip_customers.txt",
 * });
 * extractor.load();
 * const table = extractor.transform();
 * ```
 */
export class CustomerDataExtractor {
  readonly ordersFile: string;
  readonly vipFile: string;
  private rawData: RawCustomer[] = [];
  private vipIds: ReadonlySet<number> = new Set();

  constructor(options: CustomerDataExtractorOptions) {
    this.ordersFile = options.ordersFile;
    this.vipFile = options.vipFile;
  }

  /**
   * Orders first, then the VIP list. Either failure aborts the load.
   */
  load(): void {
    this.rawData = loadCustomerSnapshot(this.ordersFile);
    this.vipIds = loadVipIds(this.vipFile);
    log.info(
      `Loaded ${this.rawData.length} customers and ${this.vipIds.size} VIP ids`,
    );
  }

  transform(): OrderTable {
    const rows = flattenCustomers(this.rawData, this.vipIds, CATEGORY_LABELS);
    const table = buildOrderTable(rows);
    log.info(`Flattened ${table.rows.length} order items`);
    return table;
  }
}
