import { writeCsv } from "../export/csv";
import { logger } from "../utils/logger";
import { CustomerDataExtractor } from "./extractor";
import { ORDER_COLUMN_TYPES, type OrderTable } from "./types";

const log = logger.scope("orders");

export interface OrderExtractionArgs {
  ordersFile: string;
  vipFile: string;
  outputCsv?: string;
  previewRows?: number;
}

export interface ColumnInfo {
  column: string;
  type: string;
  nonNull: number;
}

/**
 * Per-column type and non-null count.
 */
export function describeTable(table: OrderTable): ColumnInfo[] {
  return table.columns.map((column) => ({
    column,
    type: ORDER_COLUMN_TYPES[column],
    nonNull: table.rows.filter((row) => row[column] !== null).length,
  }));
}

export function runOrderExtraction(args: OrderExtractionArgs): OrderTable {
  const extractor = new CustomerDataExtractor({
    ordersFile: args.ordersFile,
    vipFile: args.vipFile,
  });
  extractor.load();
  const table = extractor.transform();

  log.info(`${table.rows.length} rows, ${table.columns.length} columns`);
  log.info("Columns", describeTable(table));
  log.info("First rows", table.rows.slice(0, args.previewRows ?? 5));

  if (args.outputCsv) {
    writeCsv(args.outputCsv, table);
    log.info(`Flattened orders written to ${args.outputCsv}`);
  }
  return table;
}
