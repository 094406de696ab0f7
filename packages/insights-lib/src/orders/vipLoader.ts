import fs from "node:fs";
import { SourceLoadError } from "../errors";
import { logger } from "../utils/logger";

const log = logger.scope("vip");

const DIGITS = /^\d+$/;

/**
 * Collects the customer ids of a VIP list. Lines that are not purely decimal
 * digits after trimming are skipped.
 */
export function parseVipLines(lines: Iterable<string>): Set<number> {
  const ids = new Set<number>();
  for (const line of lines) {
    const trimmed = line.trim();
    if (DIGITS.test(trimmed)) {
      ids.add(Number(trimmed));
    }
  }
  return ids;
}

/**
 * Reads a VIP list file, one id per line.
 *
 * @throws {SourceLoadError} with `source: "vip"` when the file cannot be read
 */
export function loadVipIds(filePath: string): Set<number> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new SourceLoadError("vip", filePath, error);
  }
  const ids = parseVipLines(content.split(/\r?\n/));
  log.debug(`Loaded ${ids.size} VIP ids from ${filePath}`);
  return ids;
}
