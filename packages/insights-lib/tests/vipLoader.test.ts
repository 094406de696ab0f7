import { expect } from "chai";
import * as path from "node:path";
import { SourceLoadError } from "../src/errors";
import { loadVipIds, parseVipLines } from "../src/orders/vipLoader";

const fixtures = path.resolve(__dirname, "fixtures");

describe("VIP loader", () => {
  describe("parseVipLines", () => {
    it("should keep digit-only lines and skip the rest", () => {
      const ids = parseVipLines(["42\n", "  7", "x9", ""]);
      expect([...ids].sort((a, b) => a - b)).to.deep.equal([7, 42]);
    });

    it("should deduplicate repeated ids", () => {
      expect(parseVipLines(["5", "05", " 5 "]).size).to.equal(1);
    });

    it("should skip signed and decimal numbers", () => {
      expect(parseVipLines(["-3", "+4", "1.5"]).size).to.equal(0);
    });
  });

  describe("loadVipIds", () => {
    it("should read one id per line", () => {
      const ids = loadVipIds(path.join(fixtures, "vip_customers.txt"));
      expect([...ids].sort((a, b) => a - b)).to.deep.equal([1, 2]);
    });

    it("should raise a VIP source error when the file is missing", () => {
      const missing = path.join(fixtures, "missing_vips.txt");
      expect(() => loadVipIds(missing))
        .to.throw(SourceLoadError, "Failed to load VIP customer IDs")
        .with.property("source", "vip");
    });
  });
});
