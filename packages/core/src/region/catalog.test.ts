import { expect } from "chai";
import { ZodError } from "zod";
import { UnknownRegionError } from "../errors.js";
import { allRegions, findRegion, lookup, parseCatalog, regionCount } from "./catalog.js";

describe("region catalog", function () {

  // ── Shipped data ───────────────────────────────────────────────────────────

  it("loads every region from regions.json", function () {
    expect(regionCount()).to.equal(30);
    expect(allRegions()).to.have.length(30);
  });

  it("keeps regions sorted by code", function () {
    const codes = allRegions().map(r => r.code);
    expect(codes).to.deep.equal([...codes].sort());
    expect(codes[0]).to.equal("AZ");
    expect(codes[codes.length - 1]).to.equal("WV");
  });

  it("has unique codes and names", function () {
    const regions = allRegions();
    expect(new Set(regions.map(r => r.code)).size).to.equal(regions.length);
    expect(new Set(regions.map(r => r.name.toUpperCase())).size).to.equal(regions.length);
  });

  it("is frozen", function () {
    const ca = lookup("CA");
    expect(Object.isFrozen(allRegions())).to.equal(true);
    expect(Object.isFrozen(ca)).to.equal(true);
    expect(Object.isFrozen(ca.rule)).to.equal(true);
    expect(Object.isFrozen(ca.rule[0])).to.equal(true);
  });

  // ── Lookup ─────────────────────────────────────────────────────────────────

  it("looks up a region by code", function () {
    const ca = lookup("CA");
    expect(ca.name).to.equal("California");
    expect(ca.rule).to.deep.equal([
      { charClass: "letter", count: 1 },
      { charClass: "digit",  count: 7 },
    ]);
  });

  it("ignores case and surrounding whitespace", function () {
    expect(lookup(" ny ").code).to.equal("NY");
    expect(findRegion("tx")?.name).to.equal("Texas");
  });

  it("throws UnknownRegionError for codes outside the catalog", function () {
    expect(() => lookup("ZZ")).to.throw(UnknownRegionError, 'Unknown region code: "ZZ"');
    try {
      lookup("ZZ");
    } catch (err) {
      expect(err).to.be.instanceOf(UnknownRegionError);
      if (err instanceof UnknownRegionError) {
        expect(err.code).to.equal("UNKNOWN_REGION");
        expect(err.regionCode).to.equal("ZZ");
      }
    }
  });

  it("returns undefined from findRegion for unknown codes", function () {
    expect(findRegion("ZZ")).to.equal(undefined);
    expect(findRegion("")).to.equal(undefined);
  });

  // ── Validation ─────────────────────────────────────────────────────────────

  it("sorts parsed data by code", function () {
    const regions = parseCatalog([
      { code: "TX", name: "Texas",    rule: [{ charClass: "digit", count: 8 }] },
      { code: "AZ", name: "Arizona",  rule: [{ charClass: "letter", count: 1 }, { charClass: "digit", count: 8 }] },
    ]);
    expect(regions.map(r => r.code)).to.deep.equal(["AZ", "TX"]);
  });

  it("rejects duplicate codes", function () {
    expect(() => parseCatalog([
      { code: "TX", name: "Texas",  rule: [{ charClass: "digit", count: 8 }] },
      { code: "TX", name: "Tejas",  rule: [{ charClass: "digit", count: 8 }] },
    ])).to.throw(ZodError, "duplicate code TX");
  });

  it("rejects duplicate names regardless of case", function () {
    expect(() => parseCatalog([
      { code: "TX", name: "Texas", rule: [{ charClass: "digit", count: 8 }] },
      { code: "TE", name: "TEXAS", rule: [{ charClass: "digit", count: 8 }] },
    ])).to.throw(ZodError, "duplicate name TEXAS");
  });

  it("rejects malformed entries", function () {
    expect(() => parseCatalog([])).to.throw(ZodError);
    expect(() => parseCatalog([{ code: "tx", name: "Texas", rule: [{ charClass: "digit", count: 8 }] }])).to.throw(ZodError);
    expect(() => parseCatalog([{ code: "TX", name: "Texas", rule: [] }])).to.throw(ZodError);
    expect(() => parseCatalog([{ code: "TX", name: "Texas", rule: [{ charClass: "symbol", count: 8 }] }])).to.throw(ZodError);
    expect(() => parseCatalog([{ code: "TX", name: "Texas", rule: [{ charClass: "digit", count: 0 }] }])).to.throw(ZodError);
  });
});
