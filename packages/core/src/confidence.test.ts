import { expect } from "chai";
import { scoreConfidence, type ConfidenceSignals } from "./confidence.js";
import { HEADER_CONFIRMED_THRESHOLD } from "./extraction-constants.js";

const NOTHING: ConfidenceSignals = {
  regionResolved:  false,
  regionAmbiguous: false,
  regionConfirmed: false,
  numberFound:     false,
  numberValidated: false,
  personalFields:  0,
};

describe("confidence scorer", function () {

  it("starts at the base score", function () {
    expect(scoreConfidence(NOTHING)).to.equal(0.1);
  });

  it("reaches the header threshold with a confirmed region and a validated number", function () {
    const score = scoreConfidence({
      ...NOTHING,
      regionResolved: true, regionConfirmed: true, numberFound: true, numberValidated: true,
    });
    expect(score).to.equal(0.7);
    expect(score).to.be.at.least(HEADER_CONFIRMED_THRESHOLD);
  });

  it("caps at 1", function () {
    expect(scoreConfidence({
      regionResolved: true, regionAmbiguous: false, regionConfirmed: true,
      numberFound: true, numberValidated: true, personalFields: 3,
    })).to.equal(1);
  });

  it("withholds the region bonus for an ambiguous inference", function () {
    expect(scoreConfidence({ ...NOTHING, regionResolved: true, regionAmbiguous: true })).to.equal(0.1);
    expect(scoreConfidence({ ...NOTHING, regionResolved: true })).to.equal(0.2);
  });

  it("ignores confirmation without a resolved region", function () {
    expect(scoreConfidence({ ...NOTHING, regionConfirmed: true })).to.equal(0.1);
  });

  it("counts validation only when a number was found", function () {
    expect(scoreConfidence({ ...NOTHING, numberValidated: true })).to.equal(0.1);
    expect(scoreConfidence({ ...NOTHING, numberFound: true })).to.equal(0.2);
    expect(scoreConfidence({ ...NOTHING, numberFound: true, numberValidated: true })).to.equal(0.4);
  });

  it("adds each personal field and treats negative counts as zero", function () {
    expect(scoreConfidence({ ...NOTHING, personalFields: 2 })).to.equal(0.3);
    expect(scoreConfidence({ ...NOTHING, personalFields: -1 })).to.equal(0.1);
  });

  it("never decreases when a signal is added", function () {
    const keys = ["regionResolved", "regionConfirmed", "numberFound", "numberValidated"] as const;
    for (let mask = 0; mask < 1 << keys.length; mask++) {
      const base: ConfidenceSignals = { ...NOTHING };
      keys.forEach((k, i) => { if (mask & (1 << i)) base[k] = true; });
      const before = scoreConfidence(base);
      for (const k of keys) {
        expect(scoreConfidence({ ...base, [k]: true })).to.be.at.least(before);
      }
      expect(scoreConfidence({ ...base, personalFields: base.personalFields + 1 })).to.be.at.least(before);
    }
  });
});
