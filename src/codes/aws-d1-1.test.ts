import { describe, it } from "node:test";
import assert from "node:assert";
import { awsD11 } from "./aws-d1-1.js";
import { bound, compareBounds, UNLIMITED } from "../core/bounds.js";

describe("aws_d1_1", () => {
  it("applies to welder qualifications only", () => {
    assert.deepStrictEqual([...awsD11.formTypes], ["wpq"]);
  });

  it("thickness tiers", () => {
    assert.deepStrictEqual(awsD11.deriveThickness({ coupon_thickness: 0.1 }, "wpq"), {
      min: bound(0.1),
      max: bound(0.1),
      reference: "Table 6.11"
    });
    assert.deepStrictEqual(awsD11.deriveThickness({ coupon_thickness: 0.375 }, "wpq"), {
      min: bound(0.125),
      max: bound(0.75),
      reference: "Table 6.11"
    });
    assert.deepStrictEqual(awsD11.deriveThickness({ coupon_thickness: 1.5 }, "wpq"), {
      min: bound(0.125),
      max: UNLIMITED,
      reference: "Table 6.11"
    });
  });

  it("every thickness tier contains the coupon", () => {
    for (const t of [0.05, 0.125, 0.5, 0.99, 1, 3]) {
      const r = awsD11.deriveThickness({ coupon_thickness: t }, "wpq");
      assert.ok(r, `no range for ${t}`);
      assert.ok(compareBounds(r.min, bound(t)) <= 0, `min above ${t}`);
      assert.ok(compareBounds(bound(t), r.max) <= 0, `max below ${t}`);
    }
  });

  it("diameter tiers", () => {
    assert.deepStrictEqual(awsD11.deriveDiameter({ coupon_diameter: "2" }, "wpq"), {
      min: bound(2),
      max: bound(4),
      reference: "Table 6.11"
    });
    assert.deepStrictEqual(awsD11.deriveDiameter({ coupon_diameter: "6.625" }, "wpq"), {
      min: bound(4),
      max: UNLIMITED,
      reference: "Table 6.11"
    });
    assert.strictEqual(awsD11.deriveDiameter({}, "wpq"), null);
  });

  it("positions follow Table 6.10", () => {
    assert.deepStrictEqual(awsD11.derivePositions({ test_position: "5G" }, "wpq"), {
      groove: "1G, 2G, 3G, 4G, 5G",
      fillet: "All",
      reference: "Table 6.10"
    });
  });

  it("backing", () => {
    assert.deepStrictEqual(awsD11.deriveBacking({ backing_actual: "single sided, no backing" }, "wpq"), {
      backingType: "With or Without",
      reference: "Clause 6.16"
    });
  });

  it("has no supplemental rules", () => {
    assert.deepStrictEqual(awsD11.deriveSupplemental({ f_number_actual: "F4" }, "wpq"), {});
  });
});
