import { describe, it } from "node:test";
import assert from "node:assert";
import { CodeRegistry } from "./registry.js";
import { UnknownCodeError } from "./errors.js";
import { asmeIx, awsD11, registerBuiltinCodes } from "../codes/index.js";

describe("CodeRegistry", () => {
  it("lists ids sorted and codes in registration order", () => {
    const reg = new CodeRegistry();
    reg.register(awsD11);
    reg.register(asmeIx);
    assert.deepStrictEqual(reg.listIds(), ["asme_ix", "aws_d1_1"]);
    assert.deepStrictEqual(reg.list().map(c => c.codeId), ["aws_d1_1", "asme_ix"]);
  });

  it("re-registering keeps the original slot", () => {
    const reg = new CodeRegistry();
    reg.register(asmeIx);
    reg.register(awsD11);
    const replacement = { ...asmeIx, codeName: "ASME IX (local)" };
    reg.register(replacement);
    assert.deepStrictEqual(reg.list().map(c => c.codeName), ["ASME IX (local)", "AWS D1.1"]);
    assert.strictEqual(reg.get("asme_ix"), replacement);
  });

  it("throws UnknownCodeError for unregistered ids", () => {
    const reg = new CodeRegistry();
    reg.register(asmeIx);
    assert.strictEqual(reg.has("nope"), false);
    assert.throws(
      () => reg.get("nope"),
      (err: unknown) =>
        err instanceof UnknownCodeError &&
        err.code === "UNKNOWN_CODE" &&
        err.message === "Unknown code 'nope'. Registered: asme_ix"
    );
  });

  it("reports an empty registry", () => {
    assert.throws(() => new CodeRegistry().get("asme_ix"), {
      message: "Unknown code 'asme_ix'. Registered: (none)"
    });
  });
});

describe("registerBuiltinCodes", () => {
  it("registers every builtin by default", () => {
    const reg = new CodeRegistry();
    registerBuiltinCodes(reg);
    assert.deepStrictEqual(reg.list().map(c => c.codeId), ["asme_ix", "aws_d1_1"]);
  });

  it("honours an enabled list", () => {
    const reg = new CodeRegistry();
    registerBuiltinCodes(reg, ["aws_d1_1"]);
    assert.deepStrictEqual(reg.listIds(), ["aws_d1_1"]);
  });

  it("rejects unknown names before registering anything", () => {
    const reg = new CodeRegistry();
    assert.throws(
      () => registerBuiltinCodes(reg, ["asme_ix", "csa_w47"]),
      (err: unknown) => err instanceof UnknownCodeError && err.knownIds.join(",") === "asme_ix,aws_d1_1"
    );
    assert.deepStrictEqual(reg.listIds(), []);
  });
});
