import { describe, it } from "node:test";
import assert from "node:assert";
import { findCaseIdTag, generateCaseId } from "./case-id.js";

describe("generateCaseId", () => {
  it("should encode the UTC time and a random suffix", () => {
    const id = generateCaseId(new Date("2024-05-10T07:08:09.123Z"));
    assert.match(id, /^CASE_20240510_070809_[0-9A-Z]{6}$/);
  });

  it("should not repeat for the same second", () => {
    const now = new Date("2024-05-10T07:08:09.000Z");
    const ids = new Set(Array.from({ length: 200 }, () => generateCaseId(now)));
    assert.strictEqual(ids.size, 200);
  });
});

describe("findCaseIdTag", () => {
  it("should pull a case id out of a reply subject", () => {
    assert.strictEqual(findCaseIdTag("Re: [CASE_20240510_070809_AB12CD] Printer jam"), "CASE_20240510_070809_AB12CD");
  });

  it("should pull a case id out of quoted notification text", () => {
    assert.strictEqual(findCaseIdTag("> *Customer x* (Case #CASE_20240101_000000_ZZZZZZ):"), "CASE_20240101_000000_ZZZZZZ");
  });

  it("should return null when there is no tag", () => {
    assert.strictEqual(findCaseIdTag("Re: Printer jam"), null);
  });
});
