import { readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  isLikelyOwsExceptionPayload,
  parseOwsExceptionPayload
} from "../../src/parsers/owsException";

const xml = readFileSync(
  join(process.cwd(), "test/fixtures/exception-report.xml"),
  "utf8"
);

describe("OWS exception parser", () => {
  it("parses XML exception reports", () => {
    expect(parseOwsExceptionPayload(xml)).toEqual([
      {
        exceptionCode: "InvalidParameterValue",
        locator: "typeName",
        text: "Feature type topp:roadsType unknown"
      }
    ]);
  });

  it("detects likely exception payloads", () => {
    expect(isLikelyOwsExceptionPayload(xml)).toBe(true);
    expect(isLikelyOwsExceptionPayload("<wfs:TransactionResponse/>")).toBe(false);
    expect(isLikelyOwsExceptionPayload({ error: "ExceptionReport" })).toBe(false);
  });

  it("falls back to a generic text", () => {
    expect(parseOwsExceptionPayload('<ows:ExceptionReport><ows:Exception exceptionCode="NoApplicableCode"/></ows:ExceptionReport>')).toEqual([
      { exceptionCode: "NoApplicableCode", locator: undefined, text: "Unknown OWS exception" }
    ]);
  });
});
