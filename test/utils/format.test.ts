import { describe, expect, it } from "vitest";
import { formatXml } from "../../src/utils/format";

describe("formatXml", () => {
  it("puts each element on its own indented line", () => {
    expect(formatXml("<a><b>1</b><c/></a>")).toBe("<a>\n  <b>1</b>\n  <c/>\n</a>");
  });

  it("accepts a custom indent", () => {
    expect(formatXml('<a x="1"><b><c>2</c></b></a>', "\t")).toBe(
      '<a x="1">\n\t<b>\n\t\t<c>2</c>\n\t</b>\n</a>'
    );
  });
});
