import { describe, expect, it } from "vitest";
import { GmlIdRegistry } from "../../src/serializers/gmlIds";

describe("GmlIdRegistry", () => {
  it("suffixes ids already handed out", () => {
    const ids = new GmlIdRegistry();

    expect(ids.claim("a")).toBe("a");
    expect(ids.claim("a")).toBe("a.2");
    expect(ids.claim("a")).toBe("a.3");
    expect(ids.claim(7)).toBe("7");
  });

  it("skips reserved ids and leaves missing ones missing", () => {
    const ids = new GmlIdRegistry();
    ids.reserve("b");
    ids.reserve("b.2");

    expect(ids.claim("b")).toBe("b.3");
    expect(ids.claim(undefined)).toBeUndefined();
    expect(ids.claim("")).toBeUndefined();
  });
});
