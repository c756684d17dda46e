import { describe, expect, it, vi } from "vitest";
import { GmlError } from "../../src/errors";
import { compileFilterXml, resolveFilterXml } from "../../src/filters/compiler";

describe("compileFilterXml", () => {
  it("compiles resource id filters", () => {
    expect(compileFilterXml({ op: "id", ids: ["roads.1", "roads.2"] })).toBe(
      '<fes:Filter><fes:ResourceId rid="roads.1"/><fes:ResourceId rid="roads.2"/></fes:Filter>'
    );
  });

  it("refuses an empty resource id filter", () => {
    expect(() => compileFilterXml({ op: "id", ids: [] })).toThrow(GmlError);
    expect(() => compileFilterXml({ op: "id", ids: [] })).toThrow(
      "A resource id filter needs at least one id"
    );
  });

  it("writes bbox corners northing first", () => {
    const xml = compileFilterXml(
      {
        op: "bbox",
        property: "the_geom",
        geometry: {
          type: "Polygon",
          coordinates: [[[0, 1], [4, 1], [4, 5], [0, 5], [0, 1]]]
        }
      },
      { srsName: "EPSG:4326" }
    );

    expect(xml).toBe(
      '<fes:Filter><fes:BBOX><fes:ValueReference>the_geom</fes:ValueReference><gml:Envelope srsName="EPSG:4326"><gml:lowerCorner>1 0</gml:lowerCorner><gml:upperCorner>5 4</gml:upperCorner></gml:Envelope></fes:BBOX></fes:Filter>'
    );
  });

  it("embeds GML 3.2 geometry in spatial operators", () => {
    const logger = { warn: vi.fn() };
    const xml = compileFilterXml(
      {
        op: "intersects",
        property: "the_geom",
        geometry: { type: "Point", coordinates: [-72.5, 42.3] },
        gmlId: "f1"
      },
      { logger }
    );

    expect(xml).toBe(
      '<fes:Filter><fes:Intersects><fes:ValueReference>the_geom</fes:ValueReference><gml:Point gml:id="f1"><gml:pos>42.3 -72.5</gml:pos></gml:Point></fes:Intersects></fes:Filter>'
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe("resolveFilterXml", () => {
  it("passes pre-built filters through", () => {
    const raw = '<fes:Filter><fes:ResourceId rid="roads.9"/></fes:Filter>';
    expect(resolveFilterXml(raw)).toBe(raw);
  });
});
