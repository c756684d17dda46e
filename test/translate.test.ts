import { describe, expect, it, vi } from "vitest";
import { GeoJsonInputError } from "../src/errors";
import { translateGeoJson } from "../src/translate";

describe("translateGeoJson", () => {
  it("translates a geometry to compact GML 2", () => {
    expect(
      translateGeoJson('{"type":"Point","coordinates":[-72.5,42.3]}', "gml2", {
        gml2: { srsName: null },
        pretty: false
      })
    ).toBe(
      '<gml:Point><gml:coordinates cs="," ts=" " decimal=".">-72.5,42.3</gml:coordinates></gml:Point>'
    );
  });

  it("indents GML 3.2 output by default", () => {
    const logger = { warn: vi.fn() };

    expect(
      translateGeoJson('{"type":"Point","coordinates":[-72.5,42.3]}', "gml32", {
        gml32: { gmlId: "p", logger }
      })
    ).toBe('<gml:Point gml:id="p">\n  <gml:pos>42.3 -72.5</gml:pos>\n</gml:Point>');
  });

  it("translates features to a WFS-T insert", () => {
    const xml = translateGeoJson(
      '{"type":"Feature","id":"7","geometry":null,"properties":{"name":"x"}}',
      "wfst",
      {
        wfst: { ns: "topp", layer: "roads", nsAssignments: { topp: "http://www.openplans.org/topp" } },
        pretty: false
      }
    );

    expect(xml).toContain('<wfs:Insert><topp:roads gml:id="roads.7"><topp:name>x</topp:name></topp:roads></wfs:Insert>');
  });

  it("rejects malformed JSON", () => {
    expect(() => translateGeoJson("{", "gml2")).toThrow(GeoJsonInputError);
    expect(() => translateGeoJson("{", "gml2")).toThrow(/^Invalid JSON: /);
  });

  it("reports schema issues for invalid geometries", () => {
    let caught: unknown;
    try {
      translateGeoJson('{"type":"Point","coordinates":[1]}', "gml2");
    } catch (error) {
      caught = error;
    }

    if (!(caught instanceof GeoJsonInputError)) {
      throw new Error("expected GeoJsonInputError");
    }
    expect(caught.message).toBe("Invalid GeoJSON geometry");
    expect(caught.issues.length).toBeGreaterThan(0);
  });

  it("rejects mixed coordinate dimensions", () => {
    expect(() =>
      translateGeoJson('{"type":"LineString","coordinates":[[1,2],[3,4,5]]}', "gml2")
    ).toThrow("Mixed coordinate dimensions 2/3 in one LineString");
  });
});
