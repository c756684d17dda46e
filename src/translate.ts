import { parseFeatureInput, parseGeometry, parseJson } from "./parsers/geojson";
import { geometryToGml2 } from "./serializers/gml2";
import { geometryToGml32 } from "./serializers/gml32";
import { buildTransactionXml } from "./serializers/wfst";
import type { Gml2Options, Gml32Options, WfstParams } from "./types";
import { formatXml } from "./utils/format";

export type TranslationTarget = "gml2" | "gml32" | "wfst";

export interface TranslateOptions {
  gml2?: Gml2Options;
  gml32?: Gml32Options;
  wfst?: WfstParams;
  pretty?: boolean;
}

// gml2/gml32 take a geometry; wfst takes a feature, an array of them or a collection
export function translateGeoJson(
  text: string,
  target: TranslationTarget,
  options: TranslateOptions = {}
): string {
  const value = parseJson(text);
  const xml = translateValue(value, target, options);
  return options.pretty === false ? xml : formatXml(xml);
}

function translateValue(value: unknown, target: TranslationTarget, options: TranslateOptions): string {
  switch (target) {
    case "gml2":
      return geometryToGml2(parseGeometry(value), options.gml2);
    case "gml32":
      return geometryToGml32(parseGeometry(value), options.gml32);
    case "wfst":
      return buildTransactionXml({ insert: parseFeatureInput(value) }, options.wfst);
  }
}
