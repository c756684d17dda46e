import type { Geometry } from "geojson";
import type { WarningLogger } from "../core/logger";
import { GmlError } from "../errors";
import { collectPositions } from "../serializers/geometry";
import { geometryToGml32 } from "../serializers/gml32";
import { escapeXml, xmlAttr } from "../utils/xml";
import type { ResourceIdFilter, SpatialFilter, SpatialOperator, WfsFilter } from "./types";

export interface CompileFilterOptions {
  srsName?: string;
  logger?: WarningLogger;
}

const SPATIAL_ELEMENTS: Record<SpatialOperator, string> = {
  bbox: "BBOX",
  intersects: "Intersects",
  within: "Within",
  contains: "Contains",
  disjoint: "Disjoint",
  touches: "Touches",
  overlaps: "Overlaps",
  crosses: "Crosses"
};

export function compileFilterXml(filter: WfsFilter, options: CompileFilterOptions = {}): string {
  const body = filter.op === "id" ? resourceIds(filter) : spatialOperator(filter, options);
  return `<fes:Filter>${body}</fes:Filter>`;
}

// pre-built filter strings pass through untouched
export function resolveFilterXml(
  filter: string | WfsFilter,
  options: CompileFilterOptions = {}
): string {
  return typeof filter === "string" ? filter : compileFilterXml(filter, options);
}

function resourceIds(filter: ResourceIdFilter): string {
  if (filter.ids.length === 0) {
    throw new GmlError("A resource id filter needs at least one id", { filter });
  }
  return filter.ids.map((rid) => `<fes:ResourceId rid="${escapeXml(rid)}"/>`).join("");
}

function spatialOperator(filter: SpatialFilter, options: CompileFilterOptions): string {
  const element = SPATIAL_ELEMENTS[filter.op];
  const srsName = filter.srsName ?? options.srsName;
  const reference = `<fes:ValueReference>${escapeXml(filter.property)}</fes:ValueReference>`;

  const operand =
    filter.op === "bbox"
      ? envelope(filter.geometry, srsName)
      : geometryToGml32(filter.geometry, { gmlId: filter.gmlId, srsName, logger: options.logger });

  return `<fes:${element}>${reference}${operand}</fes:${element}>`;
}

// corners follow the same northing-first order as gml:pos
function envelope(geometry: Geometry, srsName: string | undefined): string {
  const positions = collectPositions(geometry);
  if (positions.length === 0) {
    throw new GmlError("Cannot take the extent of an empty geometry", { geometryType: geometry.type });
  }

  const xs = positions.map(([x = 0]) => x);
  const ys = positions.map(([, y = 0]) => y);
  return `<gml:Envelope${xmlAttr("srsName", srsName)}><gml:lowerCorner>${Math.min(...ys)} ${Math.min(
    ...xs
  )}</gml:lowerCorner><gml:upperCorner>${Math.max(...ys)} ${Math.max(
    ...xs
  )}</gml:upperCorner></gml:Envelope>`;
}
