import type { Geometry, GeometryCollection, Position } from "geojson";
import { resolveLogger, type WarningLogger } from "../core/logger";
import type { Gml32Options, GmlId, SrsDimension } from "../types";
import { escapeXml, xmlAttr, xmlAttrs } from "../utils/xml";
import { assertTypedMember, unsupportedGeometry } from "./geometry";

interface Gml32Context {
  srsName?: string;
  srsDimension?: SrsDimension;
  gmlIds?: GmlId[];
  logger: WarningLogger;
}

// pos and posList are northing first: every GeoJSON position is reversed
export function geometryToGml32(geometry: Geometry, options: Gml32Options = {}): string {
  return convert(geometry, options.gmlId, {
    srsName: options.srsName,
    srsDimension: options.srsDimension,
    gmlIds: options.gmlIds,
    logger: resolveLogger(options.logger)
  });
}

function convert(geometry: Geometry, gmlId: GmlId | undefined, ctx: Gml32Context): string {
  switch (geometry.type) {
    case "Point":
      return pointToGml32(geometry.coordinates, gmlId, ctx);
    case "LineString":
      return lineStringToGml32(geometry.coordinates, gmlId, ctx);
    case "Polygon":
      return polygonToGml32(geometry.coordinates, gmlId, ctx);
    case "MultiPoint":
      return multi("MultiPoint", "pointMember", geometry.coordinates, gmlId, ctx, pointToGml32);
    case "MultiLineString":
      return multi(
        "MultiCurve",
        "curveMember",
        geometry.coordinates,
        gmlId,
        ctx,
        lineStringToGml32
      );
    case "MultiPolygon":
      return multi(
        "MultiSurface",
        "surfaceMember",
        geometry.coordinates,
        gmlId,
        ctx,
        polygonToGml32
      );
    case "GeometryCollection":
      return geometryCollectionToGml32(geometry, gmlId, ctx);
    default:
      return unsupportedGeometry(geometry);
  }
}

function pointToGml32(position: Position, gmlId: GmlId | undefined, ctx: Gml32Context): string {
  enforceGmlId(gmlId, "Point", ctx.logger);
  return `<gml:Point${xmlAttrs({
    srsName: ctx.srsName,
    "gml:id": gmlId
  })}><gml:pos${xmlAttr("srsDimension", ctx.srsDimension)}>${reversed(
    position
  )}</gml:pos></gml:Point>`;
}

function lineStringToGml32(
  positions: Position[],
  gmlId: GmlId | undefined,
  ctx: Gml32Context
): string {
  enforceGmlId(gmlId, "LineString", ctx.logger);
  return `<gml:LineString${xmlAttrs({
    srsName: ctx.srsName,
    "gml:id": gmlId
  })}>${posList(positions, ctx)}</gml:LineString>`;
}

function polygonToGml32(
  rings: Position[][],
  gmlId: GmlId | undefined,
  ctx: Gml32Context
): string {
  enforceGmlId(gmlId, "Polygon", ctx.logger);
  const [outer = [], ...inners] = rings;

  return `<gml:Polygon${xmlAttrs({
    srsName: ctx.srsName,
    "gml:id": gmlId
  })}><gml:exterior>${linearRing(outer, ctx)}</gml:exterior>${inners
    .map((inner) => `<gml:interior>${linearRing(inner, ctx)}</gml:interior>`)
    .join("")}</gml:Polygon>`;
}

// Rings are parts of their polygon, not standalone geometries: no id, no srsName.
function linearRing(positions: Position[], ctx: Gml32Context): string {
  return `<gml:LinearRing>${posList(positions, ctx)}</gml:LinearRing>`;
}

function multi<T>(
  name: string,
  memberTag: string,
  members: T[],
  gmlId: GmlId | undefined,
  ctx: Gml32Context,
  convertMember: (member: T, memberId: GmlId | undefined, ctx: Gml32Context) => string
): string {
  enforceGmlId(gmlId, name, ctx.logger);
  const gmlIds = ctx.gmlIds ?? [];
  const memberCtx: Gml32Context = { ...ctx, gmlIds: undefined };

  return `<gml:${name}${xmlAttrs({
    srsName: ctx.srsName,
    "gml:id": gmlId
  })}>${members
    .map(
      (member, index) =>
        `<gml:${memberTag}>${convertMember(member, gmlIds[index], memberCtx)}</gml:${memberTag}>`
    )
    .join("")}</gml:${name}>`;
}

function geometryCollectionToGml32(
  collection: GeometryCollection,
  gmlId: GmlId | undefined,
  ctx: Gml32Context
): string {
  return multi(
    "MultiGeometry",
    "geometryMember",
    collection.geometries,
    gmlId,
    ctx,
    (member, memberId, memberCtx) => {
      assertTypedMember(member);
      return convert(member, memberId, memberCtx);
    }
  );
}

function enforceGmlId(gmlId: GmlId | undefined, geometryType: string, logger: WarningLogger): void {
  if (gmlId === undefined || gmlId === "") {
    logger.warn({ geometryType }, "No gmlId supplied");
  }
}

function posList(positions: Position[], ctx: Gml32Context): string {
  return `<gml:posList${xmlAttr("srsDimension", ctx.srsDimension)}>${positions
    .map(reversed)
    .join(" ")}</gml:posList>`;
}

function reversed(position: Position): string {
  return escapeXml([...position].reverse().join(" "));
}
