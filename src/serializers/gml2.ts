import type {
  Geometry,
  GeometryCollection,
  Position
} from "geojson";
import { DEFAULT_GML2_SRS_NAME } from "../core/constants";
import type { Gml2Options } from "../types";
import { escapeXml, xmlAttr } from "../utils/xml";
import { assertTypedMember, unsupportedGeometry } from "./geometry";

/*
 * GML 2.1.2 simple features. Coordinates are written as one
 * gml:coordinates text node in input axis order.
 */

const COORDINATES_OPEN = '<gml:coordinates cs="," ts=" " decimal=".">';
const COORDINATES_CLOSE = "</gml:coordinates>";

export function geometryToGml2(geometry: Geometry, options: Gml2Options = {}): string {
  const srsName =
    options.srsName === undefined ? DEFAULT_GML2_SRS_NAME : options.srsName ?? undefined;
  return convert(geometry, srsName);
}

function convert(geometry: Geometry, srsName: string | undefined): string {
  switch (geometry.type) {
    case "Point":
      return pointToGml2(geometry.coordinates, srsName);
    case "LineString":
      return lineStringToGml2(geometry.coordinates, srsName);
    case "Polygon":
      return polygonToGml2(geometry.coordinates, srsName);
    case "MultiPoint":
      return multi(
        "MultiPoint",
        "pointMember",
        geometry.coordinates.map((point) => pointToGml2(point)),
        srsName
      );
    case "MultiLineString":
      return multi(
        "MultiLineString",
        "lineStringMember",
        geometry.coordinates.map((line) => lineStringToGml2(line)),
        srsName
      );
    case "MultiPolygon":
      return multi(
        "MultiPolygon",
        "polygonMember",
        geometry.coordinates.map((polygon) => polygonToGml2(polygon)),
        srsName
      );
    case "GeometryCollection":
      return geometryCollectionToGml2(geometry, srsName);
    default:
      return unsupportedGeometry(geometry);
  }
}

export function pointToGml2(position: Position, srsName?: string): string {
  return `<gml:Point${xmlAttr("srsName", srsName)}>${COORDINATES_OPEN}${tuple(
    position
  )}${COORDINATES_CLOSE}</gml:Point>`;
}

export function lineStringToGml2(positions: Position[], srsName?: string): string {
  return `<gml:LineString${xmlAttr("srsName", srsName)}>${COORDINATES_OPEN}${tuples(
    positions
  )}${COORDINATES_CLOSE}</gml:LineString>`;
}

export function linearRingToGml2(positions: Position[], srsName?: string): string {
  return `<gml:LinearRing${xmlAttr("srsName", srsName)}>${COORDINATES_OPEN}${tuples(
    positions
  )}${COORDINATES_CLOSE}</gml:LinearRing>`;
}

export function polygonToGml2(rings: Position[][], srsName?: string): string {
  const [outer = [], ...inners] = rings;

  return `<gml:Polygon${xmlAttr(
    "srsName",
    srsName
  )}><gml:outerBoundaryIs>${linearRingToGml2(outer)}</gml:outerBoundaryIs>${inners
    .map((inner) => `<gml:innerBoundaryIs>${linearRingToGml2(inner)}</gml:innerBoundaryIs>`)
    .join("")}</gml:Polygon>`;
}

function geometryCollectionToGml2(
  collection: GeometryCollection,
  srsName: string | undefined
): string {
  return `<gml:MultiGeometry${xmlAttr("srsName", srsName)}>${collection.geometries
    .map((member) => {
      assertTypedMember(member);
      const memberTag = collectionMemberTag(member.type);
      return `<gml:${memberTag}>${convert(member, undefined)}</gml:${memberTag}>`;
    })
    .join("")}</gml:MultiGeometry>`;
}

// pointMember, multiPolygonMember, ...; a nested collection is a plain geometryMember
function collectionMemberTag(type: Geometry["type"]): string {
  if (type === "GeometryCollection") {
    return "geometryMember";
  }
  return `${type.charAt(0).toLowerCase()}${type.slice(1)}Member`;
}

function multi(
  name: string,
  memberTag: string,
  members: string[],
  srsName: string | undefined
): string {
  return `<gml:${name}${xmlAttr("srsName", srsName)}>${members
    .map((member) => `<gml:${memberTag}>${member}</gml:${memberTag}>`)
    .join("")}</gml:${name}>`;
}

function tuple(position: Position): string {
  return escapeXml(position.join(","));
}

function tuples(positions: Position[]): string {
  return positions.map(tuple).join(" ");
}
