import type { Geometry, Position } from "geojson";
import { UnsupportedGeometryTypeError, UntypedMemberError } from "../errors";

// only reachable with input that bypassed the type system, e.g. parsed JSON
export function unsupportedGeometry(geometry: never): never {
  const value: unknown = geometry;
  const type =
    typeof value === "object" && value !== null && "type" in value
      ? value.type
      : undefined;
  throw new UnsupportedGeometryTypeError(String(type));
}

export function assertTypedMember(member: Geometry): void {
  const value: unknown = member;
  if (
    typeof value !== "object" ||
    value === null ||
    !("type" in value) ||
    typeof value.type !== "string" ||
    !value.type
  ) {
    throw new UntypedMemberError(member);
  }
}

export function collectPositions(geometry: Geometry, out: Position[] = []): Position[] {
  switch (geometry.type) {
    case "Point":
      out.push(geometry.coordinates);
      break;
    case "LineString":
    case "MultiPoint":
      out.push(...geometry.coordinates);
      break;
    case "Polygon":
    case "MultiLineString":
      for (const line of geometry.coordinates) {
        out.push(...line);
      }
      break;
    case "MultiPolygon":
      for (const polygon of geometry.coordinates) {
        for (const ring of polygon) {
          out.push(...ring);
        }
      }
      break;
    case "GeometryCollection":
      for (const member of geometry.geometries) {
        collectPositions(member, out);
      }
      break;
    default:
      return unsupportedGeometry(geometry);
  }
  return out;
}
