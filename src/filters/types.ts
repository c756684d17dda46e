import type { Geometry } from "geojson";

export type SpatialOperator =
  | "bbox"
  | "intersects"
  | "within"
  | "contains"
  | "disjoint"
  | "touches"
  | "overlaps"
  | "crosses";

// rids are written as given; buildIdFilter qualifies them by layer
export interface ResourceIdFilter {
  op: "id";
  ids: string[];
}

export interface SpatialFilter {
  op: SpatialOperator;
  property: string;
  geometry: Geometry;
  srsName?: string;
  gmlId?: string;
}

export type WfsFilter = ResourceIdFilter | SpatialFilter;
