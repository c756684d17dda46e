import type { AxiosInstance, AxiosRequestConfig } from "axios";
import type { GeoJsonProperties, Geometry } from "geojson";
import type { WarningLogger } from "./core/logger";
import type { WfsFilter } from "./filters/types";

export type GmlId = string | number;

export type SrsDimension = 2 | 3 | "2" | "3";

export interface Gml2Options {
  /** Defaults to EPSG:4326; `null` leaves the attribute out. */
  srsName?: string | null;
}

export interface Gml32Options {
  gmlId?: GmlId;
  gmlIds?: GmlId[];
  srsName?: string;
  srsDimension?: SrsDimension;
  logger?: WarningLogger;
}

export type LayerRef = string | { id: string };

/**
 * A GeoJSON feature whose optional foreign members override the matching
 * transaction params (except `layer`, `id`, `geometry` and `properties`,
 * which params override).
 */
export interface WfstFeature<
  G extends Geometry = Geometry,
  P extends GeoJsonProperties = GeoJsonProperties
> {
  type?: "Feature";
  id?: GmlId;
  geometry?: G | null;
  properties?: P;
  layer?: LayerRef;
  ns?: string;
  geometryName?: string;
  srsName?: string;
  whitelist?: string[];
  typeName?: string;
}

export interface WfstFeatureCollection<
  G extends Geometry = Geometry,
  P extends GeoJsonProperties = GeoJsonProperties
> {
  type: "FeatureCollection";
  features: WfstFeature<G, P>[];
}

export type FeatureInput<
  G extends Geometry = Geometry,
  P extends GeoJsonProperties = GeoJsonProperties
> = WfstFeature<G, P> | WfstFeature<G, P>[] | WfstFeatureCollection<G, P>;

export interface WfstParams {
  ns?: string;
  layer?: LayerRef;
  geometryName?: string;
  properties?: GeoJsonProperties;
  geometry?: Geometry | null;
  id?: GmlId;
  gmlId?: GmlId;
  gmlIds?: GmlId[];
  whitelist?: string[];
  inputFormat?: string;
  srsName?: string;
  srsDimension?: SrsDimension;
  handle?: string;
  filter?: string | WfsFilter;
  typeName?: string;
  schemaLocations?: Record<string, string>;
  nsAssignments?: Record<string, string>;
  lockId?: string;
  releaseAction?: "ALL" | "SOME";
  version?: string;
  logger?: WarningLogger;
}

export interface TransactionActionSet<
  G extends Geometry = Geometry,
  P extends GeoJsonProperties = GeoJsonProperties
> {
  insert?: FeatureInput<G, P>;
  update?: FeatureInput<G, P>;
  delete?: FeatureInput<G, P>;
}

export type TransactionActions<
  G extends Geometry = Geometry,
  P extends GeoJsonProperties = GeoJsonProperties
> = string | string[] | TransactionActionSet<G, P>;

export interface WfstClientConfig {
  baseUrl: string;
  axios?: AxiosInstance;
  defaultHeaders?: Record<string, string>;
  auth?: AxiosRequestConfig["auth"];
  namespaces?: Record<string, string>;
  schemaLocations?: Record<string, string>;
  timeouts?: {
    requestMs?: number;
  };
  logger?: WarningLogger;
}

export interface ActionResult {
  handle?: string;
  resourceIds: string[];
}

export interface TransactionResult {
  totalInserted?: number;
  totalUpdated?: number;
  totalReplaced?: number;
  totalDeleted?: number;
  insertResults: ActionResult[];
  updateResults: ActionResult[];
  replaceResults: ActionResult[];
  raw: unknown;
}
