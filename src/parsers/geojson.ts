import type { Geometry } from "geojson";
import { z } from "zod";
import { GeoJsonInputError } from "../errors";
import { collectPositions } from "../serializers/geometry";
import type { FeatureInput, WfstFeature } from "../types";

const positionSchema = z.array(z.number()).min(2).max(3);
const lineSchema = z.array(positionSchema).min(2);
const ringSchema = z.array(positionSchema);
const polygonSchema = z.array(ringSchema).min(1);

export const geometrySchema: z.ZodType<Geometry> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("Point"), coordinates: positionSchema }),
    z.object({ type: z.literal("LineString"), coordinates: lineSchema }),
    z.object({ type: z.literal("Polygon"), coordinates: polygonSchema }),
    z.object({ type: z.literal("MultiPoint"), coordinates: z.array(positionSchema) }),
    z.object({ type: z.literal("MultiLineString"), coordinates: z.array(lineSchema) }),
    z.object({ type: z.literal("MultiPolygon"), coordinates: z.array(polygonSchema) }),
    z.object({
      type: z.literal("GeometryCollection"),
      geometries: z.array(geometrySchema)
    })
  ])
);

const layerSchema = z.union([z.string(), z.object({ id: z.string() })]);

export const featureSchema = z.object({
  type: z.literal("Feature").optional(),
  id: z.union([z.string(), z.number()]).optional(),
  geometry: geometrySchema.nullable().optional(),
  properties: z.record(z.unknown()).nullable().optional(),
  layer: layerSchema.optional(),
  ns: z.string().optional(),
  geometryName: z.string().optional(),
  srsName: z.string().optional(),
  whitelist: z.array(z.string()).optional(),
  typeName: z.string().optional()
});

export const featureInputSchema = z.union([
  z.object({ type: z.literal("FeatureCollection"), features: z.array(featureSchema) }),
  z.array(featureSchema),
  featureSchema
]);

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GeoJsonInputError(`Invalid JSON: ${reason}`);
  }
}

export function parseGeometry(value: unknown): Geometry {
  const result = geometrySchema.safeParse(value);
  if (!result.success) {
    throw new GeoJsonInputError("Invalid GeoJSON geometry", issuesOf(result.error));
  }
  assertConsistentDimensions(result.data);
  return result.data;
}

export function parseFeatureInput(value: unknown): FeatureInput {
  const result = featureInputSchema.safeParse(value);
  if (!result.success) {
    throw new GeoJsonInputError("Invalid GeoJSON feature input", issuesOf(result.error));
  }

  const features: WfstFeature[] = Array.isArray(result.data)
    ? result.data
    : "features" in result.data
      ? result.data.features
      : [result.data];
  for (const feature of features) {
    if (feature.geometry) {
      assertConsistentDimensions(feature.geometry);
    }
  }
  return result.data;
}

function assertConsistentDimensions(geometry: Geometry): void {
  const dimensions = new Set(collectPositions(geometry).map((position) => position.length));
  if (dimensions.size > 1) {
    throw new GeoJsonInputError(
      `Mixed coordinate dimensions ${[...dimensions].sort().join("/")} in one ${geometry.type}`
    );
  }
}

function issuesOf(error: z.ZodError): GeoJsonInputError["issues"] {
  return error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
}
