import type { GeoJsonProperties, Geometry } from "geojson";
import {
  ALWAYS_DECLARED_PREFIXES,
  DEFAULT_NAMESPACES,
  DEFAULT_SCHEMA_LOCATIONS,
  DEFAULT_WFS_VERSION,
  WFS_VERSION_PATTERN
} from "../core/constants";
import { resolveLogger, type WarningLogger } from "../core/logger";
import {
  GmlError,
  MissingFeatureIdError,
  MissingTypeNameError,
  UnassignedNamespaceError,
  UnexpectedActionInputError
} from "../errors";
import { compileFilterXml, resolveFilterXml } from "../filters/compiler";
import type { WfsFilter } from "../filters/types";
import type {
  FeatureInput,
  Gml32Options,
  GmlId,
  LayerRef,
  TransactionActions,
  WfstFeature,
  WfstParams
} from "../types";
import {
  escapeXml,
  literalToXml,
  pickFirst,
  xmlAttrs,
  xmlTag,
  type XmlAttributes
} from "../utils/xml";
import { GmlIdRegistry } from "./gmlIds";
import { geometryToGml32 } from "./gml32";

interface ResolvedFeature {
  ns?: string;
  layer?: string;
  geometryName?: string;
  srsName?: string;
  whitelist?: string[];
  typeName?: string;
  properties: GeoJsonProperties;
  geometry?: Geometry | null;
  id?: GmlId;
}

const ROOT_PREFIX_ORDER = ["wfs", "gml", "fes", "xsi"];
const ELEMENT_PREFIX_PATTERN = /(?:<|typeName=")([A-Za-z_][\w.-]*):/g;

// `layer.id`, unless the id already carries a dot
export function ensureId(layer: string | undefined, id: GmlId | undefined): string | undefined {
  if (id === undefined || id === "") {
    return undefined;
  }
  const text = String(id);
  if (text.includes(".") || !layer) {
    return text;
  }
  return `${layer}.${text}`;
}

export function ensureTypeName(
  ns: string | undefined,
  layer: string | undefined,
  typeName: string | undefined
): string {
  if (typeName) {
    return typeName;
  }
  if (ns && layer) {
    return `${ns}:${layer}Type`;
  }
  throw new MissingTypeNameError({ typeName, ns, layer });
}

export function ensureArray<G extends Geometry, P extends GeoJsonProperties>(
  input: FeatureInput<G, P> | undefined | null
): WfstFeature<G, P>[] {
  if (!input) {
    return [];
  }
  if (Array.isArray(input)) {
    return input.filter((feature) => !!feature);
  }
  if ("features" in input) {
    return input.features.filter((feature) => !!feature);
  }
  return [input];
}

export function buildIdFilter(features: WfstFeature[], params: WfstParams = {}): string {
  if (features.length === 0) {
    throw new GmlError("No features to select by resource id");
  }
  const ids = features.map((feature) => {
    const id = ensureId(resolveFeature(feature, params).layer, feature.id);
    if (id === undefined) {
      throw new MissingFeatureIdError(feature);
    }
    return id;
  });
  return compileFilterXml({ op: "id", ids });
}

export function buildInsertXml(
  features: FeatureInput | undefined | null,
  params: WfstParams = {},
  ids: GmlIdRegistry = new GmlIdRegistry()
): string {
  const list = ensureArray(features);
  const logger = resolveLogger(params.logger);
  if (list.length === 0) {
    logger.warn({ action: "Insert" }, "No features supplied");
    return "";
  }

  const { inputFormat, srsName, handle } = params;
  return xmlTag(
    "wfs",
    "Insert",
    { inputFormat, srsName, handle },
    list.map((feature) => featureToXml(feature, params, logger, ids)).join("")
  );
}

/**
 * With `params.properties`, one wfs:Update applying those values to every
 * input feature through a single filter. Without, one wfs:Update per
 * feature carrying that feature's own properties and geometry.
 */
export function buildUpdateXml(
  features: FeatureInput | undefined | null,
  params: WfstParams = {},
  ids: GmlIdRegistry = new GmlIdRegistry()
): string {
  const list = ensureArray(features);
  const logger = resolveLogger(params.logger);

  if (!params.properties) {
    return list
      .map((feature) =>
        buildUpdateXml(
          feature,
          {
            ...params,
            properties: feature.properties ?? {},
            geometry: feature.geometry ?? params.geometry
          },
          ids
        )
      )
      .join("");
  }

  if (!params.filter && list.length === 0) {
    logger.warn({ action: "Update" }, "Neither features nor filter supplied");
    return "";
  }

  const resolved = resolveFeature(list[0] ?? {}, params);
  const typeName = ensureTypeName(resolved.ns, resolved.layer, resolved.typeName);

  const fields = selectProperties(resolved.whitelist, params.properties)
    .filter(([, value]) => value !== undefined)
    .map(([name, value]) => updateProperty(name, value === null ? undefined : literalToXml(value)))
    .join("");

  // only params.geometry: one feature's geometry must not be applied to all of them
  const geometryField =
    resolved.geometryName && params.geometry
      ? updateProperty(
          resolved.geometryName,
          geometryToGml32(params.geometry, geometryOptions(params, resolved.srsName, logger, ids))
        )
      : "";

  if (!fields && !geometryField) {
    logger.warn({ action: "Update", typeName }, "Nothing to update");
    return "";
  }

  const filter = ensureFilter(params.filter, list, params, logger);

  return xmlTag(
    "wfs",
    "Update",
    { inputFormat: params.inputFormat, srsName: resolved.srsName, typeName },
    `${fields}${geometryField}${filter}`
  );
}

export function buildDeleteXml(
  features: FeatureInput | undefined | null,
  params: WfstParams = {}
): string {
  const list = ensureArray(features);
  const logger = resolveLogger(params.logger);
  if (!params.filter && list.length === 0) {
    logger.warn({ action: "Delete" }, "Neither features nor filter supplied");
    return "";
  }

  const resolved = resolveFeature(list[0] ?? {}, params);
  const typeName = ensureTypeName(resolved.ns, resolved.layer, resolved.typeName);
  const filter = ensureFilter(params.filter, list, params, logger);
  return xmlTag("wfs", "Delete", { typeName }, filter);
}

export function buildTransactionXml(
  actions: TransactionActions,
  params: WfstParams = {}
): string {
  const body = assembleActions(actions, params);
  const namespaces = resolveNamespaces(body, params.nsAssignments);

  const attrs: XmlAttributes = {};
  for (const [prefix, uri] of namespaces) {
    attrs[`xmlns:${prefix}`] = uri;
  }
  attrs["xsi:schemaLocation"] = schemaLocationValue(params.schemaLocations);
  attrs.service = "WFS";
  attrs.version =
    params.version && WFS_VERSION_PATTERN.test(params.version)
      ? params.version
      : DEFAULT_WFS_VERSION;
  attrs.lockId = params.lockId;
  attrs.releaseAction = params.releaseAction;
  attrs.srsName = params.srsName;

  return `<wfs:Transaction${xmlAttrs(attrs)}>${body}</wfs:Transaction>`;
}

function assembleActions(actions: TransactionActions, params: WfstParams): string {
  if (typeof actions === "string") {
    return actions;
  }

  if (Array.isArray(actions)) {
    if (actions.every((action) => typeof action === "string")) {
      return actions.join("");
    }
    throw new UnexpectedActionInputError(actions);
  }

  if (typeof actions === "object" && actions !== null) {
    const { insert, update, delete: toDelete } = actions;
    if (insert || update || toDelete) {
      const ids = new GmlIdRegistry();
      return [
        insert ? buildInsertXml(insert, params, ids) : "",
        update ? buildUpdateXml(update, params, ids) : "",
        toDelete ? buildDeleteXml(toDelete, params) : ""
      ].join("");
    }
  }

  throw new UnexpectedActionInputError(actions);
}

// caller assignments win; fes only when the body uses it or the caller assigns it
function resolveNamespaces(
  body: string,
  nsAssignments: Record<string, string> | undefined
): Array<[string, string]> {
  const used = collectPrefixes(body);
  const assigned = Object.fromEntries(
    Object.entries(nsAssignments ?? {}).filter(([, uri]) => !!uri)
  );
  const merged: Record<string, string> = { ...DEFAULT_NAMESPACES, ...assigned };

  const declared = new Map<string, string>();
  const declare = (prefix: string): void => {
    const uri = merged[prefix];
    if (uri) {
      declared.set(prefix, uri);
    }
  };

  ALWAYS_DECLARED_PREFIXES.forEach(declare);
  if (used.has("fes")) {
    declare("fes");
  }
  Object.keys(assigned).forEach(declare);

  for (const prefix of used) {
    if (!declared.has(prefix)) {
      throw new UnassignedNamespaceError(prefix);
    }
  }

  const ordered: Array<[string, string]> = [];
  for (const prefix of ROOT_PREFIX_ORDER) {
    const uri = declared.get(prefix);
    if (uri) {
      ordered.push([prefix, uri]);
    }
  }
  const extra = [...declared.entries()]
    .filter(([prefix]) => !ROOT_PREFIX_ORDER.includes(prefix))
    .sort(([a], [b]) => a.localeCompare(b));
  return [...ordered, ...extra];
}

function collectPrefixes(xml: string): Set<string> {
  const prefixes = new Set<string>();
  for (const match of xml.matchAll(ELEMENT_PREFIX_PATTERN)) {
    const prefix = match[1];
    if (prefix) {
      prefixes.add(prefix);
    }
  }
  return prefixes;
}

function schemaLocationValue(schemaLocations: Record<string, string> | undefined): string {
  return Object.entries({ ...DEFAULT_SCHEMA_LOCATIONS, ...schemaLocations })
    .map(([uri, location]) => `${uri} ${location}`)
    .join(" ");
}

function ensureFilter(
  filter: string | WfsFilter | undefined,
  features: WfstFeature[],
  params: WfstParams,
  logger: WarningLogger
): string {
  if (filter) {
    return resolveFilterXml(filter, { srsName: params.srsName, logger });
  }
  return buildIdFilter(features, params);
}

function featureToXml(
  feature: WfstFeature,
  params: WfstParams,
  logger: WarningLogger,
  ids: GmlIdRegistry
): string {
  const { ns, layer, geometryName, geometry, srsName, properties, id, whitelist } =
    resolveFeature(feature, params);
  const featureId = ensureId(layer, id);
  ids.reserve(featureId);

  const geometryXml =
    geometryName && geometry
      ? xmlTag(
          ns,
          geometryName,
          {},
          geometryToGml32(geometry, geometryOptions(params, srsName, logger, ids))
        )
      : "";

  const propertiesXml = selectProperties(whitelist, properties)
    .filter(([, value]) => value !== undefined && value !== null && value !== "")
    .map(([name, value]) => xmlTag(ns, name, {}, literalToXml(value)))
    .join("");

  return xmlTag(
    ns,
    layer ?? "",
    { "gml:id": featureId },
    `${geometryXml}${propertiesXml}`
  );
}

function geometryOptions(
  params: WfstParams,
  srsName: string | undefined,
  logger: WarningLogger,
  ids: GmlIdRegistry
): Gml32Options {
  return {
    gmlId: ids.claim(params.gmlId),
    gmlIds: params.gmlIds?.map((memberId) => ids.claim(memberId) ?? memberId),
    srsName,
    srsDimension: params.srsDimension,
    logger
  };
}

function updateProperty(name: string, valueXml: string | undefined): string {
  return `<wfs:Property><wfs:ValueReference>${escapeXml(name)}</wfs:ValueReference>${
    valueXml === undefined ? "" : `<wfs:Value>${valueXml}</wfs:Value>`
  }</wfs:Property>`;
}

function selectProperties(
  whitelist: string[] | undefined,
  properties: GeoJsonProperties
): Array<[string, unknown]> {
  const source: Record<string, unknown> = properties ?? {};
  const names = whitelist ?? Object.keys(source);
  return names
    .filter((name) => Object.prototype.hasOwnProperty.call(source, name))
    .map((name): [string, unknown] => [name, source[name]]);
}

// layer, id, geometry and properties: params first. Everything else: feature first.
function resolveFeature(feature: WfstFeature, params: WfstParams): ResolvedFeature {
  return {
    layer: pickFirst(layerName(params.layer), layerName(feature.layer)),
    id: pickFirst(params.id, feature.id),
    geometry: pickFirst(params.geometry, feature.geometry),
    properties: pickFirst(params.properties, feature.properties) ?? null,
    ns: pickFirst(feature.ns, params.ns),
    geometryName: pickFirst(feature.geometryName, params.geometryName),
    srsName: pickFirst(feature.srsName, params.srsName),
    whitelist: pickFirst(feature.whitelist, params.whitelist),
    typeName: pickFirst(feature.typeName, params.typeName)
  };
}

function layerName(layer: LayerRef | undefined): string | undefined {
  return typeof layer === "string" ? layer : layer?.id;
}
