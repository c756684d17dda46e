export { WfstClient, createWfstClient } from "./client/WfstClient";
export { default as WfstClientDefault } from "./client/WfstClient";

export {
  GmlError,
  UnsupportedGeometryTypeError,
  UntypedMemberError,
  UnassignedNamespaceError,
  MissingTypeNameError,
  MissingFeatureIdError,
  UnexpectedActionInputError,
  GeoJsonInputError,
  WfsError,
  OwsExceptionError,
  isOwsExceptionError,
  type GeoJsonInputIssue,
  type OwsException
} from "./errors";

export {
  DEFAULT_NAMESPACES,
  DEFAULT_SCHEMA_LOCATIONS,
  DEFAULT_WFS_VERSION
} from "./core/constants";
export { logger, type WarningLogger } from "./core/logger";

export { geometryToGml2 } from "./serializers/gml2";
export { geometryToGml32 } from "./serializers/gml32";
export { GmlIdRegistry } from "./serializers/gmlIds";
export {
  buildDeleteXml,
  buildIdFilter,
  buildInsertXml,
  buildTransactionXml,
  buildUpdateXml,
  ensureId,
  ensureTypeName
} from "./serializers/wfst";

export { compileFilterXml, resolveFilterXml } from "./filters/compiler";
export type {
  ResourceIdFilter,
  SpatialFilter,
  SpatialOperator,
  WfsFilter
} from "./filters/types";

export { parseTransactionResult } from "./parsers/transaction";
export { translateGeoJson, type TranslateOptions, type TranslationTarget } from "./translate";
export { formatXml } from "./utils/format";

export type {
  ActionResult,
  FeatureInput,
  Gml2Options,
  Gml32Options,
  GmlId,
  LayerRef,
  SrsDimension,
  TransactionActionSet,
  TransactionActions,
  TransactionResult,
  WfstClientConfig,
  WfstFeature,
  WfstFeatureCollection,
  WfstParams
} from "./types";
