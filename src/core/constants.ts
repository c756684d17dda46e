export const DEFAULT_WFS_VERSION = "2.0.0";

export const WFS_VERSION_PATTERN = /^2\.0\.\d+$/;

export const DEFAULT_GML2_SRS_NAME = "EPSG:4326";

export const DEFAULT_NAMESPACES: Readonly<Record<string, string>> = {
  wfs: "http://www.opengis.net/wfs/2.0",
  gml: "http://www.opengis.net/gml/3.2",
  fes: "http://www.opengis.net/fes/2.0",
  xsi: "http://www.w3.org/2001/XMLSchema-instance"
};

// fes is only declared on a transaction when the body uses it
export const ALWAYS_DECLARED_PREFIXES = ["wfs", "gml", "xsi"];

export const DEFAULT_SCHEMA_LOCATIONS: Readonly<Record<string, string>> = {
  "http://www.opengis.net/wfs/2.0": "http://schemas.opengis.net/wfs/2.0/wfs.xsd"
};

export const TRANSACTION_CONTENT_TYPE = "text/xml; charset=UTF-8";
