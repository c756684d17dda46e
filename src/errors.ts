export type WfstOperation = "Transaction";

export class GmlError extends Error {
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "GmlError";
    this.context = context;
  }
}

export class UnsupportedGeometryTypeError extends GmlError {
  readonly geometryType: string;

  constructor(geometryType: string) {
    super(`Unsupported geometry type "${geometryType}"`, { geometryType });
    this.name = "UnsupportedGeometryTypeError";
    this.geometryType = geometryType;
  }
}

export class UntypedMemberError extends GmlError {
  readonly member: unknown;

  constructor(member: unknown) {
    super(`Un-typed collection member ${JSON.stringify(member)}`, { member });
    this.name = "UntypedMemberError";
    this.member = member;
  }
}

export class UnassignedNamespaceError extends GmlError {
  readonly prefix: string;

  constructor(prefix: string) {
    super(
      `Unassigned namespace "${prefix}". Provide its URI via nsAssignments.`,
      { prefix }
    );
    this.name = "UnassignedNamespaceError";
    this.prefix = prefix;
  }
}

export class MissingTypeNameError extends GmlError {
  constructor(context: { typeName?: string; ns?: string; layer?: string }) {
    super(`No typeName possible: ${JSON.stringify(context)}`, context);
    this.name = "MissingTypeNameError";
  }
}

export class MissingFeatureIdError extends GmlError {
  readonly feature: unknown;

  constructor(feature: unknown) {
    super(`Feature without id cannot be selected by resource id: ${JSON.stringify(feature)}`, {
      feature
    });
    this.name = "MissingFeatureIdError";
    this.feature = feature;
  }
}

export class UnexpectedActionInputError extends GmlError {
  readonly actions: unknown;

  constructor(actions: unknown) {
    super(`Unexpected transaction actions: ${JSON.stringify(actions)}`, { actions });
    this.name = "UnexpectedActionInputError";
    this.actions = actions;
  }
}

export interface GeoJsonInputIssue {
  path: Array<string | number>;
  message: string;
}

export class GeoJsonInputError extends GmlError {
  readonly issues: GeoJsonInputIssue[];

  constructor(message: string, issues: GeoJsonInputIssue[] = []) {
    super(message, { issues });
    this.name = "GeoJsonInputError";
    this.issues = issues;
  }
}

export interface WfsErrorContext {
  operation: WfstOperation;
  version?: string;
  url?: string;
  method?: "GET" | "POST";
  status?: number;
}

export class WfsError extends Error {
  readonly context: WfsErrorContext;

  constructor(message: string, context: WfsErrorContext) {
    super(message);
    this.name = "WfsError";
    this.context = context;
  }
}

export interface OwsException {
  exceptionCode?: string;
  locator?: string;
  text: string;
}

export class OwsExceptionError extends WfsError {
  readonly exceptions: OwsException[];
  readonly rawPayload: unknown;

  constructor(
    message: string,
    context: WfsErrorContext,
    exceptions: OwsException[],
    rawPayload: unknown
  ) {
    super(message, context);
    this.name = "OwsExceptionError";
    this.exceptions = exceptions;
    this.rawPayload = rawPayload;
  }
}

export function isOwsExceptionError(error: unknown): error is OwsExceptionError {
  return error instanceof OwsExceptionError;
}
