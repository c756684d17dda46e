import type { GeoJsonProperties, Geometry } from "geojson";
import { DEFAULT_WFS_VERSION, TRANSACTION_CONTENT_TYPE, WFS_VERSION_PATTERN } from "../core/constants";
import { WfstTransport, type TransportResponse } from "../core/transport";
import { OwsExceptionError, type OwsException } from "../errors";
import { parseOwsExceptionPayload } from "../parsers/owsException";
import { parseTransactionResult } from "../parsers/transaction";
import { buildTransactionXml } from "../serializers/wfst";
import type {
  TransactionActions,
  TransactionResult,
  WfstClientConfig,
  WfstParams
} from "../types";

export class WfstClient {
  private readonly config: WfstClientConfig;
  private readonly transport: WfstTransport;

  constructor(config: WfstClientConfig) {
    this.config = config;
    this.transport = new WfstTransport(config);
  }

  buildTransaction<G extends Geometry = Geometry, P extends GeoJsonProperties = GeoJsonProperties>(
    actions: TransactionActions<G, P>,
    params: WfstParams = {}
  ): string {
    return buildTransactionXml(actions, this.withDefaults(params));
  }

  async transaction<G extends Geometry = Geometry, P extends GeoJsonProperties = GeoJsonProperties>(
    actions: TransactionActions<G, P>,
    params: WfstParams = {}
  ): Promise<TransactionResult> {
    const resolved = this.withDefaults(params);
    const xml = buildTransactionXml(actions, resolved);

    const response = await this.transport.post(
      {
        url: this.config.baseUrl,
        data: xml,
        headers: { "Content-Type": TRANSACTION_CONTENT_TYPE }
      },
      this.config.auth
    );

    this.ensureNoError(response, resolved.version);
    return parseTransactionResult(response.rawData);
  }

  private withDefaults(params: WfstParams): WfstParams {
    return {
      ...params,
      logger: params.logger ?? this.config.logger,
      nsAssignments: { ...this.config.namespaces, ...params.nsAssignments },
      schemaLocations: { ...this.config.schemaLocations, ...params.schemaLocations }
    };
  }

  private ensureNoError(response: TransportResponse, version: string | undefined): void {
    const owsExceptions = parseOwsExceptionPayload(response.rawData);

    if (response.status >= 400 || owsExceptions.length > 0) {
      const exceptions =
        owsExceptions.length > 0 ? owsExceptions : this.defaultException(response.status);
      throw new OwsExceptionError(
        `WFS Transaction failed with status ${response.status}`,
        {
          operation: "Transaction",
          version: version && WFS_VERSION_PATTERN.test(version) ? version : DEFAULT_WFS_VERSION,
          url: response.url,
          method: "POST",
          status: response.status
        },
        exceptions,
        response.rawData
      );
    }
  }

  private defaultException(status: number): OwsException[] {
    return [
      {
        exceptionCode: "HTTP_ERROR",
        text: `HTTP request failed with status ${status}`
      }
    ];
  }
}

export function createWfstClient(config: WfstClientConfig): WfstClient {
  return new WfstClient(config);
}

export default WfstClient;
