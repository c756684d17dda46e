import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import type { WfstClientConfig } from "../types";

export interface TransportRequest {
  url: string;
  data: string;
  headers?: Record<string, string>;
}

export interface TransportResponse {
  status: number;
  contentType: string;
  rawData: string;
  url: string;
}

// response text is handed back untouched, whatever the status
export class WfstTransport {
  private readonly client: AxiosInstance;
  private readonly defaultHeaders: Record<string, string>;
  private readonly timeoutMs?: number;

  constructor(config: WfstClientConfig) {
    this.client = config.axios ?? axios.create({});
    this.defaultHeaders = config.defaultHeaders ?? {};
    this.timeoutMs = config.timeouts?.requestMs;
  }

  async post(req: TransportRequest, auth?: AxiosRequestConfig["auth"]): Promise<TransportResponse> {
    const response = await this.client.request<unknown>({
      url: req.url,
      method: "POST",
      data: req.data,
      auth,
      headers: {
        ...this.defaultHeaders,
        ...req.headers
      },
      timeout: this.timeoutMs,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true
    });

    const contentType = String(response.headers["content-type"] ?? "");
    const rawData =
      typeof response.data === "string" ? response.data : JSON.stringify(response.data ?? "");

    return {
      status: response.status,
      contentType,
      rawData,
      url: req.url
    };
  }
}
