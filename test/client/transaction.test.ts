import { readFileSync } from "node:fs";
import { join } from "node:path";
import axios, { type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it, vi } from "vitest";
import { WfstClient } from "../../src/client/WfstClient";
import { OwsExceptionError, isOwsExceptionError } from "../../src/errors";

const transactionXml = readFileSync(
  join(process.cwd(), "test/fixtures/transaction-response.xml"),
  "utf8"
);

const exceptionXml = readFileSync(
  join(process.cwd(), "test/fixtures/exception-report.xml"),
  "utf8"
);

type Responder = (config: InternalAxiosRequestConfig) => { status: number; data: string };

function createMockAxios(respond: Responder) {
  const adapter = vi.fn(
    async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const { status, data } = respond(config);
      return {
        data,
        status,
        statusText: String(status),
        headers: { "content-type": "text/xml" },
        config,
        request: {}
      };
    }
  );
  return { instance: axios.create({ adapter }), adapter };
}

const TOPP = "http://www.openplans.org/topp";

describe("WfstClient#transaction", () => {
  it("posts the transaction and parses the response", async () => {
    const { instance, adapter } = createMockAxios(() => ({ status: 200, data: transactionXml }));
    const client = new WfstClient({
      baseUrl: "https://example.com/wfs",
      axios: instance,
      namespaces: { topp: TOPP },
      defaultHeaders: { "X-Client": "test" },
      timeouts: { requestMs: 5000 }
    });

    const result = await client.transaction(
      { insert: [{ id: "10", properties: { name: "Main St" } }] },
      { ns: "topp", layer: "roads" }
    );

    expect(adapter).toHaveBeenCalledTimes(1);
    const config = adapter.mock.calls[0]?.[0];
    expect(config?.method).toBe("post");
    expect(config?.url).toBe("https://example.com/wfs");
    expect(String(config?.headers.get("content-type"))).toBe("text/xml; charset=UTF-8");
    expect(String(config?.headers.get("x-client"))).toBe("test");
    expect(config?.timeout).toBe(5000);
    expect(config?.data).toContain(
      '<wfs:Insert><topp:roads gml:id="roads.10"><topp:name>Main St</topp:name></topp:roads></wfs:Insert>'
    );
    expect(config?.data).toContain('xmlns:topp="http://www.openplans.org/topp"');

    expect(result.totalInserted).toBe(1);
    expect(result.insertResults[0]?.resourceIds).toEqual(["roads.10"]);
  });

  it("raises exception reports as OwsExceptionError", async () => {
    const { instance } = createMockAxios(() => ({ status: 200, data: exceptionXml }));
    const client = new WfstClient({ baseUrl: "https://example.com/wfs", axios: instance });

    const error = await client
      .transaction(['<wfs:Native vendorId="v" safeToIgnore="true"/>'], { version: "2.0.2" })
      .catch((reason: unknown) => reason);

    expect(isOwsExceptionError(error)).toBe(true);
    if (!(error instanceof OwsExceptionError)) {
      throw new Error("expected OwsExceptionError");
    }
    expect(error.message).toBe("WFS Transaction failed with status 200");
    expect(error.exceptions[0]?.exceptionCode).toBe("InvalidParameterValue");
    expect(error.context.version).toBe("2.0.2");
  });

  it("reports HTTP failures without an exception report", async () => {
    const { instance } = createMockAxios(() => ({ status: 500, data: "" }));
    const client = new WfstClient({ baseUrl: "https://example.com/wfs", axios: instance });

    const error = await client
      .transaction('<wfs:Native vendorId="v" safeToIgnore="true"/>')
      .catch((reason: unknown) => reason);

    if (!(error instanceof OwsExceptionError)) {
      throw new Error("expected OwsExceptionError");
    }
    expect(error.context.status).toBe(500);
    expect(error.context.version).toBe("2.0.0");
    expect(error.exceptions).toEqual([
      { exceptionCode: "HTTP_ERROR", text: "HTTP request failed with status 500" }
    ]);
  });
});

describe("WfstClient#buildTransaction", () => {
  it("lets call namespaces override client namespaces", () => {
    const client = new WfstClient({
      baseUrl: "https://example.com/wfs",
      namespaces: { topp: TOPP }
    });

    const xml = client.buildTransaction("<topp:Custom/>", {
      nsAssignments: { topp: "http://example.com/topp" }
    });

    expect(xml).toContain('xmlns:topp="http://example.com/topp"');
    expect(xml).not.toContain(TOPP);
  });
});
