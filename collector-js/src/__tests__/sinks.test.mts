import { describe, it, expect, vi, afterEach } from "vitest";
import type { CallbackEnvelope } from "../../../share/shared-schema/src/events.mjs";
import { HttpEventSink } from "../sinks.mjs";

function envelope(overrides: Partial<CallbackEnvelope["context"]> = {}): CallbackEnvelope {
  return {
    event: { event_type: "chain_start", run_id: "r1", parent_run_id: null, data: { inputs: { q: 1 } } },
    context: { metadata: { user: "u-7" }, ...overrides },
  };
}

function stubFetch(response: () => Promise<Response>) {
  const fetchMock = vi.fn((_input: string | URL | Request, _init?: RequestInit) => response());
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

describe("HttpEventSink", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the envelope with a locally resolved thread id", async () => {
    const fetchMock = stubFetch(async () => new Response(null, { status: 202 }));
    const sink = new HttpEventSink({ baseUrl: "http://collector.test/", headers: { "X-Api-Key": "test-secret" } });
    await sink.send(
      envelope({ resolveThreadId: ({ metadata }) => ` ${String(metadata?.user)} `, staticThreadId: "fallback" })
    );

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://collector.test/api/v1/realtime/events");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", "X-Api-Key": "test-secret" });
    expect(sentBody(init)).toEqual({
      event_type: "chain_start",
      run_id: "r1",
      parent_run_id: null,
      thread_id: "u-7",
      static_thread_id: "fallback",
      metadata: { user: "u-7" },
      data: { inputs: { q: 1 } },
    });
  });

  it("leaves thread_id out when the resolver throws", async () => {
    const fetchMock = stubFetch(async () => new Response(null, { status: 202 }));
    const sink = new HttpEventSink();
    await sink.send(
      envelope({
        resolveThreadId: () => {
          throw new Error("no user");
        },
      })
    );

    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:8000/api/v1/realtime/events");
    expect(sentBody(fetchMock.mock.calls[0][1])).toEqual({
      event_type: "chain_start",
      run_id: "r1",
      parent_run_id: null,
      metadata: { user: "u-7" },
      data: { inputs: { q: 1 } },
    });
  });

  it("does not throw on rejected requests", async () => {
    stubFetch(async () => new Response("nope", { status: 500 }));
    await expect(new HttpEventSink().send(envelope())).resolves.toBeUndefined();
  });

  it("does not throw when the server is unreachable", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });
    await expect(new HttpEventSink({ timeoutMs: 50 }).send(envelope())).resolves.toBeUndefined();
  });
});
