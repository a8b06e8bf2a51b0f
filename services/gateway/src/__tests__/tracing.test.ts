import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { initTracing, getTracer, withSpan, _resetTracing } from "../tracing.js";

beforeEach(() => {
  _resetTracing();
  delete process.env.OTEL_ENABLED;
  vi.clearAllMocks();
});

afterEach(() => {
  delete process.env.OTEL_ENABLED;
});

describe("initTracing", () => {
  it("is a no-op when OTEL_ENABLED is not set", async () => {
    await expect(initTracing()).resolves.toBeUndefined();
  });

  it("starts the SDK once when OTEL_ENABLED=true", async () => {
    const startFn = vi.fn();
    vi.doMock("@opentelemetry/sdk-node", () => ({
      NodeSDK: class {
        start() {
          startFn();
        }
      },
    }));
    vi.doMock("@opentelemetry/auto-instrumentations-node", () => ({
      getNodeAutoInstrumentations: () => [],
    }));
    vi.doMock("@opentelemetry/exporter-trace-otlp-http", () => ({
      OTLPTraceExporter: class {},
    }));

    process.env.OTEL_ENABLED = "true";
    await initTracing();
    await initTracing();

    expect(startFn).toHaveBeenCalledTimes(1);

    vi.doUnmock("@opentelemetry/sdk-node");
    vi.doUnmock("@opentelemetry/auto-instrumentations-node");
    vi.doUnmock("@opentelemetry/exporter-trace-otlp-http");
  });
});

describe("getTracer", () => {
  it("returns a tracer whose spans can be started and ended", () => {
    const span = getTracer().startSpan("test.span");
    span.setAttribute("key", "value");
    span.end();
  });
});

describe("withSpan", () => {
  it("returns the callback's result", async () => {
    await expect(withSpan("test.ok", { model: "m" }, async () => 42)).resolves.toBe(42);
  });

  it("rethrows the callback's error", async () => {
    await expect(
      withSpan("test.fail", {}, async () => {
        throw new Error("kaput");
      })
    ).rejects.toThrow("kaput");
  });
});
