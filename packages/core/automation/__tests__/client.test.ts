/**
 * AUTOMATION CLIENT TESTS
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import type { Logger } from "../../logging";
import { createHttpAutomationClient, createNullAutomationClient } from "../client";
import type { AutomationTask } from "../types";

const createMockLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

const task: AutomationTask = {
  goal: "Open the Ola app and wait until its home screen is ready",
  phase: "open",
  target: { appName: "Ola", packageName: "com.olacabs.customer" },
  timeoutSeconds: 30,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("createHttpAutomationClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the task and maps the reply", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ success: true, structured_result: { ride_type: "Ola Auto" }, failure_reason: null })
    );
    vi.stubGlobal("fetch", fetchMock);
    const client = createHttpAutomationClient({
      baseUrl: "http://automation.local/",
      apiKey: "test-secret",
      deviceSerial: "emulator-5554",
      platform: "android",
      logger: createMockLogger(),
    });

    const result = await client.execute(task);

    expect(result).toEqual({ success: true, structuredResult: { ride_type: "Ola Auto" }, failureReason: undefined });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://automation.local/execute");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", "X-API-Key": "test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({
      goal: task.goal,
      phase: "open",
      app: "Ola",
      package_name: "com.olacabs.customer",
      result_shape: null,
      timeout_seconds: 30,
      device_serial: "emulator-5554",
      platform: "android",
    });
  });

  it("omits the API key header when none is set", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ success: true }));
    vi.stubGlobal("fetch", fetchMock);
    const client = createHttpAutomationClient({
      baseUrl: "http://automation.local",
      platform: "ios",
      logger: createMockLogger(),
    });

    await client.execute(task);

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ "Content-Type": "application/json" });
  });

  it("reports a non-ok status as a failure", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(new Response("busy", { status: 503 })));
    const logger = createMockLogger();
    const client = createHttpAutomationClient({ baseUrl: "http://automation.local", platform: "android", logger });

    const result = await client.execute(task);

    expect(result).toEqual({ success: false, failureReason: "Automation service returned 503" });
    expect(logger.error).toHaveBeenCalledWith("[automation] API error 503", { body: "busy" });
  });

  it("reports a malformed reply as a failure", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ ok: "yes" })));
    const client = createHttpAutomationClient({
      baseUrl: "http://automation.local",
      platform: "android",
      logger: createMockLogger(),
    });

    const result = await client.execute(task);

    expect(result.success).toBe(false);
    expect(result.failureReason?.startsWith("Malformed automation response:")).toBe(true);
  });

  it("reports a network error as a failure", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockRejectedValue(new Error("connect ECONNREFUSED")));
    const client = createHttpAutomationClient({
      baseUrl: "http://automation.local",
      platform: "android",
      logger: createMockLogger(),
    });

    expect(await client.execute(task)).toEqual({ success: false, failureReason: "connect ECONNREFUSED" });
  });

  it("reports an aborted request", async () => {
    const controller = new AbortController();
    controller.abort();
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockRejectedValue(new Error("This operation was aborted")));
    const client = createHttpAutomationClient({
      baseUrl: "http://automation.local",
      platform: "android",
      logger: createMockLogger(),
    });

    expect(await client.execute({ ...task, signal: controller.signal })).toEqual({
      success: false,
      failureReason: "Aborted",
    });
  });
});

describe("createNullAutomationClient", () => {
  it("always fails with the given reason", async () => {
    const client = createNullAutomationClient("AUTOMATION_URL not set");

    expect(client.isAvailable()).toBe(false);
    expect(await client.execute(task)).toEqual({ success: false, failureReason: "AUTOMATION_URL not set" });
  });
});
