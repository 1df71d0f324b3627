import { afterEach, describe, it, expect, vi } from "vitest";
import { createRealTransport, resolveConnector, type ConnectorFactoryDeps } from "./factory.js";
import { AuthenticationError } from "../infra/errors.js";
import type { SourceTransport } from "./types.js";

const noSleep = async (): Promise<void> => {};

function stubTransport(connect: () => Promise<void> = async () => {}): SourceTransport {
  return {
    source: "gmail",
    variant: "real",
    connect,
    fetch: async () => ({ messages: [], commit: async () => {} }),
    send: async () => {},
  };
}

function deps(overrides: Partial<ConnectorFactoryDeps> = {}): ConnectorFactoryDeps {
  return {
    retry: { sleep: noSleep },
    simulator: { sleep: noSleep, random: () => 0.5 },
    ...overrides,
  };
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("createRealTransport", () => {
  it("reports missing credentials without throwing", () => {
    vi.stubEnv("GMAIL_ACCESS_TOKEN", "");
    expect(createRealTransport("gmail", {})).toEqual({
      ok: false,
      reason: "missing credentials (GMAIL_ACCESS_TOKEN)",
    });
  });

  it("builds a transport when the config carries a token", () => {
    vi.stubEnv("TELEGRAM_SOURCE_BOT_TOKEN", "");
    const result = createRealTransport("telegram", { token: "test-token" });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.transport.source).toBe("telegram");
      expect(result.transport.variant).toBe("real");
    }
  });

  it("builds the Graph transport for both Meta sources", () => {
    vi.stubEnv("INSTAGRAM_ACCESS_TOKEN", "test-token");
    const result = createRealTransport("instagram", {});
    expect(result.ok && result.transport.source).toBe("instagram");
  });
});

describe("resolveConnector", () => {
  it("keeps the real variant when it connects", async () => {
    const build = vi.fn(() => ({ ok: true as const, transport: stubTransport() }));
    const resolved = await resolveConnector("gmail", {}, deps({ buildRealTransport: build }));

    expect(resolved.variant).toBe("real");
    expect(resolved.fallbackReason).toBeNull();
    expect(resolved.connector.isConnected()).toBe(true);
    expect(build).toHaveBeenCalledTimes(1);
  });

  it("falls back to the simulator when construction fails", async () => {
    const resolved = await resolveConnector(
      "gmail",
      {},
      deps({ buildRealTransport: () => ({ ok: false, reason: "missing credentials (GMAIL_ACCESS_TOKEN)" }) }),
    );

    expect(resolved.variant).toBe("simulated");
    expect(resolved.connector.variant).toBe("simulated");
    expect(resolved.fallbackReason).toBe("missing credentials (GMAIL_ACCESS_TOKEN)");
    expect(resolved.connector.isConnected()).toBe(true);
  });

  it("falls back when the builder throws", async () => {
    const resolved = await resolveConnector(
      "gmail",
      {},
      deps({
        buildRealTransport: () => {
          throw new Error("bad base url");
        },
      }),
    );
    expect(resolved.fallbackReason).toBe("construction failed: bad base url");
  });

  it("falls back when the real variant cannot connect", async () => {
    const transport = stubTransport(async () => {
      throw new AuthenticationError("HTTP 401", "gmail");
    });
    const resolved = await resolveConnector(
      "gmail",
      {},
      deps({ buildRealTransport: () => ({ ok: true, transport }) }),
    );

    expect(resolved.variant).toBe("simulated");
    expect(resolved.fallbackReason).toBe("connect failed: [gmail] HTTP 401");
    expect(resolved.connector.isConnected()).toBe(true);
  });

  it("goes straight to the simulator when the config asks for it", async () => {
    const build = vi.fn(() => ({ ok: true as const, transport: stubTransport() }));
    const resolved = await resolveConnector(
      "gmail",
      { sources: { gmail: { simulate: true } } },
      deps({ buildRealTransport: build }),
    );

    expect(build).not.toHaveBeenCalled();
    expect(resolved.variant).toBe("simulated");
    expect(resolved.fallbackReason).toBe("simulation requested in config");
  });

  it("applies the configured rate limit to whichever variant is chosen", async () => {
    const resolved = await resolveConnector(
      "linkedin",
      { sources: { linkedin: { simulate: true, rateLimitPerMinute: 5 } } },
      deps(),
    );
    expect(resolved.connector.getState().rateLimit.limit).toBe(5);
  });

  it("uses the default per-source budget otherwise", async () => {
    const resolved = await resolveConnector("facebook", { sources: { facebook: { simulate: true } } }, deps());
    expect(resolved.connector.getState().rateLimit.limit).toBe(40);
  });

  it("exposes the simulated connector through the same contract", async () => {
    const resolved = await resolveConnector(
      "telegram",
      { sources: { telegram: { simulate: true } } },
      deps({ simulator: { sleep: noSleep, random: () => 0, now: () => 1_000 } }),
    );
    const connector = resolved.connector;

    expect(connector.isConnected()).toBe(true);
    expect(await connector.fetchMessages()).toEqual([
      {
        sender: "Alex",
        content: "Hey, are you free for a quick call tomorrow afternoon?",
        receivedAt: 1_000,
        externalId: "sim-telegram-1",
      },
    ]);
    expect(await connector.sendMessage("Alex", "Sure, 3pm works")).toBe(true);
  });
});
