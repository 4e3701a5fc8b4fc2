import { afterEach, describe, expect, it } from "vitest";
import { MockAgent } from "undici";
import { NetworkFetchError } from "../src/core/errors.js";
import { Fetcher, MAX_ATTEMPTS, REQUEST_TIMEOUT_MS } from "../src/fetch/fetcher.js";
import { KEEPALIVE_MS, UndiciTransport } from "../src/fetch/transport.js";
import { inlineHasher } from "../src/integrity/checksum.js";
import { MemoryLogger } from "../src/log/logger.js";

const ORIGIN = "https://files.test";

describe("undici transport", () => {
  let transport: UndiciTransport | undefined;

  function setup() {
    const agent = new MockAgent();
    agent.disableNetConnect();
    const undici = new UndiciTransport({ dispatcher: agent });
    transport = undici;
    const logger = new MemoryLogger();
    return { agent, logger, transport: undici, fetcher: new Fetcher({ transport: undici, hasher: inlineHasher, logger }) };
  }

  afterEach(async () => {
    await transport?.close();
    transport = undefined;
  });

  it("uses the documented timing and retry constants", () => {
    expect(REQUEST_TIMEOUT_MS).toBe(15_000);
    expect(KEEPALIVE_MS).toBe(10_000);
    expect(MAX_ATTEMPTS).toBe(4);
  });

  it("resolves a non-2xx response with its body", async () => {
    const { agent, logger, fetcher } = setup();
    agent.get(ORIGIN).intercept({ path: "/x", method: "GET" }).reply(404, "not here");

    const bytes = await fetcher.download(`${ORIGIN}/x`);

    expect(new TextDecoder().decode(bytes)).toBe("not here");
    expect(logger.entries).toEqual([]);
    agent.assertNoPendingInterceptors();
  });

  it("reports the status of the response", async () => {
    const { agent, transport: undici } = setup();
    agent.get(ORIGIN).intercept({ path: "/y", method: "GET" }).reply(503, "busy");

    const res = await undici.get(`${ORIGIN}/y`, {
      headers: {},
      signal: new AbortController().signal,
    });

    expect(res.status).toBe(503);
    expect(new TextDecoder().decode(await res.bytes())).toBe("busy");
  });

  it("retries network-level failures", async () => {
    const { agent, logger, fetcher } = setup();
    agent
      .get(ORIGIN)
      .intercept({ path: "/z", method: "GET" })
      .replyWithError(new Error("socket reset"))
      .times(MAX_ATTEMPTS);

    await expect(fetcher.download(`${ORIGIN}/z`)).rejects.toBeInstanceOf(NetworkFetchError);
    expect(logger.codes()).toEqual(["FETCH_RETRY", "FETCH_RETRY", "FETCH_RETRY", "FETCH_FAILED"]);
    agent.assertNoPendingInterceptors();
  });
});
