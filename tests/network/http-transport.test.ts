import { describe, it, expect, vi, afterEach } from "vitest";
import { sendPayload } from "../../src/transport/index.js";
import type { SendContext, SendRequest } from "../../src/transport/types.js";
import {
  ProtocolError,
  TooManyRedirectsError,
  TransportError,
  ValidationError,
} from "../../src/errors.js";
import type { NotifyLogger } from "../../src/types.js";
import {
  startHttpReceiver,
  startProxy,
  closedPort,
  type HttpReceiver,
  type ProxyServer,
  type RecordedRequest,
} from "../helpers/listeners.js";

function makeLogger(): NotifyLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/** Direct connections unless a test opts into a proxy. */
function directContext(overrides?: Partial<SendContext>): SendContext {
  return { logger: makeLogger(), proxy: null, ...overrides };
}

function request(destination: string, body: string, contentIsJson = false): SendRequest {
  return {
    destination,
    payload: Buffer.from(body, "utf-8"),
    timeoutMs: 30_000,
    contentIsJson,
  };
}

/** Rebuild the URL with the credentials the receiver decoded from Authorization. */
function urlWithAuthority(req: RecordedRequest): string | null {
  const auth = req.headers.authorization;
  if (auth === undefined) return null;
  const userInfo = Buffer.from(auth.split(" ")[1] ?? "", "base64").toString("utf-8");
  return req.url.replace(/^http:\/\//, `http://${userInfo}@`);
}

let receivers: HttpReceiver[] = [];
let proxy: ProxyServer | null = null;

async function receiver(...args: Parameters<typeof startHttpReceiver>): Promise<HttpReceiver> {
  const r = await startHttpReceiver(...args);
  receivers.push(r);
  return r;
}

afterEach(async () => {
  await Promise.all(receivers.map((r) => r.close()));
  receivers = [];
  if (proxy) {
    await proxy.close();
    proxy = null;
  }
});

describe("HTTP transport", () => {
  it("POSTs the payload once", async () => {
    const target = await receiver();
    const uri = target.url("/path");

    await sendPayload("HTTP", request(uri, "Hello"), directContext());

    expect(target.requests).toHaveLength(1);
    const [req] = target.requests;
    expect(req?.method).toBe("POST");
    expect(req?.url).toBe(uri);
    expect(req?.body).toBe("Hello");
  });

  it("sends a fixed Content-Length, never chunked", async () => {
    const target = await receiver();

    await sendPayload("HTTP", request(target.url("/path"), "Hello"), directContext());

    const headers = target.requests[0]?.headers;
    expect(headers?.["content-length"]).toBe("5");
    expect(headers?.["transfer-encoding"]).toBeUndefined();
  });

  it("sets the JSON content type when contentIsJson", async () => {
    const target = await receiver();

    await sendPayload("HTTP", request(target.url("/path"), "{}", true), directContext());

    expect(target.requests[0]?.headers["content-type"]).toBe("application/json;charset=UTF-8");
  });

  it("sets the XML content type otherwise", async () => {
    const target = await receiver();

    await sendPayload("HTTP", request(target.url("/path"), "<job/>", false), directContext());

    expect(target.requests[0]?.headers["content-type"]).toBe("application/xml;charset=UTF-8");
  });

  it("sends no Authorization header without userinfo", async () => {
    const target = await receiver();

    await sendPayload("HTTP", request(target.url("/path"), "Hello"), directContext());

    expect(target.requests[0]?.headers.authorization).toBeUndefined();
  });

  it("moves URL userinfo into a Basic Authorization header", async () => {
    const target = await receiver();
    const uri = target.url("/path", "fred:foo");

    await sendPayload("HTTP", request(uri, "Hello"), directContext());

    expect(target.requests).toHaveLength(1);
    const req = target.requests[0];
    expect(req?.headers.authorization).toBe("Basic ZnJlZDpmb28=");
    expect(req?.url).toBe(target.url("/path"));
    expect(req && urlWithAuthority(req)).toBe(uri);
  });

  it("percent-decodes userinfo before encoding it", async () => {
    const target = await receiver();

    await sendPayload("HTTP", request(target.url("/path", "fred:p%40ss"), "Hello"), directContext());

    const auth = target.requests[0]?.headers.authorization ?? "";
    expect(Buffer.from(auth.replace("Basic ", ""), "base64").toString("utf-8")).toBe("fred:p@ss");
  });

  it("follows a 307 to another server with the same payload", async () => {
    const timeline: RecordedRequest[] = [];
    const real = await receiver(undefined, timeline);
    const redirectUri = real.url("/realpath");
    const redirector = await receiver((_req, res) => {
      res.statusCode = 307;
      res.setHeader("Location", redirectUri);
      res.end();
    }, timeline);
    const uri = redirector.url("/path");

    await sendPayload("HTTP", request(uri, "RedirectMe"), directContext());

    expect(timeline.map((r) => [r.method, r.url, r.body])).toEqual([
      ["POST", uri, "RedirectMe"],
      ["POST", redirectUri, "RedirectMe"],
    ]);
  });

  it("resolves a relative Location against the current URL", async () => {
    const target = await receiver((req, res) => {
      if (req.path === "/path") {
        res.statusCode = 307;
        res.setHeader("Location", "/realpath");
      } else {
        res.statusCode = 200;
      }
      res.end();
    });

    await sendPayload("HTTP", request(target.url("/path"), "RedirectMe"), directContext());

    expect(target.requests.map((r) => r.path)).toEqual(["/path", "/realpath"]);
    expect(target.requests.map((r) => r.body)).toEqual(["RedirectMe", "RedirectMe"]);
  });

  it("keeps the content type across redirect hops", async () => {
    const target = await receiver((req, res) => {
      if (req.path === "/path") {
        res.statusCode = 307;
        res.setHeader("Location", "/realpath");
      }
      res.end();
    });

    await sendPayload("HTTP", request(target.url("/path"), "{}", true), directContext());

    expect(target.requests.map((r) => r.headers["content-type"])).toEqual([
      "application/json;charset=UTF-8",
      "application/json;charset=UTF-8",
    ]);
  });

  it("keeps URL userinfo across a relative redirect", async () => {
    const target = await receiver((req, res) => {
      if (req.path === "/a") {
        res.statusCode = 307;
        res.setHeader("Location", "/b");
      }
      res.end();
    });

    await sendPayload("HTTP", request(target.url("/a", "u:p"), "Hello"), directContext());

    expect(target.requests.map((r) => [r.path, r.headers.authorization])).toEqual([
      ["/a", "Basic dTpw"],
      ["/b", "Basic dTpw"],
    ]);
  });

  it("drops credentials when an absolute Location carries none", async () => {
    const timeline: RecordedRequest[] = [];
    const real = await receiver(undefined, timeline);
    const redirector = await receiver((_req, res) => {
      res.statusCode = 307;
      res.setHeader("Location", real.url("/b"));
      res.end();
    }, timeline);

    await sendPayload("HTTP", request(redirector.url("/a", "u:p"), "Hello"), directContext());

    expect(timeline.map((r) => [r.path, r.headers.authorization])).toEqual([
      ["/a", "Basic dTpw"],
      ["/b", undefined],
    ]);
  });

  it("gives every redirect hop its own timeout budget", async () => {
    const target = await receiver((req, res) => {
      setTimeout(() => {
        if (req.path === "/a") {
          res.statusCode = 307;
          res.setHeader("Location", "/b");
        }
        res.end();
      }, 150);
    });

    await expect(
      sendPayload("HTTP", { ...request(target.url("/a"), "Hello"), timeoutMs: 250 }, directContext()),
    ).resolves.toBeUndefined();
    expect(target.requests.map((r) => r.path)).toEqual(["/a", "/b"]);
  });

  it("stops a redirect loop at maxRedirects", async () => {
    const target = await receiver((_req, res) => {
      res.statusCode = 307;
      res.setHeader("Location", "/loop");
      res.end();
    });

    const err = await sendPayload(
      "HTTP",
      request(target.url("/loop"), "Hello"),
      directContext({ maxRedirects: 3 }),
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TooManyRedirectsError);
    expect(err instanceof TooManyRedirectsError && err.hops).toBe(3);
    // The first POST plus three followed redirects.
    expect(target.requests).toHaveLength(4);
  });

  it("treats 307 without a Location header as done", async () => {
    const target = await receiver((_req, res) => {
      res.statusCode = 307;
      res.end();
    });

    await expect(
      sendPayload("HTTP", request(target.url("/path"), "Hello"), directContext()),
    ).resolves.toBeUndefined();
    expect(target.requests).toHaveLength(1);
  });

  it.each([200, 204, 302, 404, 500, 503])("treats status %i as a completed delivery", async (status) => {
    const target = await receiver((_req, res) => {
      res.statusCode = status;
      if (status === 302) res.setHeader("Location", "/elsewhere");
      res.end();
    });

    await expect(
      sendPayload("HTTP", request(target.url("/path"), "Hello"), directContext()),
    ).resolves.toBeUndefined();
    expect(target.requests).toHaveLength(1);
  });

  it("rejects non-http schemes before connecting", async () => {
    await expect(
      sendPayload("HTTP", request("ftp://127.0.0.1:21/drop", "Hello"), directContext()),
    ).rejects.toBeInstanceOf(ProtocolError);
  });

  it("fails validation before any I/O", async () => {
    await expect(
      sendPayload("HTTP", request("not a url", "Hello"), directContext()),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("surfaces connection refused as a TransportError", async () => {
    const port = await closedPort();

    await expect(
      sendPayload("HTTP", request(`http://127.0.0.1:${port}/path`, "Hello"), directContext()),
    ).rejects.toBeInstanceOf(TransportError);
  });

  it("surfaces an unanswered request as a TransportError after the timeout", async () => {
    const target = await receiver(() => {
      // never answer
    });

    const err = await sendPayload(
      "HTTP",
      { ...request(target.url("/slow"), "Hello"), timeoutMs: 200 },
      directContext(),
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(target.requests).toHaveLength(1);
  });

  describe("proxying", () => {
    it("routes through an explicit proxy", async () => {
      const target = await receiver();
      proxy = await startProxy();

      await sendPayload(
        "HTTP",
        request(target.url("/path"), "Hello"),
        directContext({ proxy: { host: "127.0.0.1", port: proxy.port } }),
      );

      expect(proxy.targets).toEqual([`127.0.0.1:${target.port}`]);
      expect(target.requests.map((r) => r.body)).toEqual(["Hello"]);
    });

    it("falls back to http_proxy from the environment", async () => {
      const target = await receiver();
      proxy = await startProxy();

      await sendPayload(
        "HTTP",
        request(target.url("/path"), "Hello"),
        { logger: makeLogger(), env: { http_proxy: `http://127.0.0.1:${proxy.port}` } },
      );

      expect(proxy.targets).toEqual([`127.0.0.1:${target.port}`]);
      expect(target.requests).toHaveLength(1);
    });

    it("connects directly when the caller passes proxy: null", async () => {
      const target = await receiver();
      proxy = await startProxy();

      await sendPayload(
        "HTTP",
        request(target.url("/path"), "Hello"),
        directContext({ env: { http_proxy: `http://127.0.0.1:${proxy.port}` } }),
      );

      expect(proxy.targets).toEqual([]);
      expect(target.requests).toHaveLength(1);
    });

    it("rejects a non-http proxy variable before connecting", async () => {
      const target = await receiver();

      await expect(
        sendPayload("HTTP", request(target.url("/path"), "Hello"), {
          logger: makeLogger(),
          env: { http_proxy: "socks5://127.0.0.1:1080" },
        }),
      ).rejects.toBeInstanceOf(ProtocolError);
      expect(target.requests).toHaveLength(0);
    });
  });
});
