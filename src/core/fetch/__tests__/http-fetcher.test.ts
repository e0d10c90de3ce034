import { describe, expect, it } from "vitest";
import { BotDetectionError, HttpStatusError, TransientNetworkError } from "../../errors";
import type { ClientRequestOptions } from "../../network/tls-client";
import type { HttpMethod, TransportResponse } from "../../network/transport";
import { errorHandling, fakeClock, fakePacer, silentLogger } from "../../__tests__/helpers";
import { HttpFetcher, type HttpClient } from "../http-fetcher";
import type { ErrorHandlingConfig } from "../../types/config";

const URL = "https://shop.test/search?q=milk";

class ScriptedClient implements HttpClient {
  readonly calls: Array<{ method: HttpMethod; url: string; options?: ClientRequestOptions }> = [];
  rotations = 0;
  closed = false;

  constructor(private readonly script: Array<Partial<TransportResponse>>) {}

  async request(method: HttpMethod, url: string, options?: ClientRequestOptions): Promise<TransportResponse> {
    this.calls.push({ method, url, options });
    const step = this.script[Math.min(this.calls.length - 1, this.script.length - 1)];
    return { status: 200, url, headers: {}, body: "", ...step };
  }

  rotateFingerprint(): string {
    this.rotations++;
    return `fp-${this.rotations}`;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function setup(script: Array<Partial<TransportResponse>>, overrides: Partial<ErrorHandlingConfig> = {}) {
  const client = new ScriptedClient(script);
  const { pacer, calls } = fakePacer();
  const clock = fakeClock();
  const fetcher = new HttpFetcher({
    client,
    pacer,
    errorHandling: errorHandling(overrides),
    logger: silentLogger(),
    sleep: clock.sleep,
    random: () => 0,
  });
  return { fetcher, client, calls, clock };
}

describe("HttpFetcher.fetchHtml", () => {
  it("returns the body after one paced request", async () => {
    const { fetcher, client, calls } = setup([{ body: "<h1>Milk</h1>", url: "" }]);

    const page = await fetcher.fetchHtml(URL);

    expect(page).toEqual({ url: URL, status: 200, html: "<h1>Milk</h1>" });
    expect(client.calls).toHaveLength(1);
    expect(calls.waits).toBe(1);
  });

  it("keeps the final URL after redirects", async () => {
    const { fetcher } = setup([{ body: "ok", url: "https://shop.test/search?q=milk&page=1" }]);
    const page = await fetcher.fetchHtml(URL);
    expect(page.url).toBe("https://shop.test/search?q=milk&page=1");
  });

  it("retries retryable statuses with backoff", async () => {
    const { fetcher, client, clock } = setup([{ status: 503 }, { status: 200, body: "ok" }]);

    const page = await fetcher.fetchHtml(URL);

    expect(page.html).toBe("ok");
    expect(client.calls).toHaveLength(2);
    expect(clock.slept).toEqual([1000]);
  });

  it("gives up on a retryable status after max_retries", async () => {
    const { fetcher, client, clock } = setup([{ status: 503 }]);

    await expect(fetcher.fetchHtml(URL)).rejects.toBeInstanceOf(TransientNetworkError);
    expect(client.calls).toHaveLength(3);
    expect(clock.slept).toEqual([1000, 2000]);
  });

  it("rotates the fingerprint and waits adaptively on a 403", async () => {
    const { fetcher, client, calls } = setup([{ status: 403 }, { status: 200, body: "ok" }]);

    const page = await fetcher.fetchHtml(URL);

    expect(page.html).toBe("ok");
    expect(client.rotations).toBe(1);
    expect(calls.captchas).toBe(1);
    expect(calls.adaptive).toEqual([1]);
  });

  it("treats CAPTCHA markup as bot detection", async () => {
    const { fetcher, client } = setup([
      { body: '<div class="g-recaptcha"></div>' },
      { body: "<h1>Milk</h1>" },
    ]);

    const page = await fetcher.fetchHtml(URL);

    expect(page.html).toBe("<h1>Milk</h1>");
    expect(client.rotations).toBe(1);
  });

  it("raises BotDetectionError once detections exceed max_retries", async () => {
    const { fetcher, client, calls } = setup([{ status: 403 }]);

    const error = await fetcher.fetchHtml(URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BotDetectionError);
    if (error instanceof BotDetectionError) {
      expect(error.reason).toBe("status-403");
      expect(error.detections).toBe(3);
    }
    expect(client.calls).toHaveLength(3);
    expect(calls.adaptive).toEqual([1, 2]);
  });

  it("leaves the fingerprint alone when rotation is off", async () => {
    const { fetcher, client } = setup([{ status: 403 }, { status: 200 }], { rotateFingerprintOn403: false });
    await fetcher.fetchHtml(URL);
    expect(client.rotations).toBe(0);
  });

  it("raises HttpStatusError for other non-2xx statuses", async () => {
    const { fetcher, client } = setup([{ status: 404 }]);

    const error = await fetcher.fetchHtml(URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    if (error instanceof HttpStatusError) expect(error.status).toBe(404);
    expect(client.calls).toHaveLength(1);
  });
});

describe("HttpFetcher.postJson", () => {
  it("sends the body as JSON and parses the reply", async () => {
    const { fetcher, client } = setup([{ body: '{"hits":[],"nbPages":0}' }]);

    const reply = await fetcher.postJson("https://search.test/query", { query: "milk" }, { "X-Key": "test-secret" });

    expect(reply).toEqual({ hits: [], nbPages: 0 });
    expect(client.calls[0].method).toBe("POST");
    expect(client.calls[0].options).toEqual({ json: { query: "milk" }, headers: { "X-Key": "test-secret" } });
  });

  it("does not scan JSON replies for CAPTCHA markers", async () => {
    const { fetcher } = setup([{ body: '{"note":"g-recaptcha"}' }]);
    await expect(fetcher.postJson("https://search.test/query", {})).resolves.toEqual({ note: "g-recaptcha" });
  });

  it("wraps unparseable replies", async () => {
    const { fetcher } = setup([{ body: "<html>oops</html>" }]);
    await expect(fetcher.postJson("https://search.test/query", {})).rejects.toBeInstanceOf(TransientNetworkError);
  });
});

describe("HttpFetcher.close", () => {
  it("closes the client", async () => {
    const { fetcher, client } = setup([{}]);
    await fetcher.close();
    expect(client.closed).toBe(true);
  });
});
