import { afterEach, describe, expect, it, vi } from "vitest";
import { buildEntity } from "../../../__tests__/support/fakes";
import type { ProviderAttemptContext } from "../../../core/ports/inboundPorts";
import { FirecrawlProvider } from "./firecrawlProvider";

const context = (): ProviderAttemptContext => ({
  attemptNumber: 1,
  timeoutMs: 1_000,
  signal: new AbortController().signal,
});

const respondWith = (body: unknown, status = 200) => {
  const fetchMock = vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(JSON.stringify(body), {
        status,
        headers: { "content-type": "application/json" },
      }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
};

const provider = () =>
  new FirecrawlProvider("https://firecrawl.example.test/", "test-key", "premium-scrape", 0.25);

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("FirecrawlProvider", () => {
  it("requires an API key", () => {
    expect(() => new FirecrawlProvider("https://firecrawl.example.test", "  ")).toThrow(
      "FIRECRAWL_API_KEY is required when RESEARCH_PROVIDERS includes firecrawl.",
    );
  });

  it("maps scraped markdown to fields and bills the estimate", async () => {
    const fetchMock = respondWith({
      success: true,
      data: {
        markdown: "# Acme Builders\n\nWe run [Procore](https://procore.example) on every *site*.",
        metadata: {
          title: "Acme Builders",
          description: "Bridges and tunnels.",
          sourceURL: "https://acme.example.com/",
        },
      },
    });

    const result = await provider().attempt(buildEntity("acme"), context());

    expect(result.isOk() && result.value.fields).toEqual({
      page_title: "Acme Builders",
      company_description: "Bridges and tunnels.",
      page_excerpt: "Acme Builders We run Procore on every site .",
      technology_mentions: ["Procore"],
      source_url: "https://acme.example.com/",
      extraction_method: "firecrawl",
    });
    expect(result.isOk() && result.value.cost).toBe(0.25);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://firecrawl.example.test/v1/scrape");
    expect(init?.headers).toMatchObject({ authorization: "Bearer test-key" });
    expect(init?.body).toBe(
      '{"url":"https://acme.example.com","formats":["markdown"],"onlyMainContent":true}',
    );
  });

  it("treats an unsuccessful scrape as a permanent rejection", async () => {
    respondWith({ success: false, error: "Site blocked scraping." });

    const result = await provider().attempt(buildEntity("acme"), context());

    expect(result.isErr() && result.error).toEqual({
      source: "provider",
      code: "permanent_rejection",
      provider: "firecrawl",
      message: "Site blocked scraping.",
      retryable: false,
    });
  });

  it("maps throttling to a retryable rate limit", async () => {
    respondWith({ error: "slow down" }, 429);

    const result = await provider().attempt(buildEntity("acme"), context());

    expect(result.isErr() && result.error).toMatchObject({
      code: "rate_limited",
      provider: "firecrawl",
      httpStatus: 429,
      retryable: true,
    });
  });

  it("rejects payloads outside the scrape schema", async () => {
    respondWith({ data: [] });

    const result = await provider().attempt(buildEntity("acme"), context());

    expect(result.isErr() && result.error.code).toBe("malformed_response");
  });
});
