import { describe, it, expect, afterEach, vi } from "vitest";
import { DuckDuckGoSearch, parseResultsPage, resolveResultUrl } from "@/src/lib/search/duckduckgo";
import { GuideSourceError } from "@/src/lib/errors";

const RESULTS_PAGE = `
<div class="result results_links web-result">
  <h2 class="result__title">
    <a rel="nofollow" class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fguides.example.com%2Fquick-win&amp;rut=abc">Quick Win <b>Guide</b></a>
  </h2>
  <a class="result__snippet" href="#">Win a round in under a minute &amp; more.</a>
</div>
<div class="result results_links web-result">
  <h2 class="result__title">
    <a rel="nofollow" class="result__a" href="https://example.org/direct">Direct link</a>
  </h2>
  <a class="result__snippet" href="#">Second snippet</a>
</div>`;

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("resolveResultUrl", () => {
  it("unwraps the redirector", () => {
    expect(resolveResultUrl("//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.com%2Fa%3Fb%3D1&amp;rut=x")).toBe(
      "https://example.com/a?b=1"
    );
  });

  it("passes through direct links and rejects other schemes", () => {
    expect(resolveResultUrl("https://example.com/x")).toBe("https://example.com/x");
    expect(resolveResultUrl("javascript:void(0)")).toBeNull();
  });
});

describe("parseResultsPage", () => {
  it("pairs links with snippets", () => {
    expect(parseResultsPage(RESULTS_PAGE)).toEqual([
      {
        title: "Quick Win Guide",
        url: "https://guides.example.com/quick-win",
        snippet: "Win a round in under a minute & more.",
      },
      { title: "Direct link", url: "https://example.org/direct", snippet: "Second snippet" },
    ]);
  });

  it("returns nothing for a page without results", () => {
    expect(parseResultsPage("<html><body>No results.</body></html>")).toEqual([]);
  });
});

describe("DuckDuckGoSearch", () => {
  it("posts the query and caps the results", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(RESULTS_PAGE, { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const results = await new DuckDuckGoSearch().search("quick win guide", { maxResults: 1 });

    expect(results.map((r) => r.title)).toEqual(["Quick Win Guide"]);
    expect(fetchMock.mock.calls[0][0]).toBe("https://html.duckduckgo.com/html/");
    expect(fetchMock.mock.calls[0][1]?.method).toBe("POST");
    expect(String(fetchMock.mock.calls[0][1]?.body)).toBe("q=quick+win+guide");
  });

  it("treats the anomaly page as throttling", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("", { status: 202 }))
    );

    const error = await new DuckDuckGoSearch().search("x", { maxResults: 5 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GuideSourceError);
    expect(error instanceof GuideSourceError && error.code).toBe("AdapterRateLimited");
  });
});
