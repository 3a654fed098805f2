import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanyEntity } from "../../../core/entities/company";
import type { ProviderContent } from "../../../core/entities/research";
import type {
  ProviderAttemptContext,
  ResearchProviderPort,
} from "../../../core/ports/inboundPorts";
import { HttpClient, toBoundaryError } from "../../http/httpClient";
import {
  collapseWhitespace,
  detectTechnologies,
  excerpt,
} from "../utils/contentSignals";

const scrapeResponseSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
  data: z
    .object({
      markdown: z.string().optional(),
      metadata: z
        .object({
          title: z.string().optional(),
          description: z.string().optional(),
          sourceURL: z.string().optional(),
          statusCode: z.number().optional(),
        })
        .passthrough()
        .optional(),
    })
    .optional(),
});

const stripMarkdown = (markdown: string): string =>
  collapseWhitespace(
    markdown
      .replace(/!\[[^\]]*\]\([^)]*\)/g, " ")
      .replace(/\[([^\]]*)\]\([^)]*\)/g, "$1")
      .replace(/[#>*_`|-]+/g, " "),
  );

/**
 * Hosted scrape API used as the premium fallback. Billed per page, so a successful call always
 * costs the configured estimate.
 */
export class FirecrawlProvider implements ResearchProviderPort {
  readonly name = "firecrawl";

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    readonly costClass = "premium-scrape",
    readonly estimatedCost = 0.01,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "FIRECRAWL_API_KEY is required when RESEARCH_PROVIDERS includes firecrawl.",
      );
    }
  }

  async attempt(
    entity: CompanyEntity,
    context: ProviderAttemptContext,
  ): Promise<Result<ProviderContent, AppBoundaryError>> {
    if (!entity.domain) {
      return err(this.failure("validation_error", "Entity has no domain to scrape."));
    }

    const url = `https://${entity.domain}`;
    const response = await this.httpClient.requestJson({
      url: `${this.baseUrl.replace(/\/+$/, "")}/v1/scrape`,
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        "content-type": "application/json",
      },
      body: { url, formats: ["markdown"], onlyMainContent: true },
      timeoutMs: context.timeoutMs,
      signal: context.signal,
    });

    if (response.isErr()) {
      return err(
        toBoundaryError(response.error, { source: "provider", provider: this.name }),
      );
    }

    const parsed = scrapeResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err({
        ...this.failure("malformed_response", "Firecrawl response did not match the scrape schema."),
        cause: parsed.error.issues,
      });
    }

    const payload = parsed.data;
    if (!payload.success) {
      return err(
        this.failure(
          "permanent_rejection",
          payload.error ?? "Firecrawl reported an unsuccessful scrape.",
        ),
      );
    }

    const markdown = payload.data?.markdown ?? "";
    const text = stripMarkdown(markdown);
    if (!text) {
      return err(this.failure("malformed_response", "Firecrawl returned no page content."));
    }

    const metadata = payload.data?.metadata;
    return ok({
      fields: {
        page_title: collapseWhitespace(metadata?.title ?? ""),
        company_description:
          collapseWhitespace(metadata?.description ?? "") || excerpt(text, 500),
        page_excerpt: excerpt(text, 4_000),
        technology_mentions: detectTechnologies(text),
        source_url: metadata?.sourceURL ?? url,
        extraction_method: "firecrawl",
      },
      rawPayload: payload,
      cost: this.estimatedCost,
    });
  }

  private failure(
    code: AppBoundaryError["code"],
    message: string,
  ): AppBoundaryError {
    return {
      source: "provider",
      code,
      provider: this.name,
      message,
      retryable: false,
    };
  }
}
