import * as cheerio from "cheerio";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanyEntity } from "../../../core/entities/company";
import type {
  ProviderContent,
  ResearchFields,
} from "../../../core/entities/research";
import type {
  ProviderAttemptContext,
  ResearchProviderPort,
} from "../../../core/ports/inboundPorts";
import type { LlmPort } from "../../../core/ports/outboundPorts";
import { HttpClient, toBoundaryError } from "../../http/httpClient";
import {
  collapseWhitespace,
  detectTechnologies,
  estimateTokens,
  excerpt,
} from "../utils/contentSignals";

export type DirectFetchProviderOptions = {
  costClass: string;
  estimatedCost: number;
  userAgent: string;
  /** When set, page text is sent through the model for structured field extraction. */
  llm?: LlmPort;
  llmCostPerMillionTokens?: number;
  maxPromptChars?: number;
};

const mainContentSelectors = [
  "main",
  "article",
  '[role="main"]',
  "#content",
  ".content",
];

const llmExtractionSchema = z.object({
  company_description: z.string().optional(),
  products_services: z.array(z.string()).optional(),
  leadership: z.array(z.string()).optional(),
  technology_mentions: z.array(z.string()).optional(),
  recent_news: z.array(z.string()).optional(),
});

type PageExtract = {
  title: string;
  description: string;
  headings: string[];
  text: string;
};

export const extractPage = (html: string): PageExtract => {
  const $ = cheerio.load(html);
  $("script, style, noscript, iframe, svg").remove();

  const description =
    $('meta[name="description"]').attr("content") ??
    $('meta[property="og:description"]').attr("content") ??
    "";

  const headings = $("h1, h2, h3")
    .map((_, element) => collapseWhitespace($(element).text()))
    .get()
    .filter(Boolean)
    .slice(0, 12);

  let text = "";
  for (const selector of mainContentSelectors) {
    const candidate = collapseWhitespace($(selector).first().text());
    if (candidate.length > 100) {
      text = candidate;
      break;
    }
  }
  if (!text) {
    $("nav, footer, header, aside").remove();
    text = collapseWhitespace($("body").text());
  }

  return {
    title: collapseWhitespace($("title").first().text()),
    description: collapseWhitespace(description),
    headings,
    text,
  };
};

const buildPrompt = (entity: CompanyEntity, pageText: string): string =>
  [
    `Extract facts about the company "${entity.name}" (${entity.domain}) from the website text below.`,
    "Respond with a JSON object using only these keys:",
    "company_description (string), products_services (string[]), leadership (string[]),",
    "technology_mentions (string[]), recent_news (string[]).",
    "Use empty values when the text does not say.",
    "",
    pageText,
  ].join("\n");

/**
 * Fetches the company homepage directly and extracts fields from its HTML, optionally refined by
 * a local LLM. Cheapest provider; cost only accrues for LLM tokens.
 */
export class DirectFetchProvider implements ResearchProviderPort {
  readonly name = "direct-fetch";
  readonly costClass: string;
  readonly estimatedCost: number;

  constructor(
    private readonly options: DirectFetchProviderOptions,
    private readonly httpClient = new HttpClient(),
  ) {
    this.costClass = options.costClass;
    this.estimatedCost = options.estimatedCost;
  }

  async attempt(
    entity: CompanyEntity,
    context: ProviderAttemptContext,
  ): Promise<Result<ProviderContent, AppBoundaryError>> {
    if (!entity.domain) {
      return err(this.failure("validation_error", "Entity has no domain to fetch."));
    }

    const url = `https://${entity.domain}`;
    const page = await this.httpClient.requestText({
      url,
      method: "GET",
      headers: {
        "user-agent": this.options.userAgent,
        accept: "text/html,application/xhtml+xml",
      },
      timeoutMs: context.timeoutMs,
      signal: context.signal,
    });

    if (page.isErr()) {
      return err(
        toBoundaryError(page.error, { source: "provider", provider: this.name }),
      );
    }

    const contentType = page.value.contentType.toLowerCase();
    if (contentType && !contentType.includes("html")) {
      return err(
        this.failure(
          "malformed_response",
          `Expected an HTML page but received '${contentType}'.`,
        ),
      );
    }

    const extract = extractPage(page.value.text);
    if (!extract.text && !extract.description) {
      return err(this.failure("malformed_response", "Page contained no readable text."));
    }

    const fields: ResearchFields = {
      page_title: extract.title,
      company_description: extract.description || excerpt(extract.text, 500),
      page_excerpt: excerpt(extract.text, 2_000),
      headings: extract.headings,
      technology_mentions: detectTechnologies(extract.text),
      source_url: url,
    };
    const rawPayload = {
      url,
      status: page.value.status,
      title: extract.title,
      characters: extract.text.length,
    };

    if (!this.options.llm) {
      return ok({ fields: { ...fields, extraction_method: "html" }, rawPayload, cost: 0 });
    }

    return this.refineWithLlm(this.options.llm, entity, extract, fields, rawPayload, context);
  }

  private async refineWithLlm(
    llm: LlmPort,
    entity: CompanyEntity,
    extract: PageExtract,
    fields: ResearchFields,
    rawPayload: Record<string, unknown>,
    context: ProviderAttemptContext,
  ): Promise<Result<ProviderContent, AppBoundaryError>> {
    const prompt = buildPrompt(
      entity,
      extract.text.slice(0, this.options.maxPromptChars ?? 12_000),
    );
    const completion = await llm.complete(prompt, context.signal);
    if (completion.isErr()) {
      return err({ ...completion.error, provider: this.name });
    }

    const tokens = estimateTokens(prompt) + estimateTokens(completion.value);
    const cost = (tokens * (this.options.llmCostPerMillionTokens ?? 0)) / 1_000_000;

    let parsed: unknown;
    try {
      parsed = JSON.parse(completion.value);
    } catch (error) {
      return err({
        ...this.failure("invalid_json", "LLM extraction was not valid JSON."),
        cost,
        cause: error,
      });
    }

    const extraction = llmExtractionSchema.safeParse(parsed);
    if (!extraction.success) {
      return err({
        ...this.failure("malformed_response", "LLM extraction did not match the expected shape."),
        cost,
        cause: extraction.error.issues,
      });
    }

    const refined: ResearchFields = { ...fields, extraction_method: "llm" };
    for (const [key, value] of Object.entries(extraction.data)) {
      if (value === undefined) {
        continue;
      }
      const filled = typeof value === "string" ? value.trim().length > 0 : value.length > 0;
      if (filled) {
        refined[key] = value;
      }
    }

    return ok({
      fields: refined,
      rawPayload: { ...rawPayload, llmTokens: tokens },
      cost,
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
