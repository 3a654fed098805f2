import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanyEntity } from "../../../core/entities/company";
import type { ProviderContent } from "../../../core/entities/research";
import type {
  ProviderAttemptContext,
  ResearchProviderPort,
} from "../../../core/ports/inboundPorts";

/**
 * Offline provider so batches, budgets and delivery can run without network access.
 */
export class MockResearchProvider implements ResearchProviderPort {
  readonly name = "mock";

  constructor(
    readonly costClass = "mock",
    readonly estimatedCost = 0,
  ) {}

  async attempt(
    entity: CompanyEntity,
    _context: ProviderAttemptContext,
  ): Promise<Result<ProviderContent, AppBoundaryError>> {
    const description =
      `${entity.name} (${entity.domain || "no domain"}) is a placeholder company profile generated locally. ` +
      "It carries no researched content; it exists so scheduling, budget accounting and delivery " +
      "can be exercised end to end without paid scraping.";

    return ok({
      fields: {
        company_description: description,
        products_services: [],
        technology_mentions: [],
        source_url: entity.domain ? `https://${entity.domain}` : "",
      },
      rawPayload: { entityId: entity.id, generator: "mock" },
      cost: this.estimatedCost,
    });
  }
}
