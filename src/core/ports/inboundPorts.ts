import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CompanyEntity } from "../entities/company";
import type { ProviderContent } from "../entities/research";

export type ProviderAttemptContext = {
  attemptNumber: number;
  timeoutMs: number;
  signal: AbortSignal;
};

/**
 * One data-acquisition or AI-transform capability. The orchestrator treats all providers alike;
 * order and cost tier come from configuration.
 */
export interface ResearchProviderPort {
  readonly name: string;
  readonly costClass: string;
  /** Worst-case spend of one call, reserved against the budget before calling. */
  readonly estimatedCost: number;
  attempt(
    entity: CompanyEntity,
    context: ProviderAttemptContext,
  ): Promise<Result<ProviderContent, AppBoundaryError>>;
}

export type EntityLoadRequest = {
  path: string;
  limit?: number;
};

export interface EntitySourcePort {
  load(
    request: EntityLoadRequest,
  ): Promise<Result<CompanyEntity[], AppBoundaryError>>;
}
