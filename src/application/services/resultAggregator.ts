import { err, ok, type Result } from "neverthrow";
import type { CompanyEntity } from "../../core/entities/company";
import type {
  CanonicalRecord,
  FieldProvenance,
  ProviderAttempt,
  ResearchFields,
} from "../../core/entities/research";

export type AggregationError = {
  entityId: string;
  message: string;
};

const contributes = (attempt: ProviderAttempt): boolean =>
  (attempt.outcome === "success" || attempt.outcome === "quality-rejected") &&
  attempt.payload !== undefined;

/**
 * Folds every content-bearing attempt, oldest first, into one record. Later output wins per
 * field and the values it replaced stay in provenance.
 */
export const aggregateResult = (
  entity: CompanyEntity,
  attempts: readonly ProviderAttempt[],
  options: { partial: boolean; generatedAt: Date },
): Result<CanonicalRecord, AggregationError> => {
  const fields: ResearchFields = {};
  const provenance: Record<string, FieldProvenance> = {};
  const contributingProviders: string[] = [];

  for (const attempt of attempts.filter(contributes)) {
    const payload = attempt.payload;
    if (!payload) {
      continue;
    }

    if (!contributingProviders.includes(attempt.provider)) {
      contributingProviders.push(attempt.provider);
    }

    for (const [field, value] of Object.entries(payload.fields)) {
      const previous = provenance[field];
      const previousValue = fields[field];
      fields[field] = value;
      provenance[field] = {
        provider: attempt.provider,
        attemptNumber: attempt.attemptNumber,
        superseded:
          previous && previousValue !== undefined
            ? [
                ...previous.superseded,
                {
                  provider: previous.provider,
                  attemptNumber: previous.attemptNumber,
                  value: previousValue,
                },
              ]
            : [],
      };
    }
  }

  if (contributingProviders.length === 0) {
    return err({
      entityId: entity.id,
      message: "No provider returned content to aggregate.",
    });
  }

  return ok({
    entityId: entity.id,
    name: entity.name,
    domain: entity.domain,
    metadata: { ...entity.metadata },
    fields,
    provenance,
    contributingProviders,
    partial: options.partial,
    totalCost: attempts.reduce((total, attempt) => total + attempt.cost, 0),
    generatedAt: options.generatedAt,
  });
};
