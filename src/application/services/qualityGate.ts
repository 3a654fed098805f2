import type { CompanyEntity } from "../../core/entities/company";
import type {
  ProviderContent,
  ResearchFieldValue,
} from "../../core/entities/research";

export type QualityVerdict =
  | { sufficient: true }
  | { sufficient: false; reason: string };

/**
 * Decides whether a successful provider call is good enough to stop escalating.
 */
export type QualityGate = (
  content: ProviderContent,
  entity: CompanyEntity,
) => QualityVerdict;

export type RequiredFieldsGateOptions = {
  requiredFields: readonly string[];
  minContentChars: number;
};

const isFilled = (value: ResearchFieldValue | undefined): boolean => {
  if (value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    return value.trim().length > 0;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return true;
};

const textLength = (value: ResearchFieldValue): number => {
  if (typeof value === "string") {
    return value.trim().length;
  }
  if (Array.isArray(value)) {
    return value.reduce((total, item) => total + item.trim().length, 0);
  }
  return 0;
};

export const contentCharacters = (content: ProviderContent): number =>
  Object.values(content.fields).reduce<number>(
    (total, value) => total + textLength(value),
    0,
  );

export const requiredFieldsGate =
  (options: RequiredFieldsGateOptions): QualityGate =>
  (content) => {
    const missing = options.requiredFields.filter(
      (field) => !isFilled(content.fields[field]),
    );
    if (missing.length > 0) {
      return {
        sufficient: false,
        reason: `Missing required fields: ${missing.join(", ")}.`,
      };
    }

    const characters = contentCharacters(content);
    if (characters < options.minContentChars) {
      return {
        sufficient: false,
        reason: `Extracted ${characters} characters; at least ${options.minContentChars} required.`,
      };
    }

    return { sufficient: true };
  };
