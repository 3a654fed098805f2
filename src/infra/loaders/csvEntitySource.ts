import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import {
  canonicalizeDomain,
  entityIdFromName,
  type CompanyEntity,
} from "../../core/entities/company";
import type {
  EntityLoadRequest,
  EntitySourcePort,
} from "../../core/ports/inboundPorts";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";

const rowsSchema = z.array(z.record(z.string()));

const nameColumns = ["company name", "company_name", "company", "name"];
const websiteColumns = ["website", "domain", "url", "company website"];
const idColumns = ["zoominfo company id", "company id", "company_id", "id"];

type Row = Record<string, string>;

const pick = (row: Row, aliases: readonly string[]): { column: string; value: string } | null => {
  for (const [column, value] of Object.entries(row)) {
    if (aliases.includes(column.trim().toLowerCase()) && value.trim()) {
      return { column, value: value.trim() };
    }
  }
  return null;
};

/**
 * Maps one CSV row to an entity. Id precedence: explicit id column, canonical domain, id derived from the name.
 */
export const rowToEntity = (row: Row): CompanyEntity | null => {
  const name = pick(row, nameColumns);
  const website = pick(row, websiteColumns);
  const explicitId = pick(row, idColumns);
  const domain = website ? canonicalizeDomain(website.value) : "";

  if (!name && !domain) {
    return null;
  }

  const used = new Set([name?.column, website?.column, explicitId?.column]);
  const metadata: Record<string, string> = {};
  for (const [column, value] of Object.entries(row)) {
    if (!used.has(column) && value.trim()) {
      metadata[column] = value.trim();
    }
  }

  const displayName = name?.value ?? domain;
  return {
    id: explicitId?.value ?? (domain || entityIdFromName(displayName)),
    name: displayName,
    domain,
    metadata,
  };
};

/**
 * Loads company lists exported from CRM or data vendors. Extra columns become entity metadata.
 */
export class CsvEntitySource implements EntitySourcePort {
  constructor(private readonly log: Logger = defaultLogger) {}

  async load(
    request: EntityLoadRequest,
  ): Promise<Result<CompanyEntity[], AppBoundaryError>> {
    let content: string;
    try {
      content = await readFile(request.path, "utf8");
    } catch (error) {
      return err({
        source: "loader",
        code: "not_found",
        provider: "csv",
        message: `Could not read '${request.path}'.`,
        retryable: false,
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = parse(content, {
        columns: true,
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
      });
    } catch (error) {
      return err({
        source: "loader",
        code: "validation_error",
        provider: "csv",
        message: error instanceof Error ? error.message : "CSV could not be parsed.",
        retryable: false,
        cause: error,
      });
    }

    const rows = rowsSchema.safeParse(parsed);
    if (!rows.success) {
      return err({
        source: "loader",
        code: "validation_error",
        provider: "csv",
        message: "CSV rows were not string records.",
        retryable: false,
        cause: rows.error.issues,
      });
    }

    const entities: CompanyEntity[] = [];
    rows.data.forEach((row, index) => {
      const entity = rowToEntity(row);
      if (!entity) {
        this.log.warn({ line: index + 2 }, "Skipping CSV row without a name or website");
        return;
      }
      entities.push(entity);
    });

    return ok(
      request.limit === undefined ? entities : entities.slice(0, request.limit),
    );
  }
}
