import weaviate, { FusionType } from "weaviate-ts-client";
import type { WeaviateClient, WhereFilter } from "weaviate-ts-client";
import { configService } from "./config";
import type { FilterClause, MetadataFilter } from "@/lib/core/types";
import { groupClausesByField } from "./retrieval/metadata-filter";
import { ExternalServiceError, toErrorMessage } from "@/lib/utils/errors";

/** Raw object from a Get query, `_additional` split off */
export interface WeaviateHit {
  id: string;
  properties: Record<string, unknown>;
  score?: number;
}

let cachedClient: WeaviateClient | null = null;

/**
 * Get or create the Weaviate client instance.
 * Supports both local (Docker) and cloud (WCS) modes.
 */
function getClient(): WeaviateClient {
  if (cachedClient) {
    return cachedClient;
  }

  const config = configService.getWeaviateConfig();

  if (config.isCloud) {
    // ===== CLOUD MODE =====
    console.log(`[Weaviate] Connecting to Cloud: ${config.host}`);
    cachedClient = weaviate.client({
      scheme: "https",
      host: config.host,
      headers: { Authorization: `Bearer ${config.apiKey}` },
    });
  } else {
    // ===== LOCAL MODE =====
    const hostUrl = config.port ? `${config.host}:${config.port}` : config.host;
    console.log(`[Weaviate] Connecting to Local: ${config.scheme}://${hostUrl}`);
    cachedClient = weaviate.client({ scheme: config.scheme, host: hostUrl });
  }

  return cachedClient;
}

// ============================================
// WHERE FILTERS
// ============================================

// Equal on a text[] property matches when any element equals the value,
// which is what an `any` clause asks for.
function clauseToWhere(clause: FilterClause): WhereFilter {
  return {
    path: [clause.field],
    operator: "Equal",
    valueText: clause.value,
  };
}

function combine(operator: "And" | "Or", operands: WhereFilter[]): WhereFilter {
  return operands.length === 1 ? operands[0] : { operator, operands };
}

/**
 * Translate a MetadataFilter into a Weaviate where filter.
 * AND: same-field clauses are OR-ed, field groups AND-ed.
 */
export function toWeaviateWhere(filter: MetadataFilter): WhereFilter | undefined {
  if (filter.clauses.length === 0) return undefined;

  if (filter.logic === "OR") {
    return combine("Or", filter.clauses.map(clauseToWhere));
  }

  const groups = groupClausesByField(filter).map((group) => combine("Or", group.map(clauseToWhere)));
  return combine("And", groups);
}

// ============================================
// HYBRID SEARCH
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toScore(additional: Record<string, unknown>): number | undefined {
  // Weaviate returns score as a string in some versions
  const score = additional.score != null ? Number(additional.score) : NaN;
  if (Number.isFinite(score)) return score;
  const distance = additional.distance != null ? Number(additional.distance) : NaN;
  return Number.isFinite(distance) ? Math.max(0, 1 - distance) : undefined;
}

/**
 * Pull the objects for `className` out of a GraphQL Get response.
 */
export function parseGetResponse(result: unknown, className: string): WeaviateHit[] {
  if (!isRecord(result) || !isRecord(result.data) || !isRecord(result.data.Get)) return [];
  const objects = result.data.Get[className];
  if (!Array.isArray(objects)) return [];

  const hits: WeaviateHit[] = [];
  for (const obj of objects) {
    if (!isRecord(obj)) continue;
    const { _additional, ...properties } = obj;
    const additional = isRecord(_additional) ? _additional : {};
    hits.push({
      id: typeof additional.id === "string" ? additional.id : "",
      properties,
      score: toScore(additional),
    });
  }
  return hits;
}

export interface HybridSearchParams {
  className: string;
  query: string;
  vector?: number[];
  limit: number;
  fields: string;
  /** BM25 properties, e.g. ["content^2", "title"] */
  properties?: string[];
  alpha?: number;
  where?: WhereFilter;
}

// HYBRID SEARCH → Combines BM25 (keyword) + Vector (semantic)
// alpha=0.5 weighs both halves equally; relativeScoreFusion keeps scores in [0, 1]
async function searchHybrid(params: HybridSearchParams): Promise<WeaviateHit[]> {
  const client = getClient();
  const alpha = params.alpha ?? configService.getWeaviateConfig().alpha;

  let builder = client.graphql
    .get()
    .withClassName(params.className)
    .withFields(`${params.fields} _additional { id score explainScore distance }`)
    .withHybrid({
      query: params.query,
      vector: params.vector,
      alpha,
      properties: params.properties,
      fusionType: FusionType.relativeScoreFusion,
    })
    .withLimit(params.limit);

  if (params.where) {
    builder = builder.withWhere(params.where);
  }

  try {
    const result: unknown = await builder.do();
    return parseGetResponse(result, params.className);
  } catch (error) {
    throw new ExternalServiceError("weaviate", `${params.className}: ${toErrorMessage(error)}`);
  }
}

/**
 * Weaviate client service object.
 * Two collections: excerpts and per-document summaries.
 */
export const weaviateClient = {
  getClient,
  searchHybrid,
};
