// packages/synth/src/prompt.ts
// Deterministic instruction text for the query-generating model.
import type { JoinStrategy } from '@docquery/core';

export interface PromptInput {
  userRequest: string;
  schemaText: string;
  limit: number;
  includeAggregation: boolean;
  joinStrategy: JoinStrategy;
}

function outputContract(limit: number): string {
  return `{
  "primary_collection": "collection_name",
  "filter": {},
  "projection": {},
  "sort": {},
  "limit": ${limit},
  "aggregation": [],
  "joins": [
    {
      "collection": "collection_name",
      "type": "lookup",
      "local_field": "field_name",
      "foreign_field": "field_name",
      "as": "alias_name"
    }
  ]
}`;
}

function examples(limit: number): string {
  return `1. Single collection find (preferred when no relationship is documented):
{
  "primary_collection": "orders",
  "filter": {"status": "Shipped"},
  "projection": {"_id": 0, "status": 1, "order_no": 1},
  "sort": {"order_no": 1},
  "limit": ${limit},
  "aggregation": [],
  "joins": []
}

2. Aggregation on one collection:
{
  "primary_collection": "orders",
  "filter": {},
  "projection": {},
  "sort": {},
  "limit": ${limit},
  "aggregation": [
    {"$group": {"_id": "$status", "count": {"$sum": 1}}},
    {"$sort": {"count": -1}}
  ],
  "joins": []
}

3. Join, only when the schema documents the relationship:
{
  "primary_collection": "orders",
  "filter": {},
  "projection": {},
  "sort": {},
  "limit": ${limit},
  "aggregation": [
    {"$lookup": {"from": "customers", "localField": "customer_no", "foreignField": "customer_no", "as": "customer"}},
    {"$match": {"status": "Shipped", "customer": {"$ne": []}}}
  ],
  "joins": [
    {"collection": "customers", "type": "lookup", "local_field": "customer_no", "foreign_field": "customer_no", "as": "customer"}
  ]
}`;
}

function joinGuidance(strategy: JoinStrategy): string {
  if (strategy === 'lookup') {
    return 'Combine collections inside the aggregation pipeline with $lookup stages, and list every join in "joins".';
  }
  if (strategy === 'application') {
    return 'Do not emit $lookup stages. Keep the query on the primary collection and describe each related collection in "joins" only; the caller combines them.';
  }
  return `Follow the caller's join strategy "${strategy}" and list every join in "joins".`;
}

export function buildPrompt(input: PromptInput): string {
  const { userRequest, schemaText, limit, includeAggregation, joinStrategy } = input;

  const prompt = `You are a MongoDB query generator. Using the schema document below, turn the user's request into one query. The query may involve several collections.

SCHEMA DOCUMENT:
${schemaText}

USER REQUEST: ${userRequest}

JOIN STRATEGY: ${joinStrategy}
${joinGuidance(joinStrategy)}

RESULT LIMIT: ${limit}

OUTPUT CONTRACT:
Return a single JSON object with exactly these fields:
${outputContract(limit)}

GUARDRAILS:
- Only reference fields that are present in the schema document, spelled exactly as written there.
- Only create joins for relationships the schema document explicitly describes.
- When no relationship is documented, prefer a single-collection query with an empty "joins" array.
- Use enumerated values exactly as the schema lists them; matching is case-sensitive (e.g. "High", not "HIGH").
- Aggregation stages may only reference fields of the primary collection or aliases created by an earlier $lookup.
- Count documents with {"$sum": 1}; use $size only on fields the schema describes as arrays.
- Leave "aggregation" empty unless the request needs grouping, joining or computed values.
- Leave "sort" as {} when no ordering is requested; never emit an empty $sort stage.
- Never use write stages such as $out or $merge.
- Always include "primary_collection" and the "joins" array, even when it is empty.
- Keep "limit" at ${limit} or lower.

EXAMPLES:
${examples(limit)}

Generate only the JSON object, with no additional text or explanation.
`;

  return includeAggregation
    ? `${prompt}\nNOTE: Include an aggregation pipeline when it helps answer the request.\n`
    : prompt;
}
