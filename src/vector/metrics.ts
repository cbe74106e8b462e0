/**
 * Distance Metrics
 *
 * Maps the closed metric set to pgvector operators. Every operator is
 * "smaller is closer", so all three searches sort ascending:
 *
 * | metric        | operator | sort key            | reported score        |
 * |---------------|----------|---------------------|-----------------------|
 * | cosine        | `<=>`    | cosine distance     | cosine distance       |
 * | l2            | `<->`    | euclidean distance  | euclidean distance    |
 * | inner_product | `<#>`    | negative dot product| dot product (negated) |
 *
 * @module vector/metrics
 */

import { type SQL, sql } from "drizzle-orm";
import type { AnyPgColumn } from "drizzle-orm/pg-core";
import { InvalidArgumentError } from "../errors/error-types.ts";
import type { DistanceMetric } from "../modalities/types.ts";

interface MetricSpec {
  operator: "<=>" | "<#>" | "<->";
  /** Turns the ascending sort key into the metric's natural value */
  toScore: (distance: number) => number;
}

export const METRICS: Readonly<Record<DistanceMetric, MetricSpec>> = Object.freeze({
  cosine: { operator: "<=>", toScore: (d) => d },
  l2: { operator: "<->", toScore: (d) => d },
  // pgvector's <#> returns the negative inner product
  inner_product: { operator: "<#>", toScore: (d) => (d === 0 ? 0 : -d) },
});

/**
 * pgvector text literal, e.g. `[0.1,0.2,0.3]`
 *
 * @throws InvalidArgumentError on a non-finite component
 */
export function toVectorLiteral(values: readonly number[]): string {
  for (const value of values) {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentError(`Vector contains a non-finite value: ${value}`, "vector");
    }
  }
  return `[${values.join(",")}]`;
}

/**
 * `column <op> $n::vector` for the given metric
 */
export function distanceTo(metric: DistanceMetric, column: AnyPgColumn, queryVector: readonly number[]): SQL<number> {
  const { operator } = METRICS[metric];
  return sql<number>`(${column} ${sql.raw(operator)} ${toVectorLiteral(queryVector)}::vector)`;
}

export function toScore(metric: DistanceMetric, distance: number): number {
  return METRICS[metric].toScore(distance);
}
