/**
 * Built-in Modalities
 *
 * The nomic-embed-text family is trained with task prefixes; each modality
 * picks the prefix matching the kind of neighbour it wants.
 *
 * @module modalities/defaults
 */

import type { ModalityDefinition } from "./types.ts";

const NOMIC = "nomic-embed-text:v1.5";

export const DEFAULT_MODALITIES: readonly ModalityDefinition[] = [
  {
    name: "qa",
    model: NOMIC,
    prefix: "search_query: ",
    description: "Search optimized for question->answer pairs",
    metric: "cosine",
  },
  {
    name: "style",
    model: NOMIC,
    prefix: "classification: ",
    description: "Search for content clustered by theme or style",
    metric: "cosine",
  },
  {
    name: "semantic",
    model: NOMIC,
    prefix: "clustering: ",
    description: "Search based on semantic similarity",
    metric: "cosine",
  },
  {
    name: "similar_code",
    model: "hamidakach/nomic-embed-text-v1.5-GGUF",
    prefix: "clustering: ",
    description: "Search for similar code snippets",
    metric: "cosine",
  },
];
