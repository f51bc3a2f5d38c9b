import type { ResolvedModel } from "./types.ts";

/** Public identifiers accepted by /v1/embeddings. All share the one loaded model. */
export const DEFAULT_EMBEDDING_ALIASES: readonly string[] = [
  "nomic-embed-text",
  "nomic-ai/nomic-embed-text-v1.5",
  "nomic-embed-code",
  "nomic-ai/nomic-embed-code",
  "text-embedding-3-small",
];

export function resolveModelAlias(requested: string, configuredModel: string): ResolvedModel | null {
  const alias = String(requested || "").trim();
  if (!alias) { return null; }
  if (alias === configuredModel || DEFAULT_EMBEDDING_ALIASES.includes(alias)) {
    return { alias, backendModel: configuredModel };
  }
  return null;
}

export function publicModelIds(configuredModel: string): string[] {
  const out = [...DEFAULT_EMBEDDING_ALIASES];
  if (!out.includes(configuredModel)) { out.push(configuredModel); }
  return out;
}
