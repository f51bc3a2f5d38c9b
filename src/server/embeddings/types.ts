export type EmbeddingVector = number[];

/** Normalized request: `input` always holds at least one text. */
export interface EmbeddingRequest {
  model: string;
  input: string[];
}

export interface ResolvedModel {
  /** Identifier the caller sent. */
  alias: string;
  /** The single backend model every alias maps to. */
  backendModel: string;
}

export interface EmbeddingLimits {
  maxBatchSize: number;
  maxInputChars: number;
  maxTotalChars: number;
}

export interface EmbedOptions {
  /** Aborted when the caller stops waiting. Backends may ignore it. */
  signal?: AbortSignal;
}

export interface EmbeddingBackend {
  readonly name: string;
  readonly modelName: string;
  /** Vector size every call returns; 0 when unknown. */
  readonly dimension: number;
  embed(texts: string[], options?: EmbedOptions): Promise<EmbeddingVector[]>;
}

export type EmbeddingsCapability =
  | { state: "ready"; backend: EmbeddingBackend }
  | { state: "disabled" }
  | { state: "unavailable"; backendName: string };

export interface EmbeddingData {
  object: "embedding";
  index: number;
  embedding: EmbeddingVector;
}

export interface EmbeddingUsage {
  prompt_tokens: number;
  total_tokens: number;
}

export interface EmbeddingResponse {
  object: "list";
  data: EmbeddingData[];
  model: string;
  usage: EmbeddingUsage;
}
