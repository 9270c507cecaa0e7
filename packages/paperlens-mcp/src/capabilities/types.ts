export interface CapabilityCallOptions {
  signal?: AbortSignal;
}

/** Maps texts to fixed-length vectors, one per input, in input order. */
export interface EmbeddingCapability {
  embed(texts: string[], options?: CapabilityCallOptions): Promise<number[][]>;
}

export interface CompletionCapability {
  complete(prompt: string, maxTokens: number, options?: CapabilityCallOptions): Promise<string>;
}

export interface CapabilitySet {
  embedding?: EmbeddingCapability;
  completion?: CompletionCapability;
}
