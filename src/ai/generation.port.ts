export interface GenerationOptions {
  promptName?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * External text generation. Implementations throw `PortError` on network,
 * auth, rate-limit or empty-output failures.
 */
export interface GenerationPort {
  generate(prompt: string, options?: GenerationOptions): Promise<string>;
  getModelName?(): string;
}
