/**
 * Language Model Contract
 *
 * The translator and the generative synthesizer depend on this interface
 * only; providers sit behind it.
 */

export interface CompletionOptions {
  /** Instructions sent as the system message */
  systemPrompt?: string;
  /** Default: service config */
  maxTokens?: number;
  /** Default: service config (0 for deterministic translation) */
  temperature?: number;
  stopSequences?: string[];
  /** Bypass the response cache for this call */
  skipCache?: boolean;
  /** Abandons the request; rejects with QueryCancelledError */
  signal?: AbortSignal;
}

export interface CompletionResult {
  text: string;
  fromCache: boolean;
  /** Estimated from text length when the provider reports none */
  tokensGenerated: number;
  durationMs: number;
}

export interface LLMStats {
  totalCalls: number;
  cacheHits: number;
  cacheMisses: number;
  /** Calls that ended in an error */
  failures: number;
  totalTokens: number;
  avgDurationMs: number;
}

/**
 * Text completion service.
 *
 * `complete` rejects with ModelUnavailableError on transport or API errors,
 * ModelTimeoutError past its deadline and QueryCancelledError when the
 * signal fires.
 */
export interface ILLMService {
  readonly isReady: boolean;

  /** Model identifier, for logs and errors */
  readonly modelId: string;

  initialize(): Promise<void>;

  complete(prompt: string, options?: CompletionOptions): Promise<CompletionResult>;

  getStats(): LLMStats;

  clearCache(): void;

  shutdown(): Promise<void>;
}
