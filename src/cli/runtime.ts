/**
 * Builds the store, model and pipeline a command runs against, from the
 * loaded configuration.
 */

import { loadConfig, type AppConfig } from "../core/config.js";
import { createGraphStore, type IGraphStore } from "../core/graph/index.js";
import { createAPILLMService, type ILLMService } from "../core/llm/index.js";
import { createPipelineOrchestrator, type PipelineOrchestrator } from "../core/pipeline/index.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("runtime");

export interface RuntimeOptions {
  configPath?: string;
  /** Create the language model (chat and ask) */
  withModel?: boolean;
  /** Overrides `query.summarize` */
  summarize?: boolean;
}

export interface Runtime {
  config: AppConfig;
  store: IGraphStore;
  llm?: ILLMService;
  pipeline: PipelineOrchestrator;
  close(): Promise<void>;
}

export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const config = loadConfig({ configPath: options.configPath });
  if (options.summarize !== undefined) {
    config.query.summarize = options.summarize;
  }

  let llm: ILLMService | undefined;
  if (options.withModel) {
    llm = createAPILLMService({
      provider: config.llm.provider,
      modelId: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      maxRetries: config.llm.maxRetries,
    });
  }

  const store = createGraphStore(config.neo4j);
  try {
    await store.initialize();
    if (llm) await llm.initialize();
  } catch (error) {
    await store.close();
    throw error;
  }

  const pipeline = createPipelineOrchestrator({
    store,
    llm,
    config: { ingestion: config.ingestion, query: config.query },
  });

  return {
    config,
    store,
    llm,
    pipeline,
    async close() {
      if (llm) await llm.shutdown();
      await store.close();
      logger.debug("Runtime closed");
    },
  };
}
