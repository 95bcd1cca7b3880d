/**
 * @fileoverview Orchestrator construction
 *
 * Loads configuration and the rule catalog, builds the backend, embedder,
 * index and source lister, and hands them to an OrchestrationFacade.
 * Structural problems (invalid configuration, duplicate rule ids, unknown
 * mandatory rule ids) surface here as thrown errors.
 */

import { createReasoningBackend } from '../adapters/cli_llm_service.js';
import type { ReasoningBackend } from '../adapters/llm_service.js';
import { loadConfig, type LoadConfigOptions, type RuleweaverConfig } from '../config/index.js';
import { HashingEmbeddingFunction, type EmbeddingFunction } from '../knowledge/embeddings.js';
import { KnowledgeIndex, type SourceLister } from '../knowledge/knowledge_index.js';
import { DirectorySourceLister } from '../knowledge/source_lister.js';
import { loadRuleCatalog } from '../rules/rule_loader.js';
import { logInfo } from '../telemetry/logger.js';
import { OrchestrationFacade } from './orchestration_facade.js';

export interface CreateOrchestratorOptions extends LoadConfigOptions {
  /** Use this configuration instead of loading one. */
  config?: RuleweaverConfig;
  /** Replaces the backend built from configuration; null disables it. */
  backend?: ReasoningBackend | null;
  embedder?: EmbeddingFunction;
  lister?: SourceLister;
  /** Run one knowledge refresh before returning. */
  initialRefresh?: boolean;
  now?: () => Date;
}

export async function createOrchestrator(options: CreateOrchestratorOptions = {}): Promise<OrchestrationFacade> {
  const config = options.config ?? loadConfig(options).config;
  const rulesPath = config.rules.path;
  const loadCatalog = () => loadRuleCatalog(rulesPath);
  const catalog = await loadCatalog();

  const backend = options.backend !== undefined ? options.backend : createReasoningBackend(config.backend);
  const embedder = options.embedder ?? new HashingEmbeddingFunction({ dimension: config.knowledge.embeddingDimension });
  const index = new KnowledgeIndex({
    embedder,
    chunkSize: config.knowledge.chunkSize,
    overlap: config.knowledge.overlap,
    now: options.now,
  });
  const lister = options.lister ?? new DirectorySourceLister({
    directory: config.knowledge.directory,
    include: config.knowledge.include,
    exclude: config.knowledge.exclude,
  });

  const facade = new OrchestrationFacade({
    config,
    backend,
    catalog,
    loadCatalog,
    index,
    embedder,
    lister,
    now: options.now,
  });

  logInfo('Orchestrator ready', {
    backend: backend?.provider ?? 'none',
    rules: catalog.size,
    catalogVersion: catalog.version,
    knowledgeDirectory: config.knowledge.directory,
  });

  if (options.initialRefresh) {
    await facade.refreshKnowledge();
  }
  return facade;
}
