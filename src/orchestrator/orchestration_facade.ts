/**
 * @fileoverview Orchestration facade
 *
 * The single entry point behind the CLI and the MCP server. It owns the
 * long-lived pieces (knowledge index, refresh task, backend health) and a
 * rule bundle (catalog, selector, planner) that `reload()`
 * replaces in one assignment, so a request in flight keeps the bundle it
 * started with.
 *
 * @example
 * ```typescript
 * const orchestrator = await createOrchestrator({ cwd: process.cwd() });
 * orchestrator.start();
 * const result = await orchestrator.orchestrate('Add a report endpoint', { tech_stack: ['python'] });
 * await orchestrator.stop();
 * ```
 *
 * @packageDocumentation
 */

import type { ReasoningBackend } from '../adapters/llm_service.js';
import type { RuleweaverConfig } from '../config/schema.js';
import { combineModes, type ReasoningMode } from '../core/result.js';
import {
  ProjectAnalyzer,
  withProjectContext,
  type ProjectProfile,
} from '../classification/project_analyzer.js';
import { TaskClassifier } from '../classification/task_classifier.js';
import { KnowledgeAnswerer } from '../knowledge/answerer.js';
import type { EmbeddingFunction } from '../knowledge/embeddings.js';
import type { KnowledgeIndex, RefreshReport, SourceLister } from '../knowledge/knowledge_index.js';
import { RefreshTask } from '../knowledge/refresh_task.js';
import { estimateConfidence, Retriever, type SearchResult } from '../knowledge/retriever.js';
import { PlanGenerator } from '../planning/plan_generator.js';
import type { RuleCatalog } from '../rules/rule_catalog.js';
import { RuleSelector } from '../selection/rule_selector.js';
import { logInfo } from '../telemetry/logger.js';
import type {
  ExecutionPlan,
  Rule,
  RuleCategory,
  RuleSelection,
  TaskClassification,
  TaskContext,
} from '../types.js';
import { BackendHealthMonitor, type BackendStatus } from './backend_health.js';

// ============================================================================
// RESPONSE TYPES
// ============================================================================

export interface SelectedRule {
  id: string;
  title: string;
  category: RuleCategory;
  mandatory: boolean;
  /** Total selection score; mandatory rules are listed whatever their score. */
  score: number;
}

export interface SelectRulesResponse {
  rules: SelectedRule[];
  rationale: string;
  mode: ReasoningMode;
  classification: TaskClassification;
  classificationMode: ReasoningMode;
}

export interface PlanStageView {
  name: string;
  description: string;
  rules: string[];
  qualityGates: string[];
}

export interface GeneratePlanResponse {
  template: string;
  stages: PlanStageView[];
  mode: ReasoningMode;
  classification: TaskClassification;
}

export interface OrchestrateResponse {
  task: string;
  classification: TaskClassification;
  rules: SelectedRule[];
  rationale: string;
  plan: {
    template: string;
    stages: PlanStageView[];
  };
  mode: ReasoningMode;
  modes: {
    classification: ReasoningMode;
    selection: ReasoningMode;
  };
}

export interface KnowledgePassage {
  sourceId: string;
  sequenceIndex: number;
  text: string;
  score: number;
}

export interface QueryKnowledgeResponse {
  question: string;
  results: KnowledgePassage[];
  confidence: number;
  /** `ai` only when a backend summary was requested and produced. */
  mode: ReasoningMode;
  answer?: string;
}

export interface StatusReport {
  backend: BackendStatus;
  index: {
    documents: number;
    chunks: number;
    embeddingVersion: string;
    lastRefreshAt: string | null;
    lastSuccessfulRefreshAt: string | null;
    refreshRunning: boolean;
    lastRefreshError: string | null;
  };
  catalog: {
    version: string;
    rules: number;
    mandatory: string[];
    source: string | null;
  };
  generatedAt: string;
}

export interface ReloadReport {
  previousVersion: string;
  version: string;
  rules: number;
}

export interface AnalyzeProjectResponse {
  profile: ProjectProfile;
  /** The hints the profile adds to a task context. */
  context: TaskContext;
  mode: ReasoningMode;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface TaskRequestOptions extends RequestOptions {
  /** Analyse this directory and merge its stack into the context. */
  projectDir?: string;
}

export interface QueryOptions extends RequestOptions {
  /** Ask the backend to answer from the passages. */
  summarize?: boolean;
}

// ============================================================================
// DEPENDENCIES
// ============================================================================

export interface OrchestrationFacadeDeps {
  config: RuleweaverConfig;
  backend: ReasoningBackend | null;
  catalog: RuleCatalog;
  /** Re-reads rule definitions for `reload()`. */
  loadCatalog: () => Promise<RuleCatalog>;
  index: KnowledgeIndex;
  embedder: EmbeddingFunction;
  lister: SourceLister;
  now?: () => Date;
}

interface RuleBundle {
  readonly catalog: RuleCatalog;
  readonly selector: RuleSelector;
  readonly planner: PlanGenerator;
}

interface Pipeline {
  bundle: RuleBundle;
  classification: TaskClassification;
  classificationMode: ReasoningMode;
  selection: RuleSelection;
}

function toPassage(result: SearchResult): KnowledgePassage {
  return {
    sourceId: result.chunk.sourceId,
    sequenceIndex: result.chunk.sequenceIndex,
    text: result.chunk.text,
    score: Math.round(result.score * 10000) / 10000,
  };
}

function stageViews(plan: ExecutionPlan): PlanStageView[] {
  return plan.stages.map((stage) => ({
    name: stage.name,
    description: stage.description,
    rules: [...stage.ruleIds],
    qualityGates: [...stage.qualityGates],
  }));
}

// ============================================================================
// FACADE
// ============================================================================

export class OrchestrationFacade {
  readonly config: RuleweaverConfig;
  private bundle: RuleBundle;
  private readonly backend: ReasoningBackend | null;
  private readonly loadCatalog: () => Promise<RuleCatalog>;
  private readonly index: KnowledgeIndex;
  private readonly lister: SourceLister;
  private readonly classifier: TaskClassifier;
  private readonly analyzer: ProjectAnalyzer;
  private readonly retriever: Retriever;
  private readonly answerer: KnowledgeAnswerer;
  private readonly health: BackendHealthMonitor;
  private readonly refreshTask: RefreshTask;
  private readonly now: () => Date;

  constructor(deps: OrchestrationFacadeDeps) {
    this.config = deps.config;
    this.backend = deps.backend;
    this.loadCatalog = deps.loadCatalog;
    this.index = deps.index;
    this.lister = deps.lister;
    this.now = deps.now ?? (() => new Date());

    const timeoutMs = deps.config.backend.timeoutMs;
    this.classifier = new TaskClassifier(deps.backend, deps.config.classification, { timeoutMs });
    this.analyzer = new ProjectAnalyzer(deps.config.analysis, deps.config.classification.defaultProjectType);
    this.retriever = new Retriever(deps.index, deps.embedder);
    this.answerer = new KnowledgeAnswerer(deps.backend, { timeoutMs });
    this.health = new BackendHealthMonitor(deps.backend, {
      intervalMs: deps.config.backend.healthCheckIntervalMs,
      probeTimeoutMs: Math.min(timeoutMs, 10000),
    });
    this.refreshTask = new RefreshTask(
      (signal) => this.index.refreshFromSource(this.lister, { signal }),
      { intervalMs: deps.config.knowledge.refreshIntervalMs, runImmediately: true },
    );
    this.bundle = this.buildBundle(deps.catalog);
  }

  // ==========================================================================
  // RULES AND PLANS
  // ==========================================================================

  async selectRules(task: string, context: TaskContext = {}, options: TaskRequestOptions = {}): Promise<SelectRulesResponse> {
    const pipeline = await this.runSelection(task, await this.contextFor(context, options), options.signal);
    return {
      rules: this.describeSelection(pipeline),
      rationale: pipeline.selection.rationale,
      mode: combineModes([pipeline.classificationMode, pipeline.selection.mode]),
      classification: pipeline.classification,
      classificationMode: pipeline.classificationMode,
    };
  }

  async generatePlan(task: string, context: TaskContext = {}, options: TaskRequestOptions = {}): Promise<GeneratePlanResponse> {
    const pipeline = await this.runSelection(task, await this.contextFor(context, options), options.signal);
    const mode = combineModes([pipeline.classificationMode, pipeline.selection.mode]);
    const plan = pipeline.bundle.planner.generate(pipeline.classification, pipeline.selection.orderedRuleIds, mode);
    return {
      template: plan.template,
      stages: stageViews(plan),
      mode,
      classification: pipeline.classification,
    };
  }

  async orchestrate(task: string, context: TaskContext = {}, options: TaskRequestOptions = {}): Promise<OrchestrateResponse> {
    const pipeline = await this.runSelection(task, await this.contextFor(context, options), options.signal);
    const mode = combineModes([pipeline.classificationMode, pipeline.selection.mode]);
    const plan = pipeline.bundle.planner.generate(pipeline.classification, pipeline.selection.orderedRuleIds, mode);
    return {
      task,
      classification: pipeline.classification,
      rules: this.describeSelection(pipeline),
      rationale: pipeline.selection.rationale,
      plan: { template: plan.template, stages: stageViews(plan) },
      mode,
      modes: {
        classification: pipeline.classificationMode,
        selection: pipeline.selection.mode,
      },
    };
  }

  /** Detect the stack and project type of a directory. Always heuristic. */
  async analyzeProject(directory: string): Promise<AnalyzeProjectResponse> {
    const profile = await this.analyzer.analyze(directory);
    return {
      profile,
      context: { tech_stack: [...profile.techStack], project_type: profile.projectType },
      mode: 'fallback',
    };
  }

  rules(): readonly Rule[] {
    return this.bundle.catalog.all();
  }

  getRule(id: string): Rule {
    return this.bundle.catalog.get(id);
  }

  // ==========================================================================
  // KNOWLEDGE
  // ==========================================================================

  async queryKnowledge(
    question: string,
    k: number = this.config.knowledge.defaultK,
    options: QueryOptions = {},
  ): Promise<QueryKnowledgeResponse> {
    const results = await this.retriever.search(question, k);
    const passages = results.map(toPassage);
    if (!options.summarize) {
      return { question, results: passages, confidence: estimateConfidence(results), mode: 'fallback' };
    }
    const answer = await this.answerer.answer(question, results, options.signal);
    return {
      question,
      results: passages,
      confidence: answer.confidence,
      mode: answer.mode,
      answer: answer.answer,
    };
  }

  answerQuestion(question: string, k?: number, options: RequestOptions = {}): Promise<QueryKnowledgeResponse> {
    return this.queryKnowledge(question, k, { ...options, summarize: true });
  }

  /** Ingest or replace one document directly. Refresh cycles leave it in place until a rebuild. */
  ingestDocument(documentId: string, text: string): Promise<number> {
    return this.index.ingest(documentId, text);
  }

  /** One refresh cycle now (joins a cycle already in flight). */
  refreshKnowledge(): Promise<RefreshReport | null> {
    return this.refreshTask.runOnce();
  }

  /** Drop the index and re-ingest everything, e.g. after an embedding change. */
  rebuildKnowledge(): Promise<RefreshReport> {
    return this.index.rebuild(this.lister);
  }

  knowledgeDocuments(): string[] {
    return this.index.documentIds();
  }

  // ==========================================================================
  // STATUS AND LIFECYCLE
  // ==========================================================================

  /** Advisory; returns immediately from cached state. */
  getStatus(): StatusReport {
    const stats = this.index.stats();
    const catalog = this.bundle.catalog;
    return {
      backend: this.health.current(),
      index: {
        documents: stats.documents,
        chunks: stats.chunks,
        embeddingVersion: stats.embeddingVersion,
        lastRefreshAt: stats.lastRefreshAt,
        lastSuccessfulRefreshAt: stats.lastSuccessfulRefreshAt,
        refreshRunning: this.refreshTask.isRunning(),
        lastRefreshError: this.refreshTask.lastError,
      },
      catalog: {
        version: catalog.version,
        rules: catalog.size,
        mandatory: this.bundle.selector.mandatoryRules().map((rule) => rule.id),
        source: catalog.source ?? null,
      },
      generatedAt: this.now().toISOString(),
    };
  }

  /** Probe the backend now instead of using the cached status. */
  probeBackend(): Promise<BackendStatus> {
    return this.health.probe();
  }

  /**
   * Re-read rule definitions and swap the bundle. On failure the current
   * bundle stays in place and the error propagates.
   */
  async reload(): Promise<ReloadReport> {
    const previousVersion = this.bundle.catalog.version;
    const catalog = await this.loadCatalog();
    this.bundle = this.buildBundle(catalog);
    logInfo('Rule catalog reloaded', { previousVersion, version: catalog.version, rules: catalog.size });
    return { previousVersion, version: catalog.version, rules: catalog.size };
  }

  /** Start the background knowledge refresh. Idempotent. */
  start(): void {
    this.refreshTask.start();
  }

  async stop(): Promise<void> {
    await this.refreshTask.stop();
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private buildBundle(catalog: RuleCatalog): RuleBundle {
    return {
      catalog,
      selector: new RuleSelector(catalog, this.backend, {
        rules: this.config.rules,
        selection: this.config.selection,
        stopwords: this.config.classification.stopwords,
        timeoutMs: this.config.backend.timeoutMs,
      }),
      planner: new PlanGenerator(catalog, this.config.planning),
    };
  }

  private async contextFor(context: TaskContext, options: TaskRequestOptions): Promise<TaskContext> {
    if (options.projectDir === undefined) return context;
    return withProjectContext(context, await this.analyzer.analyze(options.projectDir));
  }

  private async runSelection(task: string, context: TaskContext, signal?: AbortSignal): Promise<Pipeline> {
    const bundle = this.bundle;
    const classified = await this.classifier.classify(task, context, signal);
    const knowledge = await this.groundingFor(task);
    const selection = await bundle.selector.select({
      task,
      classification: classified.value,
      context,
      knowledge,
      signal,
    });
    return {
      bundle,
      classification: classified.value,
      classificationMode: classified.mode,
      selection,
    };
  }

  // Passages only matter when a backend will read the prompt.
  private async groundingFor(task: string): Promise<SearchResult[]> {
    const passages = this.config.knowledge.groundingPassages;
    if (!this.backend || passages === 0) return [];
    return this.retriever.search(task, passages);
  }

  private describeSelection(pipeline: Pipeline): SelectedRule[] {
    const { bundle, selection } = pipeline;
    const mandatory = new Set(bundle.selector.mandatoryRules().map((rule) => rule.id));
    return selection.orderedRuleIds.map((id) => {
      const rule = bundle.catalog.get(id);
      return {
        id: rule.id,
        title: rule.title,
        category: rule.category,
        mandatory: mandatory.has(id),
        score: selection.scores[id]?.total ?? 0,
      };
    });
  }
}
