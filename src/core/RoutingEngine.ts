/**
 * Routing Engine
 *
 * Unified API facade for Switchyard. Owns the SQLite storage and wires
 * the catalog, Learning Store, Selector, Execution Recorder,
 * Recommendation Matcher and Fallback Escalator together.
 */

import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

import { CapabilityCatalog } from '../catalog/CapabilityCatalog.js';
import { FallbackEscalator } from '../failure/FallbackEscalator.js';
import type { FallbackDecision } from '../failure/types.js';
import { LearningStore } from '../learning/LearningStore.js';
import type { LearningStatistics, LearningWeight } from '../learning/types.js';
import { ExecutionRecorder, type ExecutionReport } from '../recording/ExecutionRecorder.js';
import { RecommendationMatcher } from '../recommendation/RecommendationMatcher.js';
import type { Recommendation, RecommendOptions } from '../recommendation/types.js';
import { Selector } from '../routing/Selector.js';
import type { SelectionStats } from '../routing/types.js';
import { SQLiteStorage } from '../storage/SQLiteStorage.js';
import {
  type SwitchyardConfig,
  type SwitchyardConfigOverrides,
  getDefaultConfig,
  mergeConfig,
  validateConfig
} from './config.js';
import { ConfigValidationError } from './errors.js';
import type { ExecutionRecord, Request, RequestInput, SelectionPlan } from './types.js';

interface Components {
  storage: SQLiteStorage;
  catalog: CapabilityCatalog;
  learning: LearningStore;
  selector: Selector;
  recorder: ExecutionRecorder;
  matcher: RecommendationMatcher;
  escalator: FallbackEscalator;
}

export interface RoutingEngineOptions {
  config?: SwitchyardConfigOverrides;
  /** Use this catalog instead of loading config.catalogPath */
  catalog?: CapabilityCatalog;
}

export class RoutingEngine {
  private config: SwitchyardConfig;
  private catalogOverride: CapabilityCatalog | undefined;
  private components: Components | null = null;

  constructor(options: RoutingEngineOptions = {}) {
    const overrides = options.config ?? {};
    this.config = mergeConfig(getDefaultConfig(overrides.dataDir), overrides);
    this.catalogOverride = options.catalog;

    const errors = validateConfig(this.config);
    if (errors.length > 0) {
      throw new ConfigValidationError(errors);
    }
  }

  /**
   * Open storage, load the catalog and build the components
   */
  initialize(): void {
    this.ensureInitialized();
  }

  private ensureInitialized(): Components {
    if (!this.components) {
      this.components = this.build();
    }
    return this.components;
  }

  private build(): Components {
    const sqlitePath = this.config.storage.sqlitePath;
    if (sqlitePath !== ':memory:') {
      const sqliteDir = dirname(sqlitePath);
      if (!existsSync(sqliteDir)) {
        mkdirSync(sqliteDir, { recursive: true });
      }
    }

    const catalog = this.catalogOverride ?? CapabilityCatalog.load(this.config.catalogPath);
    const storage = new SQLiteStorage(this.config.storage);
    const learning = new LearningStore(storage, this.config.learning);
    const selector = new Selector(catalog, learning, this.config.selection, this.config.classification);
    const recorder = new ExecutionRecorder(storage, learning);
    const matcher = new RecommendationMatcher(catalog, learning, this.config.recommendation);
    const escalator = new FallbackEscalator(storage, catalog, matcher, this.config.fallback);

    console.log(`[Engine] Initialized with ${catalog.size} providers (${sqlitePath})`);
    return { storage, catalog, learning, selector, recorder, matcher, escalator };
  }

  // ==========================================
  // ROUTING
  // ==========================================

  createRequest(input: RequestInput): Request {
    return this.ensureInitialized().selector.createRequest(input);
  }

  select(request: Request): SelectionPlan {
    return this.ensureInitialized().selector.select(request);
  }

  /**
   * Classify and plan a request in one step
   */
  route(input: RequestInput): SelectionPlan {
    return this.ensureInitialized().selector.route(input);
  }

  // ==========================================
  // RECORDING & LEARNING
  // ==========================================

  record(request: Request, plan: SelectionPlan, report: ExecutionReport): ExecutionRecord {
    return this.ensureInitialized().recorder.record(request, plan, report);
  }

  getChain(chainId: string, limit?: number): ExecutionRecord[] {
    return this.ensureInitialized().recorder.getChain(chainId, limit);
  }

  weightsSnapshot(): ReadonlyMap<string, Readonly<LearningWeight>> {
    return this.ensureInitialized().learning.weightsSnapshot();
  }

  statistics(): LearningStatistics {
    return this.ensureInitialized().learning.statistics();
  }

  reward(record: ExecutionRecord): number {
    return this.ensureInitialized().learning.reward(record);
  }

  // ==========================================
  // FALLBACK
  // ==========================================

  check(failedProviderIds: readonly string[], chainId?: string): FallbackDecision {
    return this.ensureInitialized().escalator.check(failedProviderIds, chainId);
  }

  recommend(contextText: string, excludeProviderIds: Iterable<string> = [], options?: RecommendOptions): Recommendation[] {
    return this.ensureInitialized().matcher.recommend(contextText, excludeProviderIds, options);
  }

  // ==========================================
  // ACCESSORS
  // ==========================================

  getSelectionStats(): SelectionStats {
    return this.ensureInitialized().selector.getStats();
  }

  getCatalog(): CapabilityCatalog {
    return this.ensureInitialized().catalog;
  }

  getConfig(): SwitchyardConfig {
    return { ...this.config };
  }

  /**
   * Close the engine. It can be initialized again afterwards.
   */
  close(): void {
    if (!this.components) return;
    this.components.storage.close();
    this.components = null;
  }
}
