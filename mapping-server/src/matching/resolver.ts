/**
 * Team identity resolution: runs the strategy cascade, logs every attempt and
 * feeds confident matches back into the knowledge base.
 */

import type {
  LearnedMapping,
  MappingReport,
  MatchResult,
  ResolveRequest,
  VerificationOutcome,
  VerificationRequest,
} from '@team-identity/shared/types';
import { KnowledgeBase } from '../knowledge/knowledge-base.js';
import { buildMappingReport, reportCutoff } from '../reporting/report.js';
import type { LearnedMappingFilter, MappingStore } from '../store/types.js';
import { Alerter } from '../utils/alerting.js';
import { buildStrategyCascade, noMatch, type MatchingStrategy } from './strategies/index.js';
import { MATCHING_LIMITS } from './thresholds.js';

export interface TeamResolverOptions {
  store: MappingStore;
  /** Operator override file for manual mappings; null skips it */
  overrideFile?: string | null;
  learnMappings?: boolean;
  alerter?: Alerter;
  defaultReportDays?: number;
  now?: () => Date;
  /** Replaces the data files shipped with the package (tests) */
  builtinMappingsFile?: string;
  normalizationRulesFile?: string;
}

export interface ReloadSummary {
  manualMappings: number;
  learnedMappings: number;
}

/**
 * Keep only string candidates, first occurrence of each.
 */
export function sanitizeCandidates(candidates: readonly unknown[] | null | undefined): string[] {
  const seen = new Set<string>();
  for (const candidate of candidates ?? []) {
    if (typeof candidate === 'string') {
      seen.add(candidate);
    }
  }
  return [...seen];
}

export class TeamResolver {
  readonly knowledgeBase: KnowledgeBase;
  readonly strategies: readonly MatchingStrategy[];
  readonly learnMappings: boolean;
  readonly defaultReportDays: number;

  private readonly store: MappingStore;
  private readonly alerter: Alerter;
  private readonly now: () => Date;
  private readonly pendingWrites = new Set<Promise<void>>();

  private constructor(options: TeamResolverOptions) {
    this.store = options.store;
    this.alerter = options.alerter ?? new Alerter();
    this.learnMappings = options.learnMappings ?? true;
    this.defaultReportDays = options.defaultReportDays ?? 7;
    this.now = options.now ?? (() => new Date());
    this.knowledgeBase = new KnowledgeBase({
      store: options.store,
      overrideFile: options.overrideFile,
      builtinMappingsFile: options.builtinMappingsFile,
      normalizationRulesFile: options.normalizationRulesFile,
      alerter: this.alerter,
    });
    this.strategies = buildStrategyCascade(this.knowledgeBase, this.knowledgeBase.normalize);
  }

  /**
   * Build a resolver and load its knowledge base.
   */
  static async create(options: TeamResolverOptions): Promise<TeamResolver> {
    const resolver = new TeamResolver(options);
    await resolver.knowledgeBase.load();
    return resolver;
  }

  /**
   * Resolve one provider name against the other provider's names.
   * The attempt log and learning writes continue in the background; their failures are
   * alerted and never reach the caller. `settle()` waits for them.
   */
  async resolve(
    sourceName: string | null | undefined,
    candidates: readonly unknown[] | null | undefined,
    context: string | null = null
  ): Promise<MatchResult> {
    const started = performance.now();
    const name = sourceName ?? '';
    const pool = sanitizeCandidates(candidates);

    const result: MatchResult = {
      ...this.runCascade(name, pool),
      elapsedMs: performance.now() - started,
    };

    this.track(this.persist(result, context));

    return result;
  }

  /**
   * Wait for the background writes of earlier resolutions.
   */
  async settle(): Promise<void> {
    while (this.pendingWrites.size > 0) {
      await Promise.all([...this.pendingWrites]);
    }
  }

  async resolveMany(requests: readonly ResolveRequest[]): Promise<MatchResult[]> {
    const results: MatchResult[] = [];
    for (const request of requests) {
      results.push(await this.resolve(request.sourceName, request.candidates, request.context ?? null));
    }
    return results;
  }

  /**
   * Record an operator decision on a past resolution. Store failures are alerted and rethrown.
   */
  async verify(request: VerificationRequest): Promise<VerificationOutcome> {
    // A learning write still in flight would otherwise land after the decision
    await this.settle();
    try {
      return await this.knowledgeBase.verify(
        request.sourceName,
        request.matchedName,
        request.accepted,
        request.context ?? null
      );
    } catch (error) {
      this.persistenceFailed('Verification not recorded', error, {
        sourceName: request.sourceName,
        matchedName: request.matchedName,
      });
      throw error;
    }
  }

  /**
   * Aggregate the attempt log over the last `days` days. A store failure yields an empty report.
   */
  async report(days: number = this.defaultReportDays): Promise<MappingReport> {
    await this.settle();
    const now = this.now();
    const counts = {
      manualMappingsCount: this.knowledgeBase.manualMappingsCount,
    };

    try {
      const attempts = await this.store.listAttemptsSince(reportCutoff(now, days));
      const learnedMappingsCount = await this.store.countLearnedMappings();
      return buildMappingReport(attempts, { now, periodDays: days, ...counts, learnedMappingsCount });
    } catch (error) {
      this.persistenceFailed('Mapping report unavailable', error);
      return buildMappingReport([], {
        now,
        periodDays: days,
        ...counts,
        learnedMappingsCount: this.knowledgeBase.cachedLearnedCount,
      });
    }
  }

  /**
   * Learned mappings as stored, most recent first. Store failures propagate.
   */
  async listLearnedMappings(filter?: LearnedMappingFilter): Promise<LearnedMapping[]> {
    await this.settle();
    return this.store.listLearnedMappings(filter);
  }

  /**
   * Re-read the static tables and the learned cache.
   */
  async reload(): Promise<ReloadSummary> {
    await this.settle();
    await this.knowledgeBase.reload();
    return {
      manualMappings: this.knowledgeBase.manualMappingsCount,
      learnedMappings: this.knowledgeBase.cachedLearnedCount,
    };
  }

  async close(): Promise<void> {
    await this.settle();
    await this.alerter.close();
    await this.store.close();
  }

  private runCascade(sourceName: string, candidates: readonly string[]): MatchResult {
    let last: MatchResult | null = null;
    for (const strategy of this.strategies) {
      const result = strategy.match(sourceName, candidates);
      if (result.matchFound && result.confidence >= strategy.threshold) {
        return result;
      }
      last = result;
    }
    // Nothing accepted: the last (fuzzy) result is returned as is
    return last ?? noMatch(sourceName, 'fuzzy_matching');
  }

  private shouldLearn(result: MatchResult): boolean {
    return (
      this.learnMappings &&
      result.matchFound &&
      result.confidence >= MATCHING_LIMITS.LEARNING_FLOOR &&
      result.strategyUsed !== 'learned_mapping'
    );
  }

  private track(write: Promise<void>): void {
    const tracked = write.finally(() => {
      this.pendingWrites.delete(tracked);
    });
    this.pendingWrites.add(tracked);
  }

  private async persist(result: MatchResult, context: string | null): Promise<void> {
    await this.recordAttempt(result, context);
    if (this.shouldLearn(result)) {
      await this.learn(result, context);
    }
  }

  private async recordAttempt(result: MatchResult, context: string | null): Promise<void> {
    try {
      await this.store.appendAttempt({
        sourceName: result.sourceName,
        matchedName: result.matchFound ? result.matchedName : null,
        confidence: result.confidence,
        strategyUsed: result.strategyUsed,
        success: result.matchFound,
        elapsedMs: result.elapsedMs,
        alternatives: result.alternatives,
        context,
        attemptedAt: this.now(),
      });
    } catch (error) {
      this.persistenceFailed('Mapping attempt not recorded', error, { sourceName: result.sourceName });
    }
  }

  private async learn(result: MatchResult, context: string | null): Promise<void> {
    try {
      await this.knowledgeBase.recordLearned(
        result.sourceName,
        result.matchedName,
        result.confidence,
        result.strategyUsed,
        context
      );
    } catch (error) {
      this.persistenceFailed('Learned mapping not stored', error, {
        sourceName: result.sourceName,
        matchedName: result.matchedName,
      });
    }
  }

  private persistenceFailed(title: string, error: unknown, details?: Record<string, unknown>): void {
    this.alerter.error(title, error instanceof Error ? error.message : String(error), details);
  }
}
