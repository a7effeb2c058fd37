/**
 * Knowledge base for the resolver: manual mappings, learned mappings and the
 * normalization rules.
 *
 * Static tables are read once by `load()` and again on `reload()`. The learned
 * cache is rebuilt from the store after every learning write or verification.
 * Pairs this process learned are kept in a session overlay, so a freshly learned
 * mapping is usable on the next call even when it is below the trusted confidence.
 */

import type {
  LearnedMapping,
  LearnedStrategyName,
  ManualMapping,
  VerificationOutcome,
} from '@team-identity/shared/types';
import { OverrideFileUnreadableError } from '../errors.js';
import { compileRules, normalizeTeamName, type CompiledRule } from '../matching/normalizer.js';
import type { MappingLookup } from '../matching/strategies/types.js';
import type { MappingStore } from '../store/types.js';
import { Alerter } from '../utils/alerting.js';
import {
  BUILTIN_MAPPINGS_FILE,
  NORMALIZATION_RULES_FILE,
  mergeManualMappings,
  readMappingFile,
  readNormalizationRules,
} from './manual-mappings.js';

export interface KnowledgeBaseOptions {
  store: MappingStore;
  /** Operator override file; null skips it */
  overrideFile?: string | null;
  builtinMappingsFile?: string;
  normalizationRulesFile?: string;
  alerter?: Alerter;
}

export class KnowledgeBase implements MappingLookup {
  private manual = new Map<string, string>();
  private learned = new Map<string, string>();
  private readonly sessionLearned = new Map<string, string>();
  private rules: CompiledRule[] = [];
  private refreshGeneration = 0;

  private readonly store: MappingStore;
  private readonly overrideFile: string | null;
  private readonly builtinMappingsFile: string;
  private readonly normalizationRulesFile: string;
  private readonly alerter: Alerter;

  constructor(options: KnowledgeBaseOptions) {
    this.store = options.store;
    this.overrideFile = options.overrideFile ?? null;
    this.builtinMappingsFile = options.builtinMappingsFile ?? BUILTIN_MAPPINGS_FILE;
    this.normalizationRulesFile = options.normalizationRulesFile ?? NORMALIZATION_RULES_FILE;
    this.alerter = options.alerter ?? new Alerter();
  }

  readonly normalize = (name: string | null | undefined): string => normalizeTeamName(name, this.rules);

  async load(): Promise<void> {
    await this.loadStaticTables();
    await this.refreshLearned();
  }

  reload(): Promise<void> {
    return this.load();
  }

  lookupManual(sourceName: string): string | null {
    return this.manual.get(sourceName) ?? null;
  }

  lookupLearned(sourceName: string): string | null {
    return this.learned.get(sourceName) ?? null;
  }

  get manualMappingsCount(): number {
    return this.manual.size;
  }

  get cachedLearnedCount(): number {
    return this.learned.size;
  }

  /**
   * Rebuild the learned cache from the store's trusted rows plus the session overlay.
   * On a store failure the previous cache is kept. A refresh overtaken by a
   * newer one while reading leaves the cache to the newer one.
   */
  async refreshLearned(): Promise<void> {
    const generation = ++this.refreshGeneration;
    let trusted: LearnedMapping[];
    try {
      trusted = await this.store.loadTrustedLearnedMappings();
    } catch (error) {
      this.persistenceFailed('Learned mappings unavailable', error);
      return;
    }
    if (generation !== this.refreshGeneration) {
      return;
    }

    const next = new Map<string, string>();
    // Rows arrive highest confidence first; the first row for a name wins
    for (const mapping of trusted) {
      if (!next.has(mapping.sourceName)) {
        next.set(mapping.sourceName, mapping.matchedName);
      }
    }
    for (const [sourceName, matchedName] of this.sessionLearned) {
      if (!next.has(sourceName)) {
        next.set(sourceName, matchedName);
      }
    }

    this.learned = next;
  }

  /**
   * Persist a mapping found by the cascade. Store failures propagate.
   */
  async recordLearned(
    sourceName: string,
    matchedName: string,
    confidence: number,
    strategyUsed: LearnedStrategyName,
    context: string | null
  ): Promise<void> {
    await this.store.upsertLearnedMapping({
      sourceName,
      matchedName,
      confidence,
      strategyUsed,
      verified: false,
      context,
    });
    this.sessionLearned.set(sourceName, matchedName);
    await this.refreshLearned();
  }

  /**
   * Apply an operator decision. Acceptance stores a verified mapping for the context;
   * rejection removes the pair in every context.
   */
  async verify(
    sourceName: string,
    matchedName: string,
    accepted: boolean,
    context: string | null = null
  ): Promise<VerificationOutcome> {
    let removed = 0;

    if (accepted) {
      await this.store.upsertLearnedMapping({
        sourceName,
        matchedName,
        confidence: 1.0,
        strategyUsed: 'manual_verification',
        verified: true,
        context,
      });
    } else {
      removed = await this.store.deleteLearnedMapping(sourceName, matchedName);
      if (this.sessionLearned.get(sourceName) === matchedName) {
        this.sessionLearned.delete(sourceName);
      }
      if (this.learned.get(sourceName) === matchedName) {
        this.learned.delete(sourceName);
      }
    }

    await this.refreshLearned();
    console.error(
      `[knowledge-base] Verification recorded: ${sourceName} -> ${matchedName} (${accepted ? 'accepted' : 'rejected'})`
    );

    return {
      sourceName,
      matchedName,
      decision: accepted ? 'accepted' : 'rejected',
      removed,
      learnedMappingsCount: await this.countLearned(),
    };
  }

  /**
   * Size of the learned table, or of the in-memory cache when the store is unreachable.
   */
  async countLearned(): Promise<number> {
    try {
      return await this.store.countLearnedMappings();
    } catch (error) {
      this.persistenceFailed('Learned mappings count unavailable', error);
      return this.learned.size;
    }
  }

  private async loadStaticTables(): Promise<void> {
    const rules = await readNormalizationRules(this.normalizationRulesFile);
    this.rules = compileRules(rules, (rule, error) => {
      this.alerter.warning('Normalization rule skipped', `Pattern ${rule.pattern} is not a valid expression`, {
        error: error instanceof Error ? error.message : String(error),
      });
    });

    const builtin = await readMappingFile(this.builtinMappingsFile);

    let storeRows: ManualMapping[] = [];
    try {
      storeRows = await this.store.loadManualMappings();
    } catch (error) {
      this.persistenceFailed('Stored manual mappings unavailable', error);
    }

    let override: Record<string, string> = {};
    if (this.overrideFile) {
      try {
        override = await readMappingFile(this.overrideFile);
        console.error(`[knowledge-base] Loaded ${Object.keys(override).length} override mappings from ${this.overrideFile}`);
      } catch (error) {
        if (!(error instanceof OverrideFileUnreadableError)) {
          throw error;
        }
        this.overrideUnreadable(error);
      }
    }

    this.manual = mergeManualMappings(builtin, storeRows, override);
    console.error(`[knowledge-base] Loaded ${this.manual.size} manual mappings, ${this.rules.length} normalization rules`);
  }

  private overrideUnreadable(error: OverrideFileUnreadableError): void {
    if (error.problem === 'missing') {
      console.error(`[knowledge-base] No override file at ${error.path}, using built-in mappings`);
      return;
    }
    this.alerter.warning('Manual mappings file unreadable', error.message, { path: error.path });
  }

  private persistenceFailed(title: string, error: unknown): void {
    this.alerter.error(title, error instanceof Error ? error.message : String(error));
  }
}
