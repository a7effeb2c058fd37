// Matching types
export type {
  StrategyName,
  LearnedStrategyName,
  MatchResult,
  ResolveRequest,
} from './matching.js';

// Mapping and attempt log types
export type {
  ManualMapping,
  LearnedMapping,
  LearnedMappingInput,
  AttemptRecord,
  AttemptRecordInput,
  NormalizationRule,
} from './mappings.js';

// Reporting types
export type {
  OverallStats,
  StrategyPerformance,
  FailedMapping,
  RecentSuccess,
  MappingReport,
} from './report.js';

// Verification types
export type {
  VerificationDecision,
  VerificationRequest,
  VerificationOutcome,
} from './verification.js';
