// Operator feedback on a previous resolution

export type VerificationDecision = 'accepted' | 'rejected';

export interface VerificationRequest {
  sourceName: string;
  matchedName: string;
  accepted: boolean;
  context?: string | null;
}

/**
 * What a verification did to the learned mappings table.
 * `removed` counts rows deleted on rejection (all contexts for the pair).
 */
export interface VerificationOutcome {
  sourceName: string;
  matchedName: string;
  decision: VerificationDecision;
  removed: number;
  learnedMappingsCount: number;
}
