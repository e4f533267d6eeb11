/**
 * Retrieval strategy that produced a candidate
 */
export enum SourceTier {
  EXACT = 'EXACT',
  FUZZY = 'FUZZY',
  SEMANTIC = 'SEMANTIC',
}

/**
 * Tie-break order when confidences are equal (lower wins)
 */
export const TIER_PRIORITY: Record<SourceTier, number> = {
  [SourceTier.EXACT]: 0,
  [SourceTier.SEMANTIC]: 1,
  [SourceTier.FUZZY]: 2,
};

/**
 * Ranked suggestion returned to callers
 */
export interface SuggestionCandidate {
  command: string;
  confidence: number; // 0-1
  source_tier: SourceTier;
  tiers: SourceTier[];
  fuzzy_score?: number; // 0-100
  similarity_score?: number;
}

export interface SuggestRequest {
  partial: string;
  cwd?: string;
  history?: string[];
}
