/**
 * Fallback Types
 *
 * Escalation levels, decisions and configuration for the Fallback
 * Escalator.
 */

/**
 * How far to escalate after repeated unacceptable results
 */
export enum FallbackLevel {
  /** Retry with another provider of the same category */
  RETRY_SAME_CATEGORY = 1,
  /** Switch to a provider of another category */
  SWITCH_CATEGORY = 2,
  /** Hand over to an execution / tool provider */
  TOOL_EXECUTION = 3,
  /** Stop and ask a human */
  MANUAL_INTERVENTION = 4
}

/**
 * Outcome of a fallback check
 */
export interface FallbackDecision {
  shouldFallback: boolean;
  level: FallbackLevel;
  description: string;
  /** Catalog provider ids to try next, best first */
  recommendedTools: string[];
  /** External services or registries worth consulting */
  recommendedServices: string[];
  /** Chain the decision was made for (null when none could be found) */
  chainId: string | null;
  /** Trailing unacceptable results in the chain */
  failureStreak: number;
  /** Callers should surface this decision to the user (level >= 3) */
  userVisible: boolean;
  /** Checks worth running for the newest failure */
  suggestedChecks: string[];
}

export interface FallbackConfig {
  /** Successful results scoring below this still count as unacceptable */
  acceptabilityThreshold: number;
  /** External services recommended per level */
  servicesByLevel: Record<FallbackLevel, string[]>;
  maxRecommendations: number;
  /** Chain records inspected when measuring a streak */
  historyLimit: number;
}

export const DEFAULT_FALLBACK_CONFIG: FallbackConfig = {
  acceptabilityThreshold: 0.6,
  servicesByLevel: {
    [FallbackLevel.RETRY_SAME_CATEGORY]: [],
    [FallbackLevel.SWITCH_CATEGORY]: ['mcp.so'],
    [FallbackLevel.TOOL_EXECUTION]: ['aci.dev', 'github.com'],
    [FallbackLevel.MANUAL_INTERVENTION]: ['manual-review']
  },
  maxRecommendations: 3,
  historyLimit: 50
};

export const LEVEL_DESCRIPTIONS: Record<FallbackLevel, string> = {
  [FallbackLevel.RETRY_SAME_CATEGORY]: 'Retry with another provider of the same category',
  [FallbackLevel.SWITCH_CATEGORY]: 'Switch to a provider of a different category',
  [FallbackLevel.TOOL_EXECUTION]: 'Escalate to an execution or tool provider',
  [FallbackLevel.MANUAL_INTERVENTION]: 'Manual intervention required'
};
