/**
 * Session Limits Configuration
 *
 * Limits that stop runaway work inside a session. They can be overridden
 * when creating a Memory or a CalculatorSession.
 */

/**
 * Configuration for session limits.
 * All limits are optional - undefined values use defaults.
 */
export interface SessionLimits {
  /** Maximum number of substituting passes over one expression (default: 100) */
  maxSubstitutionPasses?: number;
}

const DEFAULT_LIMITS: Required<SessionLimits> = {
  maxSubstitutionPasses: 100,
};

/**
 * Resolve session limits by merging user-provided limits with defaults.
 */
export function resolveLimits(
  userLimits?: SessionLimits,
): Required<SessionLimits> {
  if (!userLimits) {
    return { ...DEFAULT_LIMITS };
  }
  return {
    maxSubstitutionPasses:
      userLimits.maxSubstitutionPasses ?? DEFAULT_LIMITS.maxSubstitutionPasses,
  };
}
