/**
 * Guardrails for manually triggered purges.
 * Enforces confirmation requirements and a per-minute purge budget.
 */

import { PurgeConfig } from '../config/index.js';
import { RiskTier } from '../protocol/types.js';

export const GuardrailCodes = {
  CONFIRMATION_REQUIRED: 'CONFIRMATION_REQUIRED',
  RATE_LIMITED: 'RATE_LIMITED',
} as const;

export type GuardrailCode = (typeof GuardrailCodes)[keyof typeof GuardrailCodes];

export class GuardrailError extends Error {
  constructor(
    public readonly code: GuardrailCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GuardrailError';
  }
}

const RATE_WINDOW_MS = 60_000;

export class Guardrails {
  private windowStart: number;
  private count = 0;

  constructor(
    private config: Pick<PurgeConfig, 'confirmationRequired' | 'purgeRateLimitPerMinute'>,
    private now: () => number = () => Date.now(),
  ) {
    this.windowStart = now();
  }

  /**
   * Enforce Tier 2+ confirmation requirement.
   */
  requireConfirmation(riskTier: RiskTier, params: { confirm?: true; reason?: string }): void {
    if (riskTier < RiskTier.Risk || !this.config.confirmationRequired) return;

    if (params.confirm !== true) {
      throw new GuardrailError(
        GuardrailCodes.CONFIRMATION_REQUIRED,
        `This action requires confirm: true and a reason string (Risk Tier ${riskTier}).`,
      );
    }
    if (!params.reason || params.reason.trim().length === 0) {
      throw new GuardrailError(
        GuardrailCodes.CONFIRMATION_REQUIRED,
        'A non-empty reason string is required for Tier 2+ operations.',
      );
    }
  }

  /**
   * Count one purge operation against the per-minute budget.
   */
  checkRateLimit(): void {
    const now = this.now();
    if (now - this.windowStart >= RATE_WINDOW_MS) {
      this.count = 0;
      this.windowStart = now;
    }

    this.count++;
    if (this.count > this.config.purgeRateLimitPerMinute) {
      throw new GuardrailError(
        GuardrailCodes.RATE_LIMITED,
        `Rate limit exceeded: ${this.config.purgeRateLimitPerMinute} purge operations per minute.`,
        { limit: this.config.purgeRateLimitPerMinute, retryAfterMs: RATE_WINDOW_MS - (now - this.windowStart) },
      );
    }
  }

  /**
   * Give back the slot taken by the last `checkRateLimit` when the purge was
   * rejected before anything was sent.
   */
  releaseRateLimit(): void {
    if (this.count > 0) this.count--;
  }
}
