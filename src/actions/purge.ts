/**
 * Purge actions: URLs, tags, prefixes, entities and the whole zone.
 * Purge-everything is Critical tier; the rest are Risk tier. Dry runs skip
 * confirmation and the rate budget since nothing is sent.
 */

import { ActionDefinition, ActionContext, PurgeResult, RiskTier } from '../protocol/types.js';
import {
  PurgeUrlsSchema,
  PurgeTagsSchema,
  PurgePrefixesSchema,
  PurgeEverythingSchema,
  PurgeEntitySchema,
} from '../validation/schemas.js';
import { Guardrails } from '../validation/guardrails.js';
import { PurgeDispatcher } from '../purge/dispatcher.js';
import { PurgeError } from '../protocol/errors.js';

interface GuardedParams {
  confirm?: true;
  reason?: string;
  dry_run: boolean;
}

/**
 * Check confirmation and the rate budget, then run the purge. A purge the
 * dispatcher rejects before sending hands its budget slot back.
 */
async function guarded(
  guardrails: Guardrails,
  tier: RiskTier,
  params: GuardedParams,
  purge: () => Promise<PurgeResult>,
): Promise<PurgeResult> {
  if (params.dry_run) return purge();
  guardrails.requireConfirmation(tier, params);
  guardrails.checkRateLimit();
  try {
    return await purge();
  } catch (err) {
    if (err instanceof PurgeError) guardrails.releaseRateLimit();
    throw err;
  }
}

/**
 * Human-readable one-line summary plus the raw result, for tool output.
 */
export function describeResult(result: PurgeResult): { message: string; result: PurgeResult } {
  switch (result.status) {
    case 'skipped':
      return {
        message: result.reason === 'disabled' ? 'Purging is disabled; nothing was sent.' : 'Nothing to purge.',
        result,
      };
    case 'dry_run': {
      const count = result.batches.reduce((sum, b) => sum + b.length, 0);
      return { message: `Dry run: would send ${result.batches.length} request(s) covering ${count} item(s).`, result };
    }
    case 'scheduled':
      return {
        message: `Scheduled purge job ${result.jobId} (${result.batchCount} request(s)) for ${result.runAt.toISOString()}.`,
        result,
      };
    case 'completed': {
      const ok = result.outcomes.filter((o) => o.success).length;
      return { message: `Purged ${ok}/${result.outcomes.length} request(s).`, result };
    }
  }
}

export function createPurgeActions(
  dispatcher: PurgeDispatcher,
  guardrails: Guardrails,
): ActionDefinition[] {
  return [
    // ── Purge by URL ──────────────────────────────────────────────────────
    {
      name: 'purge.urls',
      description: 'Purge specific URLs (or site-relative paths) from the CDN cache.',
      riskTier: RiskTier.Risk,
      handler: async (params: Record<string, unknown>, _context: ActionContext) => {
        const validated = PurgeUrlsSchema.parse(params);
        const result = await guarded(guardrails, RiskTier.Risk, validated, () =>
          dispatcher.purgeUrls(validated.urls, {
            dryRun: validated.dry_run,
            background: !validated.wait,
          }),
        );
        return describeResult(result);
      },
    },

    // ── Purge by Tag ──────────────────────────────────────────────────────
    {
      name: 'purge.tags',
      description: 'Purge cached content by cache tag (requires a plan with tag purge).',
      riskTier: RiskTier.Risk,
      handler: async (params: Record<string, unknown>, _context: ActionContext) => {
        const validated = PurgeTagsSchema.parse(params);
        const result = await guarded(guardrails, RiskTier.Risk, validated, () =>
          dispatcher.purgeTags(validated.tags, {
            dryRun: validated.dry_run,
            background: !validated.wait,
          }),
        );
        return describeResult(result);
      },
    },

    // ── Purge by Prefix ───────────────────────────────────────────────────
    {
      name: 'purge.prefixes',
      description: 'Purge cached content by URL prefix (requires a plan with prefix purge).',
      riskTier: RiskTier.Risk,
      handler: async (params: Record<string, unknown>, _context: ActionContext) => {
        const validated = PurgePrefixesSchema.parse(params);
        const result = await guarded(guardrails, RiskTier.Risk, validated, () =>
          dispatcher.purgePrefixes(validated.prefixes, {
            dryRun: validated.dry_run,
            background: !validated.wait,
          }),
        );
        return describeResult(result);
      },
    },

    // ── Purge Entity ──────────────────────────────────────────────────────
    {
      name: 'purge.entity',
      description: 'Purge the URLs an entity maps to, including configured dependent pages.',
      riskTier: RiskTier.Risk,
      handler: async (params: Record<string, unknown>, _context: ActionContext) => {
        const validated = PurgeEntitySchema.parse(params);
        const canonicalUrl = validated.canonical_url;
        const instance = canonicalUrl ? { getCanonicalUrl: () => canonicalUrl } : {};
        const result = await guarded(guardrails, RiskTier.Risk, validated, () =>
          dispatcher.purgeEntity(validated.entity_type, instance, {
            dryRun: validated.dry_run,
            background: !validated.wait,
          }),
        );
        return describeResult(result);
      },
    },

    // ── Purge Everything ──────────────────────────────────────────────────
    {
      name: 'purge.everything',
      description: 'Purge the entire zone cache. Use sparingly.',
      riskTier: RiskTier.Critical,
      handler: async (params: Record<string, unknown>, _context: ActionContext) => {
        const validated = PurgeEverythingSchema.parse(params);
        const result = await guarded(guardrails, RiskTier.Critical, validated, () =>
          dispatcher.purgeEverything({
            dryRun: validated.dry_run,
            background: !validated.wait,
          }),
        );
        return describeResult(result);
      },
    },
  ];
}
