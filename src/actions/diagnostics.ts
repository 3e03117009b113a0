/**
 * Diagnostics actions: token verification and pipeline status.
 * All read-only (Tier 1).
 */

import { ActionDefinition, ActionContext, RiskTier } from '../protocol/types.js';
import { DiagnosticsStatusSchema } from '../validation/schemas.js';
import { PurgeClient } from '../client/cloudflareClient.js';
import { PurgeConfig, effectiveZoneHosts } from '../config/index.js';
import { ModelRegistry } from '../purge/registry.js';
import { AuditLogger } from '../audit/auditLogger.js';

export function createDiagnosticsActions(
  client: PurgeClient,
  registry: ModelRegistry,
  config: PurgeConfig,
  auditLogger: AuditLogger,
): ActionDefinition[] {
  return [
    // ── Verify Token ──────────────────────────────────────────────────────
    {
      name: 'diagnostics.verify_token',
      description: 'Check that the configured Cloudflare API token is valid.',
      riskTier: RiskTier.Safe,
      handler: async (_params: Record<string, unknown>, _context: ActionContext) => {
        if (!config.apiToken) {
          return { valid: false, message: 'CLOUDFLARE_API_TOKEN is not configured.' };
        }
        if (!config.zoneId) {
          return { valid: false, message: 'CLOUDFLARE_ZONE_ID is not configured.' };
        }

        const verification = await client.verifyToken();
        return {
          ...verification,
          message: verification.valid
            ? `API token is valid (status: ${verification.tokenStatus ?? 'unknown'}).`
            : `API token verification failed: ${verification.error ?? 'unknown error'}`,
        };
      },
    },

    // ── Status ────────────────────────────────────────────────────────────
    {
      name: 'diagnostics.status',
      description: 'Show purge settings, registered entity types, dependency rules and recent audit entries.',
      riskTier: RiskTier.Safe,
      handler: async (params: Record<string, unknown>, _context: ActionContext) => {
        const validated = DiagnosticsStatusSchema.parse(params);
        return {
          enabled: config.enabled,
          credentials_configured: client.hasCredentials(),
          background: config.background,
          batch_size: config.batchSize,
          delay_seconds: config.delaySeconds,
          site_url: config.siteUrl || null,
          zone_hosts: effectiveZoneHosts(config),
          registered_entity_types: registry.list().map((m) => ({
            entity_type: m.entityType,
            custom_resolver: m.resolveUrls !== undefined,
            include_dependencies: m.includeDependencies,
          })),
          url_dependencies: config.urlDependencies,
          recent_audit: auditLogger.readRecent(validated.recent_audit_count),
        };
      },
    },
  ];
}
