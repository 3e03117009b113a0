/**
 * Zod schemas for validating action parameters.
 */

import { z } from 'zod';

// ── Common Schemas ──────────────────────────────────────────────────────────

export const ConfirmationSchema = z.object({
  confirm: z.literal(true).optional(),
  reason: z.string().optional(),
});

export const DryRunSchema = z.object({
  dry_run: z.boolean().optional().default(false),
  /** Wait for delivery instead of scheduling in the background. */
  wait: z.boolean().optional().default(true),
});

// ── Purge Schemas ───────────────────────────────────────────────────────────

const UrlOrPathSchema = z.string().min(1).refine(
  (value) => value.startsWith('/') || /^https?:\/\//i.test(value),
  { message: 'Each entry must be an absolute http(s) URL or a path starting with "/"' },
).refine((value) => !value.includes('*'), {
  message: 'Wildcard purge is not allowed. Use purge.prefixes or list exact URLs.',
});

export const PurgeUrlsSchema = ConfirmationSchema.merge(DryRunSchema).extend({
  urls: z.array(UrlOrPathSchema).min(1).max(10_000),
});

export const PurgeTagsSchema = ConfirmationSchema.merge(DryRunSchema).extend({
  tags: z.array(z.string().min(1).max(1024)).min(1),
});

export const PurgePrefixesSchema = ConfirmationSchema.merge(DryRunSchema).extend({
  prefixes: z.array(z.string().min(1)).min(1),
});

export const PurgeEverythingSchema = ConfirmationSchema.merge(DryRunSchema);

export const PurgeEntitySchema = ConfirmationSchema.merge(DryRunSchema).extend({
  entity_type: z.string().min(1),
  canonical_url: UrlOrPathSchema.optional(),
});

// ── Diagnostics Schemas ─────────────────────────────────────────────────────

export const DiagnosticsStatusSchema = z.object({
  recent_audit_count: z.number().int().min(1).max(200).optional().default(10),
});
