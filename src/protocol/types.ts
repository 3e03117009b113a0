/**
 * Shared types for purge requests, outcomes and the MCP action layer.
 */

import type { PurgeErrorKind } from './errors.js';

// ── Risk Tiers ──────────────────────────────────────────────────────────────

export enum RiskTier {
  Safe = 1,     // diagnostics, dry runs
  Risk = 2,     // targeted purges (urls, tags, prefixes, entity)
  Critical = 3, // purge everything
}

// ── Purge Requests ──────────────────────────────────────────────────────────

export enum PurgeMode {
  ByUrl = 'urls',
  Everything = 'everything',
  ByTag = 'tags',
  ByPrefix = 'prefixes',
}

export type PurgeTarget =
  | { mode: PurgeMode.ByUrl; urls: string[] }
  | { mode: PurgeMode.Everything }
  | { mode: PurgeMode.ByTag; tags: string[] }
  | { mode: PurgeMode.ByPrefix; prefixes: string[] };

export interface PurgeJob {
  id: string;
  target: PurgeTarget;
  createdAt: Date;
  delaySeconds: number;
  runAt: Date;
}

// ── Outcomes ────────────────────────────────────────────────────────────────

export interface PurgeOutcome {
  success: boolean;
  mode: PurgeMode;
  /** HTTP status of the last attempt, null when no response arrived. */
  status: number | null;
  errorKind?: PurgeErrorKind;
  error?: string;
  batchUrls: string[];
  purgeId?: string;
}

export type PurgeResult =
  | { status: 'skipped'; success: true; reason: 'disabled' | 'empty' }
  | { status: 'dry_run'; success: true; target: PurgeTarget; batches: string[][] }
  | { status: 'scheduled'; success: true; jobId: string; runAt: Date; batchCount: number }
  | { status: 'completed'; success: boolean; outcomes: PurgeOutcome[] };

export interface TokenVerification {
  valid: boolean;
  status: number | null;
  tokenId?: string;
  tokenStatus?: string;
  errorKind?: PurgeErrorKind;
  error?: string;
}

// ── Action Definition ───────────────────────────────────────────────────────

export interface ActionDefinition {
  name: string;
  description: string;
  riskTier: RiskTier;
  handler: (params: Record<string, unknown>, context: ActionContext) => Promise<unknown>;
}

export interface ActionContext {
  sessionId: string;
  requestedAt: Date;
}

// ── Audit Record ────────────────────────────────────────────────────────────

export interface AuditRecord {
  timestamp: string;
  action: string;
  params: Record<string, unknown>;
  result_summary: string;
  reason: string | null;
}
