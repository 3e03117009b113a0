/**
 * Runs one action on behalf of an MCP tool call: executes the handler, audits
 * the call and shapes the result or error into tool output.
 */

import { ZodError } from 'zod';
import { ActionDefinition, ActionContext, AuditRecord } from './types.js';
import { AuditLogger } from '../audit/auditLogger.js';
import { GuardrailError } from '../validation/guardrails.js';
import { PurgeError } from './errors.js';

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export interface ToolErrorBody {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Map a thrown error onto a stable error body.
 */
export function toErrorBody(err: unknown): ToolErrorBody {
  if (err instanceof ZodError) {
    return { code: 'VALIDATION_ERROR', message: 'Invalid parameters.', details: err.issues };
  }
  if (err instanceof GuardrailError) {
    return { code: err.code, message: err.message, details: err.details };
  }
  if (err instanceof PurgeError) {
    return { code: err.kind, message: err.message, details: err.details };
  }
  return { code: 'INTERNAL_ERROR', message: err instanceof Error ? err.message : String(err) };
}

export async function runAction(
  action: ActionDefinition,
  params: Record<string, unknown>,
  context: ActionContext,
  auditLogger: AuditLogger,
): Promise<ToolResponse> {
  const reason = typeof params['reason'] === 'string' ? params['reason'] : null;

  try {
    const result = await action.handler(params, context);

    const auditRecord: AuditRecord = {
      timestamp: new Date().toISOString(),
      action: action.name,
      params,
      result_summary: summarizeResult(result),
      reason,
    };
    auditLogger.log(auditRecord);

    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      isError: isFailedPurge(result),
    };
  } catch (err) {
    const error = toErrorBody(err);

    const auditRecord: AuditRecord = {
      timestamp: new Date().toISOString(),
      action: action.name,
      params,
      result_summary: `ERROR ${error.code}: ${error.message}`,
      reason,
    };
    auditLogger.log(auditRecord);

    return {
      content: [{ type: 'text', text: JSON.stringify({ error }, null, 2) }],
      isError: true,
    };
  }
}

export function summarizeResult(result: unknown): string {
  if (result === null || result === undefined) return 'null';
  if (typeof result === 'object') {
    if ('message' in result && result.message) return String(result.message);
    return `object with keys: ${Object.keys(result).join(', ')}`;
  }
  return String(result);
}

function isFailedPurge(result: unknown): boolean {
  if (typeof result !== 'object' || result === null) return false;
  if ('valid' in result && result.valid === false) return true;
  if (!('result' in result) || typeof result.result !== 'object' || result.result === null) return false;
  return 'success' in result.result && result.result.success === false;
}
