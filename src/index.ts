#!/usr/bin/env node
/**
 * edge-purge MCP server entry point.
 *
 * Wires up all components:
 * - Configuration
 * - Purge pipeline (registry, resolver, client, dispatcher)
 * - Audit logger
 * - Guardrails
 * - All action handlers
 * - MCP SDK server over stdio
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';

import { loadConfig } from './config/index.js';
import { AuditLogger } from './audit/auditLogger.js';
import { Guardrails } from './validation/guardrails.js';
import { ActionDefinition, ActionContext } from './protocol/types.js';
import { runAction } from './protocol/actionRunner.js';
import { createPurgePipeline } from './purge/setup.js';

// Actions
import { createPurgeActions } from './actions/purge.js';
import { createDiagnosticsActions } from './actions/diagnostics.js';

const TIER_NAMES: Record<number, string> = { 1: 'Safe', 2: 'Risk', 3: 'Critical' };

async function main(): Promise<void> {
  const config = loadConfig();
  const pipeline = createPurgePipeline(config);
  const auditLogger = new AuditLogger(config.auditLogPath);
  const guardrails = new Guardrails(config);

  const allActions: ActionDefinition[] = [
    ...createPurgeActions(pipeline.dispatcher, guardrails),
    ...createDiagnosticsActions(pipeline.client, pipeline.registry, config, auditLogger),
  ];

  const mcpServer = new McpServer(
    { name: 'edge-purge', version: '1.0.0' },
    {
      capabilities: { tools: {} },
      instructions: 'Cloudflare cache purge tools. Purges require confirm: true and a reason unless dry_run is set. Call diagnostics_verify_token first to check credentials.',
    },
  );

  // Session ID for the single-user stdio session
  const sessionId = 'default';

  for (const action of allActions) {
    // MCP tool names cannot contain dots (e.g. "purge.urls" -> "purge_urls")
    const toolName = action.name.replace(/\./g, '_');

    mcpServer.tool(
      toolName,
      action.description,
      { params: z.record(z.unknown()).optional().describe('Action parameters as a JSON object') },
      async (args) => {
        const context: ActionContext = { sessionId, requestedAt: new Date() };
        return runAction(action, args.params ?? {}, context, auditLogger);
      },
    );
  }

  // Log to stderr (not stdout, to keep protocol clean)
  process.stderr.write(`\nedge-purge MCP v1.0.0\n`);
  process.stderr.write(`Registered ${allActions.length} tools\n`);
  for (const action of allActions) {
    const tier = TIER_NAMES[action.riskTier] ?? 'Unknown';
    process.stderr.write(`  [Tier ${action.riskTier}/${tier}] ${action.name.replace(/\./g, '_')}: ${action.description}\n`);
  }
  process.stderr.write(`\nPurging: ${config.enabled ? 'enabled' : 'disabled'}\n`);
  process.stderr.write(`Cloudflare: ${pipeline.client.hasCredentials() ? 'configured' : 'not configured'}\n`);
  process.stderr.write(`Site URL: ${config.siteUrl || '(not set, paths are sent as given)'}\n`);
  process.stderr.write(`Audit log: ${config.auditLogPath}\n\n`);

  const shutdown = (): void => {
    const cancelled = pipeline.dispatcher.shutdown();
    if (cancelled > 0) {
      pipeline.logger.warn('Dropped pending background purges on shutdown', { cancelled });
    }
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);
}

main().catch((err) => {
  process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
