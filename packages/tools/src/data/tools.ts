import { z } from 'zod';
import type { ToolDefinition } from '../types.js';
import { defineQueryTool } from '../run.js';

const AgentEconomyStatsParams = z.object({});

const WireFeedParams = z.object({
  since: z.string().optional()
    .describe('ISO-8601 timestamp; only items published strictly after it are returned'),
  limit: z.number().int().min(1).optional()
    .describe('Maximum number of items to return (default 50, values above 100 are capped)'),
});

export const getAgentEconomyStatsTool = defineQueryTool({
  name: 'get_agent_economy_stats',
  description: 'Get the agent economy data terminal: every tracked statistic with its value, unit, confidence level, source and last update time.',
  parameters: AgentEconomyStatsParams,
  run(_args, { engine }) {
    const { snapshotVersion, data } = engine.getAgentEconomyStats();
    return { snapshotVersion, count: data.length, data };
  },
});

export const getWireFeedTool = defineQueryTool({
  name: 'get_wire_feed',
  description: 'Get the wire feed of short breaking items, newest first. Pass `since` to fetch only what is new since your last call.',
  parameters: WireFeedParams,
  run(args, { engine }) {
    const { snapshotVersion, data } = engine.getWireFeed({ since: args.since, limit: args.limit });
    return { snapshotVersion, count: data.length, data };
  },
});

export const dataTools: ToolDefinition[] = [getAgentEconomyStatsTool, getWireFeedTool];
