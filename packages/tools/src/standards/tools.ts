import { z } from 'zod';
import type { ToolDefinition } from '../types.js';
import { defineQueryTool } from '../run.js';

export const getEditorialStandardsTool = defineQueryTool({
  name: 'get_editorial_standards',
  description: 'Get the editorial standards: confidence level definitions, verification rules, data verification tiers, corrections policy and how responses are signed.',
  parameters: z.object({}),
  run(_args, { engine }) {
    return { snapshotVersion: null, data: engine.getEditorialStandards() };
  },
});

export const standardsTools: ToolDefinition[] = [getEditorialStandardsTool];
