export { dataTools, getAgentEconomyStatsTool, getWireFeedTool } from './tools.js';
