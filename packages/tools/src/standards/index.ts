export { standardsTools, getEditorialStandardsTool } from './tools.js';
