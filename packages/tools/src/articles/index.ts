export {
  articleTools,
  getLatestArticlesTool,
  searchArticlesTool,
  getSectionArticlesTool,
} from './tools.js';
