export {
  SerpApiShoppingClient,
  SearchApiError,
  SERPAPI_BASE_URL,
  type SerpApiOptions,
  type ShoppingResult,
  type ShoppingSearchClient,
} from './serpapi.js';
export {
  CARD_LIMIT,
  escapeHtml,
  renderCard,
  renderProductCards,
  selectProductCards,
  toProductCard,
  type ProductCard,
} from './render.js';
export {
  createVisualSearchTool,
  MISSING_KEY_MESSAGE,
  NO_PRODUCTS_MESSAGE,
  VISUAL_SEARCH_TOOL_NAME,
  type VisualSearchToolOptions,
} from './visual-search.js';
