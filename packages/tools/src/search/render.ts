import type { ShoppingResult } from './serpapi.js';
import { encodeProductLink } from '../url.js';

export const CARD_LIMIT = 6;

export interface ProductCard {
  thumbnail: string;
  title: string;
  price: string;
  source: string;
  link: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

/**
 * Normalize a raw result into a card, or null when it has no product link.
 */
export function toProductCard(result: ShoppingResult): ProductCard | null {
  const link = result.link || result.product_link;
  if (!link) return null;
  return {
    thumbnail: result.thumbnail ?? '',
    title: result.title ?? 'Unknown',
    price: result.price ?? 'Check Site',
    source: result.source ?? 'Web',
    link,
  };
}

/**
 * Cards for the first `limit` results that carry a product link, in API order.
 */
export function selectProductCards(results: readonly ShoppingResult[], limit = CARD_LIMIT): ProductCard[] {
  const cards: ProductCard[] = [];
  for (const result of results) {
    if (cards.length >= limit) break;
    const card = toProductCard(result);
    if (card) cards.push(card);
  }
  return cards;
}

export function renderCard(card: ProductCard): string {
  const title = escapeHtml(card.title);
  return [
    '<div class="card">',
    `  <div class="image-container"><img src="${escapeHtml(card.thumbnail)}" alt="${title}"></div>`,
    '  <div class="meta">',
    `    <div class="title">${title}</div>`,
    `    <div class="price">${escapeHtml(card.price)}</div>`,
    `    <div class="store">${escapeHtml(card.source)}</div>`,
    `    <button class="buy-btn" onclick="triggerAutoBuy('${encodeProductLink(card.link)}')">Auto-Buy</button>`,
    '  </div>',
    '</div>',
  ].join('\n');
}

/**
 * The HTML fragment the searcher hands back verbatim: a grid of at most `limit`
 * cards, each with an Auto-Buy button wired to the page's triggerAutoBuy().
 */
export function renderProductCards(results: readonly ShoppingResult[], options: { limit?: number } = {}): string {
  const cards = selectProductCards(results, options.limit ?? CARD_LIMIT);
  return `<div class="grid-container">\n${cards.map(renderCard).join('\n')}\n</div>`;
}
