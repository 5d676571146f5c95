/**
 * Scraper Module
 *
 * Item API client, retrying fetcher and item normalization
 */

export { HttpContentSource, type ContentSourceOptions } from './content-source.js';
export { ItemFetcher } from './item-fetcher.js';
export { toStoryInput, sanitizeUrl, clampScore } from './normalize.js';
