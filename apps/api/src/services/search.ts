import { generateCandidates } from './chains.js';
import { parseItems, priceCandidate, rankStores, withinRadius } from './pricing.js';
import type { SearchRequest, SearchResponse } from '../types.js';

export const DEFAULT_RADIUS_MILES = 5;

export class EmptyItemListError extends Error {
  constructor() {
    super('Please provide at least one item in the query.');
    this.name = 'EmptyItemListError';
  }
}

export function searchStores(request: SearchRequest, defaultRadiusMiles = DEFAULT_RADIUS_MILES): SearchResponse {
  const itemNames = parseItems(request.query);
  if (itemNames.length === 0) {
    throw new EmptyItemListError();
  }

  const radiusMiles = request.radiusMiles === undefined ? defaultRadiusMiles : request.radiusMiles;

  const stores = generateCandidates({ lat: request.lat, lng: request.lng })
    .filter((candidate) => withinRadius(candidate.distanceMiles, radiusMiles))
    .map((candidate) => priceCandidate(candidate, itemNames));

  const ranked = rankStores(stores);

  return {
    query: request.query,
    mode: 'live',
    totalStores: ranked.length,
    stores: ranked
  };
}
