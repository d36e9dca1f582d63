import { stableHash } from '../lib/hash.js';
import { roundTo } from '../lib/number.js';
import type { Item, StoreCandidate, StoreResult } from '../types.js';

export function parseItems(query: string): string[] {
  return query
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Deterministic stand-in for a real price lookup.
 *
 * The base comes from the name length (1..7) and a small per-chain jitter in
 * [0, 0.396) comes from hashing the name together with the chain id, so the
 * same item costs a little more or less at different chains.
 */
export function pseudoPrice(name: string, chainId: string): number {
  const length = Array.from(name).length;
  const base = Math.max(1, (length % 7) + 1);
  const jitter = (stableHash(name + chainId) % 100) / 250;
  return roundTo(base * 0.99 + jitter, 2);
}

// |trunc(coord * 1000)| written out in full digits, never in exponent form.
function coordinateKey(coord: number): string {
  const scaled = Math.trunc(coord * 1000);
  // Coordinates near Number.MAX_VALUE overflow to Infinity once scaled.
  if (!Number.isFinite(scaled)) return 'Infinity';
  const key = BigInt(scaled);
  return (key < 0n ? -key : key).toString();
}

export function makeStoreId(chainId: string, lat: number, lng: number): string {
  return `${chainId}-${coordinateKey(lat)}-${coordinateKey(lng)}`;
}

// A falsy radius (0, null, undefined) means no filtering.
export function withinRadius(distance: number, radiusMiles: number | null | undefined): boolean {
  if (!radiusMiles) return true;
  return distance <= radiusMiles;
}

export function priceCandidate(candidate: StoreCandidate, itemNames: readonly string[]): StoreResult {
  const items: Item[] = [];
  let total = 0;

  for (const name of itemNames) {
    const price = pseudoPrice(name, candidate.chain.id);
    items.push({ name, price, quantity: 1 });
    total += price;
  }

  return {
    storeId: makeStoreId(candidate.chain.id, candidate.lat, candidate.lng),
    storeName: candidate.chain.name,
    distanceMiles: roundTo(candidate.distanceMiles, 2),
    lat: roundTo(candidate.lat, 6),
    lng: roundTo(candidate.lng, 6),
    totalPrice: roundTo(total, 2),
    items
  };
}

// Cheapest first, nearer store on equal totals. Array#sort is stable.
export function rankStores(stores: readonly StoreResult[]): StoreResult[] {
  return [...stores].sort((a, b) => a.totalPrice - b.totalPrice || a.distanceMiles - b.distanceMiles);
}
