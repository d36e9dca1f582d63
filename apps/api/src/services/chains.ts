import { distanceMiles } from '../lib/geo.js';
import type { Chain, ChainOffset, GeoPoint, StoreCandidate } from '../types.js';

// Demo chains. Each one is placed near the user by the offset at the same index.
export const CHAINS: readonly Chain[] = Object.freeze([
  { id: 'walmart', name: 'Walmart Supercenter' },
  { id: 'target', name: 'Target' },
  { id: 'kroger', name: 'Kroger' }
]);

// ~0.01 deg is roughly 0.6 miles, depending on latitude.
export const CHAIN_OFFSETS: readonly ChainOffset[] = Object.freeze([
  { dLat: 0.01, dLng: 0.012 },
  { dLat: -0.008, dLng: 0.009 },
  { dLat: 0.006, dLng: -0.01 }
]);

export function generateCandidates(
  origin: GeoPoint,
  chains: readonly Chain[] = CHAINS,
  offsets: readonly ChainOffset[] = CHAIN_OFFSETS
): StoreCandidate[] {
  const count = Math.min(chains.length, offsets.length);
  const candidates: StoreCandidate[] = [];

  for (let i = 0; i < count; i++) {
    const chain = chains[i];
    const { dLat, dLng } = offsets[i];
    const lat = origin.lat + dLat;
    const lng = origin.lng + dLng;

    candidates.push({
      chain,
      lat,
      lng,
      distanceMiles: distanceMiles(origin.lat, origin.lng, lat, lng)
    });
  }

  return candidates;
}
