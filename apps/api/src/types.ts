export type SearchMode = 'live';

export interface Chain {
  id: string;
  name: string;
}

export interface ChainOffset {
  dLat: number;
  dLng: number;
}

export interface GeoPoint {
  lat: number;
  lng: number;
}

export interface StoreCandidate {
  chain: Chain;
  lat: number;
  lng: number;
  distanceMiles: number; // unrounded
}

export interface SearchRequest extends GeoPoint {
  query: string;
  // null or 0 disables the radius filter
  radiusMiles?: number | null;
}

export interface Item {
  name: string;
  price: number;
  quantity: 1;
}

export interface StoreResult {
  storeId: string;
  storeName: string;
  distanceMiles: number;
  lat: number;
  lng: number;
  totalPrice: number;
  items: Item[];
}

export interface SearchResponse {
  query: string;
  mode: SearchMode;
  totalStores: number;
  stores: StoreResult[];
}
