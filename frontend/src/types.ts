/** Shapes returned by GET /api/dashboard. Must match backend/src/types.ts */

export type DistanceBand = '0-10 km' | '10-20 km' | '20+ km';

export type BandColor = 'green' | 'orange' | 'red' | 'gray';

export interface BandStatistics {
  band: DistanceBand;
  count: number;
  minKm: number;
  maxKm: number;
  meanKm: number;
}

export interface DashboardSummary {
  total: number;
  meanDistanceKm: number | null;
  withGeneralSeats: number;
  withMontessoriSeats: number;
  withSupportSeats: number;
}

export interface SchoolMarker {
  row: number;
  name: string;
  municipality: string;
  address: string;
  lat: number;
  lon: number;
  distanceKm: number;
  band: DistanceBand;
  color: BandColor;
  generalSeats: number;
  montessoriSeats: number;
  supportSeats: number;
  route: { durationMin: number; distanceKm: number } | null;
  transitUrl: string;
}

export interface RouteOverlay {
  row: number;
  name: string;
  color: BandColor;
  /** [lat, lon] */
  points: [number, number][];
  durationMin: number;
  distanceKm: number;
}

export interface TableRow {
  name: string;
  municipality: string;
  address: string;
  distanceKm: number;
  cyclingDistanceKm: number | null;
  band: DistanceBand;
  generalSeats: number;
  montessoriSeats: number;
  supportSeats: number;
}

export interface DashboardModel {
  origin: { lat: number; lon: number; label: string };
  bands: DistanceBand[];
  summary: DashboardSummary;
  markers: SchoolMarker[];
  routes: RouteOverlay[];
  statistics: BandStatistics[];
  table: TableRow[];
  warnings: string[];
}

export type OriginInput =
  | { kind: 'address'; address: string }
  | { kind: 'coordinates'; lat: number; lon: number };

export interface DashboardFilters {
  bands: DistanceBand[];
  general: boolean;
  montessori: boolean;
  support: boolean;
  routes: boolean;
  query: string;
}
