export interface LatLon {
  lat: number;
  lon: number;
}

export interface SchoolRecord {
  /** 0-based position in the source file. */
  row: number;
  name: string;
  municipality: string;
  address: string;
  lat: number;
  lon: number;
  generalSeats: number;
  montessoriSeats: number;
  supportSeats: number;
}

export type DistanceBand = '0-10 km' | '10-20 km' | '20+ km';

export type BandColor = 'green' | 'orange' | 'red' | 'gray';

export interface TaggedSchool extends SchoolRecord {
  distanceKm: number;
  band: DistanceBand;
}

export type CapacityFlag = 'general' | 'montessori' | 'support';

export interface FilterCriteria {
  bands: DistanceBand[];
  general: boolean;
  montessori: boolean;
  support: boolean;
  query?: string;
}

export interface RouteResult {
  /** (lat, lon) pairs, origin first. */
  points: [number, number][];
  durationMin: number;
  distanceKm: number;
}

export type RouteProfile =
  | 'cycling-regular'
  | 'cycling-road'
  | 'cycling-electric'
  | 'cycling-mountain'
  | 'foot-walking'
  | 'driving-car';

export type Origin =
  | { kind: 'address'; address: string }
  | { kind: 'coordinates'; lat: number; lon: number };

export interface DashboardConfig {
  origin: Origin;
  filters: FilterCriteria;
  routes: { enabled: boolean; profile: RouteProfile };
}

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
  /** null when the route was not requested or could not be fetched. */
  route: { durationMin: number; distanceKm: number } | null;
  transitUrl: string;
}

export interface RouteOverlay {
  row: number;
  name: string;
  color: BandColor;
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
  origin: LatLon & { label: string };
  bands: DistanceBand[];
  summary: DashboardSummary;
  markers: SchoolMarker[];
  routes: RouteOverlay[];
  statistics: BandStatistics[];
  table: TableRow[];
  warnings: string[];
}
