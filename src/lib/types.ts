// Track Types
export interface TrackPoint {
  readonly lat: number;
  readonly lon: number;
  readonly time: Date;
}

export interface TrackStats {
  startTime: Date;
  endTime: Date;
  durationMs: number;
  totalDistanceNm: number;
  pointCount: number;
}

export interface Track extends TrackStats {
  name: string;
  points: TrackPoint[];
}

export interface TrackFile extends Track {
  content: string; // GPX XML without declaration
}

// Parser Types
export type Clock = () => Date;

/** The part of fetch used by the client, geocoder and health check */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type WarningHandler = (message: string, extra?: Record<string, unknown>) => void;

export interface ParseOptions {
  now?: Clock;
  onWarning?: WarningHandler;
}

// Splitter Types
export type SplitMethod = 'tracks' | 'time';

export interface TimeSplitOptions {
  maxDistanceNm: number;
  maxTimeHours: number;
  requireTimestamps: boolean; // accepted, does not change splitting
}

export interface SplitGpxOptions extends Partial<TimeSplitOptions>, ParseOptions {
  method?: SplitMethod;
}

// Summary Types (JSON view served to clients)
export interface SummaryPoint {
  lat: number;
  lon: number;
  time: string;
}

export interface PlaceNames {
  startPlaceName: string;
  endPlaceName: string;
}

export interface TrackSummary extends PlaceNames {
  name: string;
  startTime: string;
  endTime: string;
  durationHours: number;
  totalDistanceNm: number;
  pointCount: number;
  content: string;
  points: SummaryPoint[];
  startLat: number;
  startLon: number;
  endLat: number;
  endLon: number;
  startCoords: string;
  endCoords: string;
}

// Operation Types
export type OperationStatus = 'processing' | 'complete' | 'error';

export interface Operation {
  id: string;
  splitMethod: SplitMethod;
  status: OperationStatus;
  lookupPlaceNames: boolean;
  total: number;        // place lookups planned (2 per track, or 0)
  completed: number;    // place lookups done
  currentTrack: number; // 1-based track being annotated
  totalTracks: number;
  tracks: TrackSummary[] | null;
  error: string | null;
  createdAt: string;
}

// API Types
export interface SplitParams {
  splitMethod?: SplitMethod;
  maxDistanceNm?: number;
  maxTimeHours?: number;
  requireTimestamps?: boolean;
  lookupPlaceNames?: boolean;
}

export interface SplitResponse {
  success: true;
  operationId: string;
  totalTracks: number;
  message: string;
}

export interface ProgressResponse {
  success: true;
  total: number;
  completed: number;
  remaining: number;
  currentTrack: number;
  totalTracks: number;
  percentage: number;
  status: OperationStatus;
  tracks?: TrackSummary[];
  splitMethod?: SplitMethod;
  operationId?: string;
  error?: string;
}

export interface RenameRequest {
  operationId: string;
  trackIndex: number;
  newName: string;
  startPlaceName?: string;
  endPlaceName?: string;
}

export interface RenameResponse {
  success: true;
  message: string;
  track: TrackSummary;
}

export interface ErrorResponse {
  success: false;
  error: string;
  status?: 'not_found';
}
