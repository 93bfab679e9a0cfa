// Types
export type {
  TrackPoint,
  TrackStats,
  Track,
  TrackFile,
  Clock,
  FetchLike,
  WarningHandler,
  ParseOptions,
  SplitMethod,
  TimeSplitOptions,
  SplitGpxOptions,
  SummaryPoint,
  PlaceNames,
  TrackSummary,
  OperationStatus,
  Operation,
  SplitParams,
  SplitResponse,
  ProgressResponse,
  RenameRequest,
  RenameResponse,
  ErrorResponse,
} from './types';

// Errors
export { FormatError, ValidationError, isClientError } from './errors';

// GPX Parser
export {
  parseGpx,
  generateGpx,
  withXmlDeclaration,
  renameGpxTrack,
  GPX_NAMESPACES,
} from './gpx-parser';

// Timestamps
export { parseTimestamp, formatTimestamp } from './timestamp';

// Distance Utilities
export { haversineDistanceKm, distanceNm, pointDistanceNm, pathDistanceNm } from './distance';

// GPX Splitter
export {
  splitGpx,
  splitByTracks,
  splitByTimeGap,
  generateTrackName,
  GPX_SPLITTER_DEFAULTS,
} from './gpx-splitter';

// Track statistics and summaries
export { buildTrack, sortByTime } from './track-stats';
export { summarizeTrack, sortNewestFirst, formatCoords } from './track-summary';
export { sanitizeFilename, uniqueFilenames } from './filename';

// API client
export { TrackSplitterClient, APIError } from './api-client';
