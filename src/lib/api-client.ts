import type {
  FetchLike,
  ProgressResponse,
  RenameRequest,
  RenameResponse,
  SplitParams,
  SplitResponse,
} from './types';

const API_BASE = '/api';

interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

interface Transport {
  fetch: FetchLike;
  sleep: (ms: number) => Promise<void>;
}

interface WaitOptions {
  intervalMs: number;
  onProgress?: (progress: ProgressResponse) => void;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  timeoutMs: 30000,
};

// Exponential backoff with jitter
function calculateBackoff(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * 0.3 * exponentialDelay; // 0-30% jitter
  return Math.min(exponentialDelay + jitter, options.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class APIError extends Error {
  constructor(
    message: string,
    public status: number,
    public retryAfter?: number,
    public isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'APIError';
  }
}

/**
 * Client for the track splitter API: upload, progress polling, renaming and downloads.
 */
export class TrackSplitterClient {
  private baseUrl: string;
  private retryOptions: RetryOptions;
  private transport: Transport;

  constructor(
    baseUrl: string = API_BASE,
    retryOptions: Partial<RetryOptions> = {},
    transport: Partial<Transport> = {}
  ) {
    this.baseUrl = baseUrl;
    this.retryOptions = { ...DEFAULT_RETRY_OPTIONS, ...retryOptions };
    this.transport = {
      fetch: transport.fetch ?? globalThis.fetch.bind(globalThis),
      sleep: transport.sleep ?? sleep,
    };
  }

  private async fetchWithRetry<T>(
    url: string,
    options: RequestInit,
    parseResponse: (response: Response) => Promise<T>
  ): Promise<T> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.retryOptions.maxRetries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.retryOptions.timeoutMs);

      try {
        const response = await this.transport.fetch(url, {
          ...options,
          signal: controller.signal,
        });

        if (response.ok) {
          return await parseResponse(response);
        }

        const errorBody: { error?: string; resetIn?: number } = await response
          .json()
          .catch(() => ({ error: 'Unknown error' }));

        if (response.status === 429) {
          const retryAfter = errorBody.resetIn || 60;
          throw new APIError(
            `Rate limited. Try again in ${retryAfter} seconds.`,
            429,
            retryAfter,
            true
          );
        }

        if (response.status >= 500) {
          throw new APIError(
            errorBody.error || `Server error: ${response.status}`,
            response.status,
            undefined,
            true // Server errors are retryable
          );
        }

        // Client errors (4xx except 429) are not retryable
        throw new APIError(
          errorBody.error || `Request failed: ${response.status}`,
          response.status,
          undefined,
          false
        );

      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (error instanceof APIError && !error.isRetryable) {
          throw error;
        }

        if (attempt >= this.retryOptions.maxRetries) {
          break;
        }

        // Rate limiting uses the server-specified delay, everything else backs off
        if (error instanceof APIError && error.retryAfter) {
          await this.transport.sleep(error.retryAfter * 1000);
        } else {
          await this.transport.sleep(calculateBackoff(attempt, this.retryOptions));
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    throw lastError || new Error('Request failed after retries');
  }

  async startSplit(file: Blob, filename: string, params: SplitParams = {}): Promise<SplitResponse> {
    const form = new FormData();
    form.append('gpx_file', file, filename);
    form.append('split_method', params.splitMethod ?? 'tracks');
    if (params.maxDistanceNm !== undefined) {
      form.append('max_distance_nm', String(params.maxDistanceNm));
    }
    if (params.maxTimeHours !== undefined) {
      form.append('max_time_hours', String(params.maxTimeHours));
    }
    form.append('require_timestamps', String(params.requireTimestamps ?? false));
    form.append('lookup_place_names', String(params.lookupPlaceNames ?? false));

    return this.fetchWithRetry(
      `${this.baseUrl}/split`,
      { method: 'POST', body: form },
      async (response): Promise<SplitResponse> => response.json()
    );
  }

  async getProgress(operationId: string): Promise<ProgressResponse> {
    const query = new URLSearchParams({ operationId });
    return this.fetchWithRetry(
      `${this.baseUrl}/progress?${query}`,
      { method: 'GET' },
      async (response): Promise<ProgressResponse> => response.json()
    );
  }

  /**
   * Poll progress until the operation completes or fails
   */
  async waitForCompletion(
    operationId: string,
    options: Partial<WaitOptions> = {}
  ): Promise<ProgressResponse> {
    const intervalMs = options.intervalMs ?? 1000;

    for (;;) {
      const progress = await this.getProgress(operationId);
      options.onProgress?.(progress);

      if (progress.status === 'complete') {
        return progress;
      }
      if (progress.status === 'error') {
        throw new APIError(progress.error || 'Processing failed', 500);
      }

      await this.transport.sleep(intervalMs);
    }
  }

  async renameTrack(request: RenameRequest): Promise<RenameResponse> {
    return this.fetchWithRetry(
      `${this.baseUrl}/rename`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
      },
      async (response): Promise<RenameResponse> => response.json()
    );
  }

  downloadUrl(operationId: string, trackIndex: number, trackName?: string): string {
    const query = new URLSearchParams({ operationId, trackIndex: String(trackIndex) });
    if (trackName) {
      query.set('trackName', trackName);
    }
    return `${this.baseUrl}/download?${query}`;
  }

  async downloadTrack(operationId: string, trackIndex: number, trackName?: string): Promise<string> {
    return this.fetchWithRetry(
      this.downloadUrl(operationId, trackIndex, trackName),
      { method: 'GET' },
      response => response.text()
    );
  }

  downloadAllUrl(operationId: string): string {
    return `${this.baseUrl}/download-all?${new URLSearchParams({ operationId })}`;
  }
}

export type { RetryOptions, Transport, WaitOptions };
