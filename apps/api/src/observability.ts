import type { DeletionOutcome } from '@salonsvc/contracts';

function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.max(0, Math.min(sorted.length - 1, Math.ceil((p / 100) * sorted.length) - 1));
  return sorted[rank] || 0;
}

export type ObservabilitySnapshot = {
  startedAtMs: number;
  uptimeMs: number;
  http: {
    total: number;
    errorTotal: number;
    errorRate: number;
    latencyP95Ms: number;
  };
  listCache: {
    hitTotal: number;
    missTotal: number;
  };
  media: {
    uploadFailedTotal: number;
    deleteNotConfirmedTotal: number;
    deleteUnreachableTotal: number;
  };
};

export class ServiceObservability {
  private readonly startedAtMs = Date.now();

  private requestTotal = 0;

  private requestErrorTotal = 0;

  private readonly latencyRecent: number[] = [];

  private cacheHitTotal = 0;

  private cacheMissTotal = 0;

  private uploadFailedTotal = 0;

  private deleteNotConfirmedTotal = 0;

  private deleteUnreachableTotal = 0;

  private readonly maxLatencySamples = 1024;

  observeRequest(statusCode: number, latencyMs: number): void {
    this.requestTotal += 1;
    if (statusCode >= 400) {
      this.requestErrorTotal += 1;
    }
    this.latencyRecent.push(Math.max(0, latencyMs));
    if (this.latencyRecent.length > this.maxLatencySamples) {
      this.latencyRecent.shift();
    }
  }

  observeCacheLookup(hit: boolean): void {
    if (hit) {
      this.cacheHitTotal += 1;
    } else {
      this.cacheMissTotal += 1;
    }
  }

  observeUploadFailure(): void {
    this.uploadFailedTotal += 1;
  }

  observeDeletion(outcome: DeletionOutcome): void {
    if (outcome.status === 'not_deleted') {
      this.deleteNotConfirmedTotal += 1;
    } else if (outcome.status === 'unreachable') {
      this.deleteUnreachableTotal += 1;
    }
  }

  snapshot(): ObservabilitySnapshot {
    const p95 = percentile(this.latencyRecent, 95);
    const errorRate = this.requestTotal > 0 ? this.requestErrorTotal / this.requestTotal : 0;

    return {
      startedAtMs: this.startedAtMs,
      uptimeMs: Date.now() - this.startedAtMs,
      http: {
        total: this.requestTotal,
        errorTotal: this.requestErrorTotal,
        errorRate: Number(errorRate.toFixed(6)),
        latencyP95Ms: Number(p95.toFixed(3)),
      },
      listCache: {
        hitTotal: this.cacheHitTotal,
        missTotal: this.cacheMissTotal,
      },
      media: {
        uploadFailedTotal: this.uploadFailedTotal,
        deleteNotConfirmedTotal: this.deleteNotConfirmedTotal,
        deleteUnreachableTotal: this.deleteUnreachableTotal,
      },
    };
  }

  toPrometheus(): string {
    const p95 = percentile(this.latencyRecent, 95);
    const errorRate = this.requestTotal > 0 ? this.requestErrorTotal / this.requestTotal : 0;

    const lines = [
      '# HELP salonsvc_http_requests_total Total HTTP requests served.',
      '# TYPE salonsvc_http_requests_total counter',
      `salonsvc_http_requests_total ${this.requestTotal}`,
      '# HELP salonsvc_http_request_errors_total HTTP requests answered with status >= 400.',
      '# TYPE salonsvc_http_request_errors_total counter',
      `salonsvc_http_request_errors_total ${this.requestErrorTotal}`,
      '# HELP salonsvc_http_error_rate Current HTTP error rate.',
      '# TYPE salonsvc_http_error_rate gauge',
      `salonsvc_http_error_rate ${errorRate}`,
      '# HELP salonsvc_http_latency_p95_ms Request latency P95 in milliseconds (recent window).',
      '# TYPE salonsvc_http_latency_p95_ms gauge',
      `salonsvc_http_latency_p95_ms ${p95}`,
      '# HELP salonsvc_list_cache_hits_total Service listings answered from the cache.',
      '# TYPE salonsvc_list_cache_hits_total counter',
      `salonsvc_list_cache_hits_total ${this.cacheHitTotal}`,
      '# HELP salonsvc_list_cache_misses_total Service listings read from the record store.',
      '# TYPE salonsvc_list_cache_misses_total counter',
      `salonsvc_list_cache_misses_total ${this.cacheMissTotal}`,
      '# HELP salonsvc_media_upload_failures_total Image uploads rejected by the media host.',
      '# TYPE salonsvc_media_upload_failures_total counter',
      `salonsvc_media_upload_failures_total ${this.uploadFailedTotal}`,
      '# HELP salonsvc_media_delete_not_confirmed_total Image deletions the media host did not confirm.',
      '# TYPE salonsvc_media_delete_not_confirmed_total counter',
      `salonsvc_media_delete_not_confirmed_total ${this.deleteNotConfirmedTotal}`,
      '# HELP salonsvc_media_delete_unreachable_total Image deletions that failed to reach the media host.',
      '# TYPE salonsvc_media_delete_unreachable_total counter',
      `salonsvc_media_delete_unreachable_total ${this.deleteUnreachableTotal}`,
    ];

    return `${lines.join('\n')}\n`;
  }
}
