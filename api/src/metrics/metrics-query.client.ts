import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readPositiveNumber } from '../common/config-number';

export type RangeQuery = {
  query: string;
  /** Unix epoch seconds. */
  start: number;
  end: number;
  step: string;
};

export type MetricsQueryResult =
  | { ok: true; status: number; data: unknown }
  | { ok: false; status: number | null; error: string; body?: string };

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/** Equality filter on the switch and port labels, optionally scoped to a metric name. */
export function buildPortSelector(switchNumber: string, portNumber: string, metric?: string): string {
  const matchers = `switch_number="${escapeLabelValue(switchNumber)}",port_number="${escapeLabelValue(portNumber)}"`;
  return metric ? `${metric}{${matchers}}` : matchers;
}

@Injectable()
export class MetricsQueryClient {
  private readonly logger = new Logger(MetricsQueryClient.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: ConfigService) {
    this.baseUrl = config.get<string>('METRICS_BASE_URL', 'http://monitor01.gagnaveita.is:9090').replace(/\/+$/, '');
    this.timeoutMs = readPositiveNumber(config, 'METRICS_TIMEOUT_MS', 30000);
  }

  async queryRange(range: RangeQuery): Promise<MetricsQueryResult> {
    const params = new URLSearchParams({
      query: range.query,
      start: String(range.start),
      end: String(range.end),
      step: range.step,
    });
    const startedAt = Date.now();

    try {
      const response = await fetch(`${this.baseUrl}/api/v1/query_range?${params.toString()}`, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const durationMs = Date.now() - startedAt;

      if (!response.ok) {
        const body = await response.text();
        this.logger.warn(`[METRICS_QUERY] error durationMs=${durationMs} status=${response.status}`);
        return {
          ok: false,
          status: response.status,
          error: `Monitoring API returned status ${response.status}`,
          body,
        };
      }

      const data: unknown = await response.json();
      this.logger.log(`[METRICS_QUERY] ok durationMs=${durationMs} status=${response.status}`);
      return { ok: true, status: response.status, data };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`[METRICS_QUERY] failed durationMs=${Date.now() - startedAt} error=${message}`);
      return {
        ok: false,
        status: null,
        error: `Failed to query monitoring system: ${message}`,
      };
    }
  }
}
