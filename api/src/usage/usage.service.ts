import {
  HttpException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK } from '../common/clock';
import type { Clock } from '../common/clock';
import { readPositiveNumber } from '../common/config-number';
import { SWITCH_PORT_DIRECTORY } from '../directory/switch-port.directory';
import type { SwitchPortDirectory } from '../directory/switch-port.directory';
import {
  DEFAULT_KENNITALA_POLICY,
  describeKennitala,
  KennitalaErrorReason,
  KennitalaPolicy,
  KennitalaValidationError,
  maskKennitala,
  validateKennitala,
} from '../kennitala/kennitala';
import { buildPortSelector, MetricsQueryClient } from '../metrics/metrics-query.client';

type FieldErrorReason = 'REQUIRED' | 'TYPE' | KennitalaErrorReason;

type FieldError = {
  field: 'kennitala';
  reason: FieldErrorReason;
  message: string;
};

export type UsageData =
  | {
      status: 'success';
      data: unknown;
      query: string;
      time_range: { start: string; end: string };
    }
  | {
      status: 'error';
      error: string;
      response?: string;
    };

export type UsageRecord = {
  kennitala: string;
  switch_number: string;
  port_number: string;
  usage_data: UsageData;
  timestamp: string;
};

const HOUR_MS = 60 * 60 * 1000;

@Injectable()
export class UsageService {
  private readonly logger = new Logger(UsageService.name);
  private readonly policy: KennitalaPolicy;
  private readonly windowHours: number;
  private readonly step: string;
  private readonly metric: string | undefined;

  constructor(
    config: ConfigService,
    @Inject(SWITCH_PORT_DIRECTORY) private readonly directory: SwitchPortDirectory,
    private readonly metrics: MetricsQueryClient,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.policy = {
      centuryPivot: this.parseCenturyPivot(config.get<string>('KENNITALA_CENTURY_PIVOT')),
      verifyChecksum: (config.get<string>('KENNITALA_VERIFY_CHECKSUM') ?? '').toLowerCase() === 'true',
    };
    this.windowHours = readPositiveNumber(config, 'METRICS_WINDOW_HOURS', 24);
    this.step = config.get<string>('METRICS_STEP', '1h');
    this.metric = config.get<string>('METRICS_QUERY_METRIC')?.trim() || undefined;
  }

  async getUsageData(body: unknown): Promise<UsageRecord> {
    const kennitala = this.normalizeUsageRequest(body);

    try {
      const lookup = await this.directory.lookup(kennitala);
      if (!lookup.success) {
        this.logger.log(
          `[USAGE] lookup miss kennitala=${maskKennitala(kennitala)} birthDate=${describeKennitala(kennitala, this.policy).birthDate}`,
        );
        throw new NotFoundException(lookup.message);
      }

      const usageData = await this.queryPortUsage(lookup.switchNumber, lookup.portNumber);

      return {
        kennitala,
        switch_number: lookup.switchNumber,
        port_number: lookup.portNumber,
        usage_data: usageData,
        timestamp: this.clock.now().toISOString(),
      };
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `getUsageData failed with unexpected error kennitala=${maskKennitala(kennitala)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new InternalServerErrorException(`Error processing request: ${message}`);
    }
  }

  private async queryPortUsage(switchNumber: string, portNumber: string): Promise<UsageData> {
    const end = this.clock.now();
    const start = new Date(end.getTime() - this.windowHours * HOUR_MS);
    const query = buildPortSelector(switchNumber, portNumber, this.metric);

    const result = await this.metrics.queryRange({
      query,
      start: Math.floor(start.getTime() / 1000),
      end: Math.floor(end.getTime() / 1000),
      step: this.step,
    });

    if (!result.ok) {
      return result.body === undefined
        ? { status: 'error', error: result.error }
        : { status: 'error', error: result.error, response: result.body };
    }

    return {
      status: 'success',
      data: result.data,
      query,
      time_range: {
        start: start.toISOString(),
        end: end.toISOString(),
      },
    };
  }

  private normalizeUsageRequest(body: unknown): string {
    if (!body || typeof body !== 'object' || !('kennitala' in body) || body.kennitala == null) {
      throw this.validationError('REQUIRED', 'kennitala is required');
    }

    if (typeof body.kennitala !== 'string') {
      throw this.validationError('TYPE', 'kennitala must be a string');
    }

    try {
      return validateKennitala(body.kennitala, this.policy);
    } catch (error) {
      if (error instanceof KennitalaValidationError) {
        throw this.validationError(error.reason, error.message);
      }
      throw error;
    }
  }

  private validationError(reason: FieldErrorReason, message: string): UnprocessableEntityException {
    const errors: FieldError[] = [{ field: 'kennitala', reason, message }];
    return new UnprocessableEntityException({
      statusCode: 422,
      error: 'Unprocessable Entity',
      message,
      errors,
    });
  }

  private parseCenturyPivot(raw: string | undefined): number {
    if (raw === undefined || raw.trim() === '') return DEFAULT_KENNITALA_POLICY.centuryPivot;

    const pivot = Number(raw);
    if (!Number.isInteger(pivot) || pivot < 0 || pivot > 99) {
      this.logger.warn(`KENNITALA_CENTURY_PIVOT=${raw} is not an integer in 0..99, using default`);
      return DEFAULT_KENNITALA_POLICY.centuryPivot;
    }
    return pivot;
  }
}
