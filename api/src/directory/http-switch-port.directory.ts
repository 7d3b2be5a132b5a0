import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readPositiveNumber } from '../common/config-number';
import { maskKennitala } from '../kennitala/kennitala';
import { SwitchPortDirectory, SwitchPortLookupResult } from './switch-port.directory';

type SwitchPortBody = {
  switch_number: string;
  port_number: string;
};

export const DIRECTORY_NOT_FOUND_MESSAGE = 'No switch/port mapping found for kennitala';

function isSwitchPortBody(value: unknown): value is SwitchPortBody {
  if (!value || typeof value !== 'object') return false;
  return (
    'switch_number' in value &&
    'port_number' in value &&
    typeof value.switch_number === 'string' &&
    typeof value.port_number === 'string'
  );
}

@Injectable()
export class HttpSwitchPortDirectory implements SwitchPortDirectory {
  private readonly logger = new Logger(HttpSwitchPortDirectory.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: ConfigService) {
    this.baseUrl = config.get<string>('DIRECTORY_BASE_URL', 'http://localhost:8080').replace(/\/+$/, '');
    this.timeoutMs = readPositiveNumber(config, 'DIRECTORY_TIMEOUT_MS', 30000);
  }

  async lookup(kennitala: string): Promise<SwitchPortLookupResult> {
    const startedAt = Date.now();
    const url = `${this.baseUrl}/switch-port/${encodeURIComponent(kennitala)}`;

    const response = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const durationMs = Date.now() - startedAt;
    this.logger.log(
      `[DIRECTORY_LOOKUP] status=${response.status} durationMs=${durationMs} kennitala=${maskKennitala(kennitala)}`,
    );

    if (response.status === 404) {
      await response.body?.cancel();
      return {
        switchNumber: '',
        portNumber: '',
        success: false,
        message: DIRECTORY_NOT_FOUND_MESSAGE,
      };
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new Error(`Directory lookup returned status ${response.status}`);
    }

    const body: unknown = await response.json();
    if (!isSwitchPortBody(body)) {
      throw new Error('Directory lookup returned an unexpected body');
    }

    return {
      switchNumber: body.switch_number,
      portNumber: body.port_number,
      success: true,
      message: 'Success',
    };
  }
}
