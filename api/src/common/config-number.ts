import { ConfigService } from '@nestjs/config';

/** Reads a positive number, falling back when the key is unset, blank or not a positive number. */
export function readPositiveNumber(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<string>(key);
  if (raw === undefined || String(raw).trim() === '') return fallback;

  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}
