import { readFile } from 'node:fs/promises';

export const THERMAL_ZONE_PATH = '/sys/class/thermal/thermal_zone0/temp';

export type TemperatureReader = () => Promise<number | null>;

/**
 * Reads the SoC temperature in °C (one decimal) from the kernel thermal zone,
 * which reports millidegrees. Resolves to null where the zone is unavailable.
 */
export function createThermalZoneReader(zonePath: string = THERMAL_ZONE_PATH): TemperatureReader {
  return async () => {
    let raw: string;
    try {
      raw = await readFile(zonePath, 'utf-8');
    } catch {
      return null;
    }

    const millidegrees = Number.parseFloat(raw.trim());
    if (!Number.isFinite(millidegrees)) return null;
    return Math.round(millidegrees / 100) / 10;
  };
}
