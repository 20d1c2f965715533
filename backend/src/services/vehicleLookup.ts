import { z } from 'zod';
import type { VinDecodeResult, YearMakeCheck } from '../models/vehicle';
import { logger as rootLogger, type Logger } from '../utils/logger';

// Vehicle data source consulted by the VIN and make validators
export interface VehicleLookup {
  decodeVin(vin: string): Promise<VinDecodeResult>;
  validateYearMake(year: number, make: string): Promise<YearMakeCheck>;
}

// The slice of fetch this client relies on
export type FetchLike = (
  url: string,
  init?: { signal?: AbortSignal }
) => Promise<{ ok: boolean; status: number; json(): Promise<unknown> }>;

export type NhtsaLookupOptions = {
  baseUrl: string;
  timeoutMs: number;
  fetchFn?: FetchLike;
  logger?: Logger;
};

// NHTSA returns every field as a (possibly empty) string
const decodeVinSchema = z.object({
  Results: z.array(
    z.object({
      ErrorCode: z.string().nullish(),
      ErrorText: z.string().nullish(),
      Make: z.string().nullish(),
      Model: z.string().nullish(),
      ModelYear: z.string().nullish(),
      BodyClass: z.string().nullish()
    }).passthrough()
  ).default([])
});

const makesForTypeSchema = z.object({
  Results: z.array(z.object({ MakeName: z.string().nullish() }).passthrough()).default([])
});

const allMakesSchema = z.object({
  Results: z.array(z.object({ Make_Name: z.string().nullish() }).passthrough()).default([])
});

const UNDECODABLE = "Could not decode VIN. Please verify it's correct.";
const SUSPICIOUS_MAKES = ['SHERMAN + REILLY', 'INCOMPLETE', 'NOT APPLICABLE'];
const MAKE_UNVERIFIED = 'Could not verify make, proceeding anyway.';

function blankToUndefined(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseErrorCode(raw: string | null | undefined): number {
  // NHTSA may send "0" or a list such as "1,6"; the first code decides
  const first = (raw ?? '').split(',')[0].trim();
  const code = Number.parseInt(first, 10);
  return Number.isNaN(code) ? 0 : code;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * NHTSA vPIC client.
 *
 * Failure policy differs per call: a VIN that cannot be decoded (including when
 * the service is down) is reported invalid, while the make check reports valid
 * with a warning when the service cannot be reached.
 */
export class NhtsaVehicleLookup implements VehicleLookup {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;
  private readonly logger: Logger;

  constructor(options: NhtsaLookupOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = options.logger ?? rootLogger;
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await this.fetchFn(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!response.ok) {
      throw new Error(`NHTSA responded with HTTP ${response.status}`);
    }
    return response.json();
  }

  async decodeVin(vin: string): Promise<VinDecodeResult> {
    const url = `${this.baseUrl}/DecodeVinValues/${encodeURIComponent(vin)}?format=json`;

    try {
      const payload = decodeVinSchema.parse(await this.getJson(url));
      const row = payload.Results[0];
      if (!row) {
        return { valid: false, error: UNDECODABLE };
      }

      const errorCode = parseErrorCode(row.ErrorCode);
      const make = blankToUndefined(row.Make);
      const model = blankToUndefined(row.Model);
      const modelYear = blankToUndefined(row.ModelYear);
      const bodyClass = blankToUndefined(row.BodyClass);

      // 0 = clean decode, 1-6 = warnings on a structurally valid VIN
      if (errorCode >= 7) {
        return { valid: false, error: `Invalid VIN: ${blankToUndefined(row.ErrorText) ?? 'Invalid VIN format'}` };
      }

      if (!make) {
        return { valid: false, error: UNDECODABLE };
      }

      const upperMake = make.toUpperCase();
      if ((SUSPICIOUS_MAKES.includes(upperMake) || make.includes('+')) && !modelYear) {
        return { valid: false, error: "This VIN doesn't appear to be for a standard consumer vehicle." };
      }

      const year = modelYear ? Number.parseInt(modelYear, 10) : undefined;
      return {
        valid: true,
        make,
        model,
        year: year !== undefined && !Number.isNaN(year) ? year : undefined,
        bodyClass,
        errorCode
      };
    } catch (error) {
      this.logger.warn('VIN decode failed', { vin, error: String(error) });
      if (isTimeout(error)) {
        return { valid: false, error: 'Vehicle verification service timed out. Please try again.' };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { valid: false, error: `Error verifying vehicle: ${message}` };
    }
  }

  async validateYearMake(year: number, make: string): Promise<YearMakeCheck> {
    const wanted = make.trim().toUpperCase();

    try {
      const carMakes = makesForTypeSchema.parse(
        await this.getJson(`${this.baseUrl}/GetMakesForVehicleType/car?format=json`)
      );
      if (carMakes.Results.some(r => (r.MakeName ?? '').toUpperCase() === wanted)) {
        return { valid: true };
      }

      // Trucks, motorcycles and the like only show up in the full list
      const allMakes = allMakesSchema.parse(
        await this.getJson(`${this.baseUrl}/GetAllMakes?format=json`)
      );
      if (allMakes.Results.some(r => (r.Make_Name ?? '').toUpperCase() === wanted)) {
        return { valid: true };
      }

      return {
        valid: false,
        error: `'${make}' doesn't appear to be a valid vehicle make. Please check the spelling.`
      };
    } catch (error) {
      this.logger.warn('Make verification unavailable', { year, make, error: String(error) });
      return { valid: true, warning: MAKE_UNVERIFIED };
    }
  }
}
