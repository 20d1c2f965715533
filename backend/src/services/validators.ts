import type {
  AcceptedValue,
  ApplicantRecord,
  ConversationState,
  LicenseStatus,
  LicenseType,
  ValidationOutcome
} from '../models/structures';
import type { DecodedVehicle, VehicleUse } from '../models/vehicle';
import { includesAny, titleCase } from '../utils/text';
import { getOpenVehicle } from './recordMutator';
import type { VehicleLookup } from './vehicleLookup';

// Patterns
const ZIP_RE = /\b(\d{5})\b/;
const EMAIL_RE = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;
// 17 characters, letters I, O and Q are never used in a VIN
const VIN_RE = /\b([A-HJ-NPR-Z0-9]{17})\b/;
const YEAR_RE = /\b(19\d{2}|20\d{2})\b/;
const COMMUTE_DAYS_RE = /\b([1-7])\b/;
const NUMBER_RE = /\b(\d+)\b/;

export const MIN_VEHICLE_YEAR = 1900;
export const MAX_VEHICLE_YEAR = 2026;
// Year assumed for the make check when none was captured
const DEFAULT_MAKE_CHECK_YEAR = 2020;

// Keyword sets (matched as substrings of the lowercased input)
const MANUAL_ENTRY_WORDS = ['year', 'make', 'manual', 'type', 'other'];
const BODY_TYPES = ['sedan', 'suv', 'truck', 'coupe', 'hatchback', 'van', 'wagon', 'convertible', 'minivan', 'pickup'];
const VEHICLE_USES: ReadonlyArray<[string, VehicleUse]> = [
  ['commut', 'commuting'],
  ['commercial', 'commercial'],
  ['farm', 'farming'],
  ['business', 'business']
];
const BLIND_SPOT_YES = ['yes', 'yeah', 'yep', 'have', 'equipped', 'does'];
const BLIND_SPOT_NO = ['no', 'nope', 'not', "don't", "doesn't"];
const ADD_VEHICLE_YES = ['yes', 'yeah', 'yep', 'another', 'add', 'more'];
const ADD_VEHICLE_NO = ['no', 'nope', 'done', "that's all", "that's it"];
const LICENSE_TYPES: ReadonlyArray<[readonly string[], LicenseType]> = [
  [['foreign'], 'foreign'],
  [['personal'], 'personal'],
  [['commercial', 'cdl'], 'commercial']
];
const LICENSE_STATUSES: ReadonlyArray<[readonly string[], LicenseStatus]> = [
  [['valid', 'active', 'good'], 'valid'],
  [['suspend'], 'suspended']
];

// User-facing rejection reasons
export const REJECTIONS = {
  zip_code: 'Please provide a valid 5-digit ZIP code.',
  full_name: 'Please provide your full name.',
  email: 'Please provide a valid email address.',
  vehicle_vin: 'Please provide a valid 17-character VIN.',
  vehicle_year: 'Please provide a valid vehicle year (e.g., 2020).',
  vehicle_make: 'Please provide the vehicle make.',
  vehicle_body: 'Please provide the body type (e.g., Sedan, SUV, Truck).',
  vehicle_use: 'Please specify: Commuting, Commercial, Farming, or Business.',
  blind_spot_warning: 'Please answer Yes or No.',
  commute_days: 'Please provide days per week (1-7).',
  commute_miles: 'Please provide the one-way distance in miles.',
  annual_mileage: 'Please provide estimated annual mileage.',
  add_another_vehicle: 'Would you like to add another vehicle? (Yes/No)',
  license_type: 'Please specify: Foreign, Personal, or Commercial.',
  license_status: 'Please specify: Valid or Suspended.',
  complete: 'The application is already complete.'
} as const;

const INVALID_VIN = 'Invalid VIN.';
const INVALID_MAKE = 'Invalid make.';

function accept(value: AcceptedValue, warning?: string): ValidationOutcome {
  return warning ? { accepted: true, value, warning } : { accepted: true, value };
}

function reject(reason: string | null): ValidationOutcome {
  return { accepted: false, reason };
}

function firstMatch<T>(lower: string, table: ReadonlyArray<[readonly string[], T]>): T | undefined {
  return table.find(([keywords]) => includesAny(lower, keywords))?.[1];
}

function findVin(text: string): string | undefined {
  return VIN_RE.exec(text.toUpperCase())?.[1];
}

function positiveInt(text: string): number | undefined {
  const match = NUMBER_RE.exec(text);
  if (!match) return undefined;
  const n = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

// Decode through the lookup; any failure to decode blocks the answer
async function decode(vin: string, lookup: VehicleLookup): Promise<DecodedVehicle | { error: string }> {
  try {
    const result = await lookup.decodeVin(vin);
    if (result.valid && result.make) {
      return { vin, make: result.make, model: result.model, year: result.year, bodyClass: result.bodyClass };
    }
    return { error: result.error ?? INVALID_VIN };
  } catch {
    return { error: INVALID_VIN };
  }
}

/**
 * Validate the raw text for the given state and extract its typed value.
 * Never touches the record; the lookup is only consulted for VIN and make answers.
 */
export async function validateInput(
  state: ConversationState,
  rawText: string,
  record: ApplicantRecord,
  lookup: VehicleLookup
): Promise<ValidationOutcome> {
  const text = rawText.trim();
  const lower = text.toLowerCase();

  switch (state) {
    case 'zip_code': {
      const match = ZIP_RE.exec(text);
      return match ? accept({ state, value: match[1] }) : reject(REJECTIONS.zip_code);
    }

    case 'full_name':
      return text.length >= 2 ? accept({ state, value: text }) : reject(REJECTIONS.full_name);

    case 'email': {
      const match = EMAIL_RE.exec(text);
      return match ? accept({ state, value: match[0].toLowerCase() }) : reject(REJECTIONS.email);
    }

    case 'vehicle_choice': {
      const vin = findVin(text);
      if (vin) {
        const decoded = await decode(vin, lookup);
        if ('error' in decoded) return reject(decoded.error);
        return accept({ state, choice: 'decoded', vehicle: decoded });
      }
      if (lower.includes('vin')) return accept({ state, choice: 'vin' });
      if (includesAny(lower, MANUAL_ENTRY_WORDS)) return accept({ state, choice: 'manual' });
      // Re-ask without an error message
      return reject(null);
    }

    case 'vehicle_vin': {
      const vin = findVin(text);
      if (!vin) return reject(REJECTIONS.vehicle_vin);
      const decoded = await decode(vin, lookup);
      if ('error' in decoded) return reject(decoded.error);
      return accept({ state, vehicle: decoded });
    }

    case 'vehicle_year': {
      const match = YEAR_RE.exec(text);
      const year = match ? Number.parseInt(match[1], 10) : NaN;
      if (year >= MIN_VEHICLE_YEAR && year <= MAX_VEHICLE_YEAR) {
        return accept({ state, value: year });
      }
      return reject(REJECTIONS.vehicle_year);
    }

    case 'vehicle_make': {
      if (text.length < 2) return reject(REJECTIONS.vehicle_make);
      const year = getOpenVehicle(record)?.year ?? DEFAULT_MAKE_CHECK_YEAR;
      try {
        const check = await lookup.validateYearMake(year, text);
        if (!check.valid) return reject(check.error ?? INVALID_MAKE);
        return accept({ state, value: titleCase(text) }, check.warning);
      } catch {
        // Unreachable lookup: accept with a warning
        return accept({ state, value: titleCase(text) }, 'Could not verify make, proceeding anyway.');
      }
    }

    case 'vehicle_body': {
      const body = BODY_TYPES.find(b => lower.includes(b));
      if (body) return accept({ state, value: titleCase(body) });
      return text.length >= 2 ? accept({ state, value: titleCase(text) }) : reject(REJECTIONS.vehicle_body);
    }

    case 'vehicle_use': {
      const use = VEHICLE_USES.find(([keyword]) => lower.includes(keyword))?.[1];
      return use ? accept({ state, value: use }) : reject(REJECTIONS.vehicle_use);
    }

    case 'blind_spot_warning':
      if (includesAny(lower, BLIND_SPOT_YES)) return accept({ state, value: true });
      if (includesAny(lower, BLIND_SPOT_NO)) return accept({ state, value: false });
      return reject(REJECTIONS.blind_spot_warning);

    case 'commute_days': {
      const match = COMMUTE_DAYS_RE.exec(text);
      return match ? accept({ state, value: Number.parseInt(match[1], 10) }) : reject(REJECTIONS.commute_days);
    }

    case 'commute_miles': {
      const miles = positiveInt(text);
      return miles !== undefined ? accept({ state, value: miles }) : reject(REJECTIONS.commute_miles);
    }

    case 'annual_mileage': {
      const mileage = positiveInt(text.replace(/,/g, ''));
      return mileage !== undefined ? accept({ state, value: mileage }) : reject(REJECTIONS.annual_mileage);
    }

    case 'add_another_vehicle':
      if (includesAny(lower, ADD_VEHICLE_YES)) return accept({ state, value: true });
      if (includesAny(lower, ADD_VEHICLE_NO)) return accept({ state, value: false });
      return reject(REJECTIONS.add_another_vehicle);

    case 'license_type': {
      const type = firstMatch(lower, LICENSE_TYPES);
      return type ? accept({ state, value: type }) : reject(REJECTIONS.license_type);
    }

    case 'license_status': {
      const status = firstMatch(lower, LICENSE_STATUSES);
      return status ? accept({ state, value: status }) : reject(REJECTIONS.license_status);
    }

    case 'complete':
      return reject(REJECTIONS.complete);

    default: {
      const unreachable: never = state;
      return unreachable;
    }
  }
}
