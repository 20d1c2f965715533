import type {
  AcceptedValue,
  ApplicantRecord,
  ContextSnapshot,
  Err,
  Result,
  ServiceErrorCode
} from '../models/structures';
import type { DecodedVehicle, Vehicle, VehicleUsage } from '../models/vehicle';

function err(code: ServiceErrorCode, message: string): Err {
  return { ok: false, error: { code, message } };
}

// Fresh record for a new conversation
export function createApplicantRecord(): ApplicantRecord {
  return {
    currentState: 'zip_code',
    vehicles: [],
    openVehicleIndex: null
  };
}

export function getOpenVehicle(record: ApplicantRecord): Vehicle | undefined {
  return record.openVehicleIndex === null ? undefined : record.vehicles[record.openVehicleIndex];
}

// Append an empty vehicle and make it the open one
export function openNewVehicle(record: ApplicantRecord): ApplicantRecord {
  const vehicles: Vehicle[] = [...record.vehicles, {}];
  return { ...record, vehicles, openVehicleIndex: vehicles.length - 1 };
}

function fromDecode(decoded: DecodedVehicle): Vehicle {
  return {
    vin: decoded.vin,
    year: decoded.year,
    make: decoded.make,
    model: decoded.model,
    bodyType: decoded.bodyClass
  };
}

/**
 * Apply one accepted value to the record (or its open vehicle).
 * Returns a new record; the input is left untouched.
 */
export function applyAcceptedValue(record: ApplicantRecord, accepted: AcceptedValue): Result<ApplicantRecord> {
  // Applicant-level fields
  switch (accepted.state) {
    case 'zip_code':
      return { ok: true, data: { ...record, zipCode: accepted.value } };
    case 'full_name':
      return { ok: true, data: { ...record, fullName: accepted.value } };
    case 'email':
      return { ok: true, data: { ...record, email: accepted.value } };
    case 'add_another_vehicle':
      // Nothing to store; the transition decides where to go
      return { ok: true, data: record };
    case 'license_type':
      if (record.licenseType !== undefined) {
        return err('INVALID_MUTATION', 'License type was already recorded');
      }
      return { ok: true, data: { ...record, licenseType: accepted.value } };
    case 'license_status':
      if (record.licenseStatus !== undefined) {
        return err('INVALID_MUTATION', 'License status was already recorded');
      }
      return { ok: true, data: { ...record, licenseStatus: accepted.value } };
    default:
      return updateOpenVehicle(record, accepted);
  }
}

type VehicleValue = Exclude<
  AcceptedValue,
  { state: 'zip_code' | 'full_name' | 'email' | 'add_another_vehicle' | 'license_type' | 'license_status' }
>;

function updateOpenVehicle(record: ApplicantRecord, accepted: VehicleValue): Result<ApplicantRecord> {
  const index = record.openVehicleIndex;
  const vehicle = getOpenVehicle(record);
  if (index === null || vehicle === undefined) {
    return err('INVALID_MUTATION', `No open vehicle to receive ${accepted.state}`);
  }

  const next = nextVehicle(vehicle, accepted);
  if (!next.ok) return next;

  const vehicles = record.vehicles.map((v, i) => (i === index ? next.data : v));
  return { ok: true, data: { ...record, vehicles } };
}

function nextVehicle(vehicle: Vehicle, accepted: VehicleValue): Result<Vehicle> {
  switch (accepted.state) {
    case 'vehicle_choice':
      if (accepted.choice === 'decoded') {
        return { ok: true, data: { ...vehicle, ...fromDecode(accepted.vehicle), entryMode: 'decoded' } };
      }
      return { ok: true, data: { ...vehicle, entryMode: accepted.choice } };
    case 'vehicle_vin':
      return { ok: true, data: { ...vehicle, ...fromDecode(accepted.vehicle) } };
    case 'vehicle_year':
      return { ok: true, data: { ...vehicle, year: accepted.value } };
    case 'vehicle_make':
      return { ok: true, data: { ...vehicle, make: accepted.value } };
    case 'vehicle_body':
      return { ok: true, data: { ...vehicle, bodyType: accepted.value } };
    case 'vehicle_use': {
      // Re-answering the use question starts the mileage data over
      const usage: VehicleUsage = accepted.value === 'commuting'
        ? { use: 'commuting' }
        : { use: accepted.value };
      return { ok: true, data: { ...vehicle, usage } };
    }
    case 'blind_spot_warning':
      return { ok: true, data: { ...vehicle, blindSpotWarning: accepted.value } };
    case 'commute_days':
    case 'commute_miles': {
      const usage = vehicle.usage;
      if (usage?.use !== 'commuting') {
        return err('INVALID_MUTATION', `${accepted.state} only applies to commuting vehicles`);
      }
      const updated = accepted.state === 'commute_days'
        ? { ...usage, daysPerWeek: accepted.value }
        : { ...usage, oneWayMiles: accepted.value };
      return { ok: true, data: { ...vehicle, usage: updated } };
    }
    case 'annual_mileage': {
      const usage = vehicle.usage;
      if (usage === undefined || usage.use === 'commuting') {
        return err('INVALID_MUTATION', 'annual_mileage does not apply to commuting vehicles');
      }
      return { ok: true, data: { ...vehicle, usage: { ...usage, annualMileage: accepted.value } } };
    }
    default: {
      const unreachable: never = accepted;
      return unreachable;
    }
  }
}

// Applicant fields collected so far plus the vehicle count
export function buildContextSnapshot(record: ApplicantRecord): ContextSnapshot {
  const snapshot: ContextSnapshot = { vehiclesCount: record.vehicles.length };
  if (record.zipCode !== undefined) snapshot.zipCode = record.zipCode;
  if (record.fullName !== undefined) snapshot.fullName = record.fullName;
  if (record.email !== undefined) snapshot.email = record.email;
  if (record.licenseType !== undefined) snapshot.licenseType = record.licenseType;
  if (record.licenseStatus !== undefined) snapshot.licenseStatus = record.licenseStatus;
  return snapshot;
}
