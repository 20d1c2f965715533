import type { AcceptedValue, ApplicantRecord, ConversationState } from '../models/structures';
import { getOpenVehicle } from './recordMutator';

// Coarse progress steps shown to the applicant
export type ProgressStep = 'location' | 'name' | 'email' | 'vehicle' | 'license' | 'done';

export const TERMINAL_STATE = 'complete' satisfies ConversationState;

export function isComplete(state: ConversationState): boolean {
  return state === TERMINAL_STATE;
}

/**
 * Next state after an accepted answer. Branches are decided by the typed value
 * (and the open vehicle's use), never by the raw text.
 */
export function nextState(accepted: AcceptedValue, record: ApplicantRecord): ConversationState {
  switch (accepted.state) {
    case 'zip_code':
      return 'full_name';
    case 'full_name':
      return 'email';
    case 'email':
      return 'vehicle_choice';
    case 'vehicle_choice':
      if (accepted.choice === 'decoded') return 'vehicle_use';
      return accepted.choice === 'vin' ? 'vehicle_vin' : 'vehicle_year';
    case 'vehicle_vin':
      // Decode supplies year, make and body in one step
      return 'vehicle_use';
    case 'vehicle_year':
      return 'vehicle_make';
    case 'vehicle_make':
      return 'vehicle_body';
    case 'vehicle_body':
      return 'vehicle_use';
    case 'vehicle_use':
      return 'blind_spot_warning';
    case 'blind_spot_warning':
      return getOpenVehicle(record)?.usage?.use === 'commuting' ? 'commute_days' : 'annual_mileage';
    case 'commute_days':
      return 'commute_miles';
    case 'commute_miles':
    case 'annual_mileage':
      return 'add_another_vehicle';
    case 'add_another_vehicle':
      return accepted.value ? 'vehicle_choice' : 'license_type';
    case 'license_type':
      return accepted.value === 'foreign' ? 'complete' : 'license_status';
    case 'license_status':
      return 'complete';
    default: {
      const unreachable: never = accepted;
      return unreachable;
    }
  }
}

export function progressStep(state: ConversationState): ProgressStep {
  switch (state) {
    case 'zip_code':
      return 'location';
    case 'full_name':
      return 'name';
    case 'email':
      return 'email';
    case 'license_type':
    case 'license_status':
      return 'license';
    case 'complete':
      return 'done';
    default:
      return 'vehicle';
  }
}
