import type { DecodedVehicle, Vehicle, VehicleUse } from './vehicle';

// Conversation flow states, in the order they are normally visited
export const CONVERSATION_STATES = [
  'zip_code',
  'full_name',
  'email',
  'vehicle_choice',
  'vehicle_vin',
  'vehicle_year',
  'vehicle_make',
  'vehicle_body',
  'vehicle_use',
  'blind_spot_warning',
  'commute_days',
  'commute_miles',
  'annual_mileage',
  'add_another_vehicle',
  'license_type',
  'license_status',
  'complete'
] as const;

export type ConversationState = (typeof CONVERSATION_STATES)[number];

export type LicenseType = 'foreign' | 'personal' | 'commercial';
export type LicenseStatus = 'valid' | 'suspended';

// Applicant data collected so far
export interface ApplicantRecord {
  zipCode?: string;
  fullName?: string;
  email?: string;
  licenseType?: LicenseType;
  licenseStatus?: LicenseStatus;
  currentState: ConversationState;
  vehicles: Vehicle[];           // append-only
  openVehicleIndex: number | null;
}

export type MessageRole = 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
  seq: number;          // position in the conversation log
  createdAt: string;    // (ISO format)
}

// Persisted unit: one applicant record plus its message log
export interface Conversation {
  id: string;
  createdAt: string;
  updatedAt: string;
  record: ApplicantRecord;
  messages: Message[];
}

// What the reply generator is told about the applicant
export type ContextSnapshot = {
  zipCode?: string;
  fullName?: string;
  email?: string;
  licenseType?: LicenseType;
  licenseStatus?: LicenseStatus;
  vehiclesCount: number;
};

// A validated answer, tagged by the state that accepted it
export type AcceptedValue =
  | { state: 'zip_code'; value: string }
  | { state: 'full_name'; value: string }
  | { state: 'email'; value: string }
  | { state: 'vehicle_choice'; choice: 'vin' | 'manual' }
  | { state: 'vehicle_choice'; choice: 'decoded'; vehicle: DecodedVehicle }
  | { state: 'vehicle_vin'; vehicle: DecodedVehicle }
  | { state: 'vehicle_year'; value: number }
  | { state: 'vehicle_make'; value: string }
  | { state: 'vehicle_body'; value: string }
  | { state: 'vehicle_use'; value: VehicleUse }
  | { state: 'blind_spot_warning'; value: boolean }
  | { state: 'commute_days'; value: number }
  | { state: 'commute_miles'; value: number }
  | { state: 'annual_mileage'; value: number }
  | { state: 'add_another_vehicle'; value: boolean }
  | { state: 'license_type'; value: LicenseType }
  | { state: 'license_status'; value: LicenseStatus };

// reason === null means "re-ask without an error message"
export type ValidationOutcome =
  | { accepted: true; value: AcceptedValue; warning?: string }
  | { accepted: false; reason: string | null };

export type ServiceErrorCode =
  | 'CONVERSATION_NOT_FOUND'
  | 'INVALID_REQUEST'
  | 'INVALID_MUTATION';

export type ServiceError = {
  code: ServiceErrorCode;
  message: string;
};

export type Ok<T> = { ok: true; data: T };
export type Err = { ok: false; error: ServiceError };
export type Result<T> = Ok<T> | Err;
