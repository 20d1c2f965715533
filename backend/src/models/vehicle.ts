// How a vehicle is used; drives which mileage questions get asked
export type VehicleUse = 'commuting' | 'commercial' | 'farming' | 'business';

// Mileage data lives with the use it belongs to, so a commuting vehicle
// can never carry annualMileage and vice versa.
export type CommutingUsage = {
  use: 'commuting';
  daysPerWeek?: number;   // 1-7
  oneWayMiles?: number;   // > 0
};

export type MileageUsage = {
  use: Exclude<VehicleUse, 'commuting'>;
  annualMileage?: number; // > 0
};

export type VehicleUsage = CommutingUsage | MileageUsage;

// How the year/make/body were captured
export type VehicleEntryMode = 'vin' | 'manual' | 'decoded';

// Vehicle sub-record of an applicant
export interface Vehicle {
  vin?: string;
  year?: number;
  make?: string;
  model?: string;
  bodyType?: string;
  entryMode?: VehicleEntryMode;
  usage?: VehicleUsage;
  blindSpotWarning?: boolean;
}

// Attributes returned by a successful VIN decode
export interface DecodedVehicle {
  vin: string;
  make: string;
  model?: string;
  year?: number;
  bodyClass?: string;
}

export type VinDecodeResult = {
  valid: boolean;
  make?: string;
  model?: string;
  year?: number;
  bodyClass?: string;
  errorCode?: number;
  error?: string;
};

export type YearMakeCheck = {
  valid: boolean;
  error?: string;
  warning?: string;
};
