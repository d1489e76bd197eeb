// Uniform error body for every failure path
export interface ErrorResponse {
  detail: string;
}

// ============================================
// Carrier validation
// ============================================

export interface CarrierLocation {
  state: string | null;
}

export interface CarrierStatus {
  code: string | null;
  safety_rating_date: string | null;
}

export interface CarrierValidationResult {
  mc_number: string;
  legal_name: string | null;
  dba_name: string | null;
  is_valid: boolean;
  safety_rating: string | null;
  location: CarrierLocation | null;
  status: CarrierStatus | null;
  message: string;
}

// Subset of the QCMobile carrier record this service reads
export interface FMCSACarrierRaw {
  legalName?: string | null;
  dbaName?: string | null;
  allowedToOperate?: string | null;
  safetyRating?: string | null;
  safetyRatingDate?: string | null;
  phyState?: string | null;
  statusCode?: string | null;
}

// ============================================
// Load reference table
// ============================================

export interface LoadRecord {
  reference_number: string;
  origin: string;
  destination: string;
  equipment_type: string;
  rate: string;
  commodity: string;
}

export const LOAD_RECORD_FIELDS = [
  'reference_number',
  'origin',
  'destination',
  'equipment_type',
  'rate',
  'commodity',
] as const;
