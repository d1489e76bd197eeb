import { config } from '../config';
import { CarrierValidationResult, FMCSACarrierRaw } from '../types';
import {
  AppError,
  ConfigurationMissingError,
  InternalServerError,
  InvalidFormatError,
  UpstreamError,
  describeError,
} from '../middleware/errorHandler';
import { logUpstreamCall } from '../utils/logger';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface CarrierValidatorOptions {
  baseUrl: string;
  timeoutMs: number;
  // Consulted on every call, before any outbound request
  getApiKey: () => string | undefined;
  fetchFn?: FetchLike;
}

const DIGITS_ONLY = /^[0-9]+$/;

export const AUTHORIZED_MESSAGE = 'Carrier is authorized to operate';
export const NOT_AUTHORIZED_MESSAGE = 'Carrier is not authorized to operate';
export const NOT_FOUND_MESSAGE = 'Carrier not found';

/**
 * Upper-cases the input, drops every "MC" occurrence and trims.
 * "mc123mc" becomes "123"; the result is not yet checked for digits.
 */
export function normalizeMcNumber(raw: string): string {
  return raw.toUpperCase().replaceAll('MC', '').trim();
}

export function isValidMcDigits(normalized: string): boolean {
  return DIGITS_ONLY.test(normalized);
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const optionalString = (value: unknown): string | null => {
  if (value === null || value === undefined) return null;
  return String(value);
};

// Pull content.carrier out of a parsed body; missing levels read as an empty record
export function extractCarrier(body: unknown): FMCSACarrierRaw {
  if (!isRecord(body)) {
    throw new Error('FMCSA response body is not a JSON object');
  }

  const content: Record<string, unknown> = isRecord(body.content) ? body.content : {};
  const carrier: Record<string, unknown> = isRecord(content.carrier) ? content.carrier : {};

  return {
    legalName: optionalString(carrier.legalName),
    dbaName: optionalString(carrier.dbaName),
    allowedToOperate: optionalString(carrier.allowedToOperate),
    safetyRating: optionalString(carrier.safetyRating),
    safetyRatingDate: optionalString(carrier.safetyRatingDate),
    phyState: optionalString(carrier.phyState),
    statusCode: optionalString(carrier.statusCode),
  };
}

export function mapCarrierRecord(digits: string, carrier: FMCSACarrierRaw): CarrierValidationResult {
  const isValid = (carrier.allowedToOperate ?? '').toUpperCase() === 'Y';

  return {
    mc_number: `MC${digits}`,
    legal_name: carrier.legalName ?? null,
    dba_name: carrier.dbaName ?? null,
    is_valid: isValid,
    safety_rating: carrier.safetyRating ?? null,
    location: {
      state: carrier.phyState ?? null,
    },
    status: {
      code: carrier.statusCode ?? null,
      safety_rating_date: carrier.safetyRatingDate ?? null,
    },
    message: isValid ? AUTHORIZED_MESSAGE : NOT_AUTHORIZED_MESSAGE,
  };
}

export function notFoundResult(digits: string): CarrierValidationResult {
  return {
    mc_number: `MC${digits}`,
    legal_name: null,
    dba_name: null,
    is_valid: false,
    safety_rating: null,
    location: null,
    status: null,
    message: NOT_FOUND_MESSAGE,
  };
}

// DOMException from AbortSignal.timeout is not always an Error instance across realms
const isTimeout = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'name' in error &&
  (error.name === 'TimeoutError' || error.name === 'AbortError');

export class CarrierValidator {
  private baseUrl: string;
  private timeoutMs: number;
  private getApiKey: () => string | undefined;
  private fetchFn: FetchLike;

  constructor(options: CarrierValidatorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.getApiKey = options.getApiKey;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  // Validate an MC number against the FMCSA registry
  async validate(rawIdentifier: string): Promise<CarrierValidationResult> {
    const apiKey = this.getApiKey();
    if (!apiKey) {
      throw new ConfigurationMissingError('FMCSA API key not configured');
    }

    const digits = normalizeMcNumber(rawIdentifier);
    if (!isValidMcDigits(digits)) {
      throw new InvalidFormatError('Invalid MC number format');
    }

    try {
      const response = await this.request(digits, apiKey);

      if (response.status === 404) {
        await response.body?.cancel();
        return notFoundResult(digits);
      }

      if (response.status !== 200) {
        const text = await response.text();
        throw new UpstreamError(`FMCSA API error: ${text}`, response.status);
      }

      const body: unknown = await response.json();
      return mapCarrierRecord(digits, extractCarrier(body));
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      if (isTimeout(error)) {
        throw new UpstreamError(`FMCSA API request timed out after ${this.timeoutMs}ms`);
      }
      throw new InternalServerError(`Error validating carrier: ${describeError(error)}`);
    }
  }

  private async request(digits: string, apiKey: string): Promise<Response> {
    const url = new URL(`${this.baseUrl}/carriers/${digits}`);
    url.searchParams.set('webKey', apiKey);

    const startTime = Date.now();
    try {
      const response = await this.fetchFn(url.toString(), {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      logUpstreamCall('FMCSA', response.status, Date.now() - startTime, { mcNumber: digits });
      return response;
    } catch (error) {
      logUpstreamCall('FMCSA', 'failed', Date.now() - startTime, {
        mcNumber: digits,
        error: isTimeout(error) ? 'timeout' : describeError(error),
      });
      throw error;
    }
  }
}

export const createCarrierValidator = (fetchFn?: FetchLike): CarrierValidator =>
  new CarrierValidator({
    baseUrl: config.fmcsa.baseUrl,
    timeoutMs: config.fmcsa.timeoutMs,
    getApiKey: () => config.fmcsa.apiKey,
    fetchFn,
  });

export default CarrierValidator;
