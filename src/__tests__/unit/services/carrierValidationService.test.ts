/**
 * Carrier Validation Service Unit Tests
 */

import { logUpstreamCall } from '../../../utils/logger';
import {
  normalizeMcNumber,
  isValidMcDigits,
  extractCarrier,
  mapCarrierRecord,
} from '../../../services/carrierValidationService';
import {
  ConfigurationMissingError,
  InternalServerError,
  InvalidFormatError,
  UpstreamError,
} from '../../../middleware/errorHandler';
import {
  TEST_BASE_URL,
  carrierBody,
  createFetchMock,
  createTestValidator,
  hangingFetch,
  jsonResponse,
  textResponse,
} from '../../helpers/fmcsa';

describe('normalizeMcNumber', () => {
  it('should strip a leading MC prefix', () => {
    expect(normalizeMcNumber('MC123456')).toBe('123456');
  });

  it('should remove every occurrence of mc in any case', () => {
    expect(normalizeMcNumber('mc123mc')).toBe('123');
    expect(normalizeMcNumber('Mc12mC34')).toBe('1234');
  });

  it('should trim surrounding whitespace after removal', () => {
    expect(normalizeMcNumber('  MC 98765  ')).toBe('98765');
  });

  it('should leave other letters in place', () => {
    expect(normalizeMcNumber('12a3')).toBe('12A3');
  });
});

describe('isValidMcDigits', () => {
  it('should accept a run of digits', () => {
    expect(isValidMcDigits('0042')).toBe(true);
  });

  it('should reject empty, lettered and spaced values', () => {
    expect(isValidMcDigits('')).toBe(false);
    expect(isValidMcDigits('12A3')).toBe(false);
    expect(isValidMcDigits('12 3')).toBe(false);
    expect(isValidMcDigits('-123')).toBe(false);
  });
});

describe('extractCarrier', () => {
  it('should read an empty record when content is null', () => {
    expect(extractCarrier({ content: null })).toEqual({
      legalName: null,
      dbaName: null,
      allowedToOperate: null,
      safetyRating: null,
      safetyRatingDate: null,
      phyState: null,
      statusCode: null,
    });
  });

  it('should throw when the body is not an object', () => {
    expect(() => extractCarrier([1, 2])).toThrow('FMCSA response body is not a JSON object');
  });
});

describe('mapCarrierRecord', () => {
  it('should treat a lower-case y as authorized', () => {
    const result = mapCarrierRecord('123', { allowedToOperate: 'y' });

    expect(result.is_valid).toBe(true);
    expect(result.message).toBe('Carrier is authorized to operate');
  });

  it('should fill absent fields with null', () => {
    expect(mapCarrierRecord('77', {})).toEqual({
      mc_number: 'MC77',
      legal_name: null,
      dba_name: null,
      is_valid: false,
      safety_rating: null,
      location: { state: null },
      status: { code: null, safety_rating_date: null },
      message: 'Carrier is not authorized to operate',
    });
  });
});

describe('CarrierValidator', () => {
  describe('validate', () => {
    it('should map an authorized carrier', async () => {
      const fetchMock = createFetchMock(jsonResponse(carrierBody()));
      const validator = createTestValidator(fetchMock);

      const result = await validator.validate('MC123456');

      expect(result).toEqual({
        mc_number: 'MC123456',
        legal_name: 'TEST FREIGHT LLC',
        dba_name: 'TEST HAULING',
        is_valid: true,
        safety_rating: 'S',
        location: { state: 'TX' },
        status: { code: 'A', safety_rating_date: '2021-04-12' },
        message: 'Carrier is authorized to operate',
      });
    });

    it('should query the registry with the normalized number and web key', async () => {
      const fetchMock = createFetchMock(jsonResponse(carrierBody()));
      const validator = createTestValidator(fetchMock);

      await validator.validate('mc123mc');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(`${TEST_BASE_URL}/carriers/123?webKey=test-web-key`);
      expect(init?.method).toBe('GET');
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('should report a carrier that is not allowed to operate', async () => {
      const fetchMock = createFetchMock(jsonResponse(carrierBody({ allowedToOperate: 'N' })));
      const validator = createTestValidator(fetchMock);

      const result = await validator.validate('123456');

      expect(result.is_valid).toBe(false);
      expect(result.message).toBe('Carrier is not authorized to operate');
      expect(result.legal_name).toBe('TEST FREIGHT LLC');
    });

    it('should report not authorized when allowedToOperate is absent', async () => {
      const fetchMock = createFetchMock(jsonResponse(carrierBody({ allowedToOperate: undefined })));
      const validator = createTestValidator(fetchMock);

      const result = await validator.validate('123456');

      expect(result.is_valid).toBe(false);
      expect(result.message).toBe('Carrier is not authorized to operate');
    });

    it('should return a negative result on upstream 404', async () => {
      const fetchMock = createFetchMock(textResponse('Not Found', 404));
      const validator = createTestValidator(fetchMock);

      const result = await validator.validate('MC999');

      expect(result).toEqual({
        mc_number: 'MC999',
        legal_name: null,
        dba_name: null,
        is_valid: false,
        safety_rating: null,
        location: null,
        status: null,
        message: 'Carrier not found',
      });
    });

    it('should release the body of a 404 response', async () => {
      const response = textResponse('Not Found', 404);
      const validator = createTestValidator(createFetchMock(response));

      await validator.validate('MC999');

      expect(response.bodyUsed).toBe(true);
    });

    it('should log the outbound call with its status', async () => {
      const validator = createTestValidator(createFetchMock(jsonResponse(carrierBody())));

      await validator.validate('123456');

      expect(logUpstreamCall).toHaveBeenCalledWith('FMCSA', 200, expect.any(Number), {
        mcNumber: '123456',
      });
    });

    it('should throw UpstreamError with the body text on other statuses', async () => {
      const fetchMock = createFetchMock(textResponse('Service down', 503));
      const validator = createTestValidator(fetchMock);

      const error = await validator.validate('123').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({
        message: 'FMCSA API error: Service down',
        statusCode: 500,
        upstreamStatus: 503,
      });
    });

    it('should throw InvalidFormatError for non-digit input without calling out', async () => {
      const fetchMock = createFetchMock();
      const validator = createTestValidator(fetchMock);

      await expect(validator.validate('12A3')).rejects.toThrow(InvalidFormatError);
      await expect(validator.validate('MC')).rejects.toThrow('Invalid MC number format');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should throw ConfigurationMissingError before any outbound call', async () => {
      const fetchMock = createFetchMock(jsonResponse(carrierBody()));
      const validator = createTestValidator(fetchMock, () => undefined);

      await expect(validator.validate('123456')).rejects.toThrow(ConfigurationMissingError);
      await expect(validator.validate('not-a-number')).rejects.toThrow('FMCSA API key not configured');
      expect(fetchMock).toHaveBeenCalledTimes(0);
    });

    it('should treat an empty key as missing', async () => {
      const fetchMock = createFetchMock();
      const validator = createTestValidator(fetchMock, () => '');

      await expect(validator.validate('123456')).rejects.toThrow(ConfigurationMissingError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should wrap transport failures as InternalServerError', async () => {
      const fetchMock = createFetchMock();
      fetchMock.mockRejectedValue(new Error('getaddrinfo ENOTFOUND registry.test'));
      const validator = createTestValidator(fetchMock);

      await expect(validator.validate('123')).rejects.toThrow(
        new InternalServerError('Error validating carrier: getaddrinfo ENOTFOUND registry.test')
      );
    });

    it('should wrap malformed JSON as InternalServerError', async () => {
      const fetchMock = createFetchMock(textResponse('<html>oops</html>', 200));
      const validator = createTestValidator(fetchMock);

      const error = await validator.validate('123').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InternalServerError);
      expect(error).toHaveProperty('message', expect.stringMatching(/^Error validating carrier: /));
    });

    it('should report a timeout as UpstreamError', async () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';
      const fetchMock = createFetchMock();
      fetchMock.mockRejectedValue(timeout);
      const validator = createTestValidator(fetchMock, undefined, 2500);

      await expect(validator.validate('123')).rejects.toThrow(
        new UpstreamError('FMCSA API request timed out after 2500ms')
      );
    });

    it('should abort a slow registry call after the configured timeout', async () => {
      const fetchMock = hangingFetch();
      const validator = createTestValidator(fetchMock, undefined, 20);

      const error = await validator.validate('123').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toHaveProperty('message', 'FMCSA API request timed out after 20ms');
      expect(logUpstreamCall).toHaveBeenCalledWith('FMCSA', 'failed', expect.any(Number), {
        mcNumber: '123',
        error: 'timeout',
      });
    });
  });
});
