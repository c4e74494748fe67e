import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  ExporterError,
  AuthError,
  TransportError,
  MarkupShapeError,
  RowParseError,
  ConfigurationError,
  getErrorCode,
  errorReport,
  toError,
} from '../../src/utils/errors.js';

describe('ExporterError', () => {
  it('should create error with code and message', () => {
    const error = new ExporterError(ErrorCode.REQUEST_FAILED, 'Request failed');

    expect(error.code).toBe(ErrorCode.REQUEST_FAILED);
    expect(error.message).toBe('Request failed');
    expect(error.name).toBe('ExporterError');
    expect(error.recoverable).toBe(false);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it('should include context and cause', () => {
    const cause = new Error('socket hang up');
    const error = new ExporterError(ErrorCode.REQUEST_FAILED, 'Request failed', {
      cause,
      context: { host: '192.168.100.1' },
      recoverable: true,
    });

    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ host: '192.168.100.1' });
    expect(error.recoverable).toBe(true);
  });

  it('should serialize to JSON correctly', () => {
    const error = new ExporterError(ErrorCode.CONFIG_INVALID, 'Invalid config');
    const json = error.toJSON();

    expect(json.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(json.message).toBe('Invalid config');
    expect(json.recoverable).toBe(false);
    expect(json.timestamp).toBeInstanceOf(Date);
  });

  it('should create from existing error', () => {
    const original = new Error('Something went wrong');
    const wrapped = ExporterError.fromError(original);

    expect(wrapped.code).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(wrapped.message).toBe('Something went wrong');
    expect(wrapped.cause).toBe(original);
  });

  it('should return same error if already ExporterError', () => {
    const original = new AuthError(ErrorCode.INVALID_CREDENTIALS, 'invalid credentials');

    expect(ExporterError.fromError(original)).toBe(original);
  });
});

describe('error taxonomy', () => {
  it('should mark auth failures as fatal', () => {
    const error = new AuthError(ErrorCode.MISSING_SESSION, 'missing session');

    expect(error.name).toBe('AuthError');
    expect(error).toBeInstanceOf(ExporterError);
    expect(error.recoverable).toBe(false);
  });

  it('should mark transport failures as fatal', () => {
    const error = new TransportError(ErrorCode.UNEXPECTED_STATUS, 'unknown response');

    expect(error.name).toBe('TransportError');
    expect(error.recoverable).toBe(false);
  });

  it('should give markup shape errors the uptime code', () => {
    const error = new MarkupShapeError('Unrecognised uptime');

    expect(error.name).toBe('MarkupShapeError');
    expect(error.code).toBe(ErrorCode.UPTIME_UNPARSABLE);
    expect(error.recoverable).toBe(false);
  });

  it('should mark row parse errors as recoverable', () => {
    const error = new RowParseError('bad row');

    expect(error.name).toBe('RowParseError');
    expect(error.code).toBe(ErrorCode.ROW_UNPARSABLE);
    expect(error.recoverable).toBe(true);
  });

  it('should give configuration errors the config code', () => {
    const error = new ConfigurationError('Missing password');

    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
  });
});

describe('getErrorCode', () => {
  it('should return code from ExporterError', () => {
    expect(getErrorCode(new MarkupShapeError('bad'))).toBe(ErrorCode.UPTIME_UNPARSABLE);
  });

  it('should return UNKNOWN_ERROR for anything else', () => {
    expect(getErrorCode(new Error('Regular error'))).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(getErrorCode('string')).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(getErrorCode(null)).toBe(ErrorCode.UNKNOWN_ERROR);
  });
});

describe('toError', () => {
  it('should pass errors through and wrap other values', () => {
    const error = new Error('boom');

    expect(toError(error)).toBe(error);
    expect(toError('boom').message).toBe('boom');
  });
});

describe('errorReport', () => {
  it('should carry the code and context of an exporter error', () => {
    const error = new TransportError(ErrorCode.UNEXPECTED_STATUS, 'unknown response', {
      context: { status: 500 },
    });

    expect(errorReport(error)).toEqual({
      success: false,
      error: 'unknown response',
      code: ErrorCode.UNEXPECTED_STATUS,
      context: { status: 500 },
    });
  });

  it('should report foreign errors and thrown values as unknown', () => {
    expect(errorReport(new Error('boom'))).toEqual({
      success: false,
      error: 'boom',
      code: ErrorCode.UNKNOWN_ERROR,
      context: undefined,
    });
    expect(errorReport('bare string').error).toBe('bare string');
  });
});

describe('ErrorCode values', () => {
  it('should have correct ranges', () => {
    expect(ErrorCode.INVALID_CREDENTIALS).toBeGreaterThanOrEqual(1000);
    expect(ErrorCode.MISSING_SESSION).toBeLessThan(2000);

    expect(ErrorCode.REQUEST_FAILED).toBeGreaterThanOrEqual(2000);
    expect(ErrorCode.UNEXPECTED_STATUS).toBeLessThan(3000);

    expect(ErrorCode.UPTIME_UNPARSABLE).toBeGreaterThanOrEqual(3000);
    expect(ErrorCode.ROW_UNPARSABLE).toBeLessThan(4000);

    expect(ErrorCode.CONFIG_INVALID).toBeGreaterThanOrEqual(4000);
    expect(ErrorCode.UNKNOWN_ERROR).toBeGreaterThanOrEqual(9000);
  });
});
