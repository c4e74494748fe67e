import { describe, it, expect } from 'vitest';
import { parseUptime } from '../../src/core/uptime.js';
import { MarkupShapeError, ErrorCode } from '../../src/utils/errors.js';

describe('parseUptime', () => {
  it('should fold days, hours, minutes and seconds', () => {
    // ((40*24+5)*60+32)*60+52
    expect(parseUptime('40 days 05h:32m:52s.00')).toBe(3475972);
  });

  it('should ignore the hundredths', () => {
    expect(parseUptime('0 days 00h:01m:05s.99')).toBe(65);
  });

  it('should tolerate surrounding whitespace', () => {
    expect(parseUptime('  1 days 00h:00m:00s.00\n')).toBe(86400);
  });

  it('should reject a string with the wrong number of parts', () => {
    expect(() => parseUptime('40 days 05h:32m:52s')).toThrow(MarkupShapeError);
    expect(() => parseUptime('05h:32m:52s.00')).toThrow(MarkupShapeError);
    expect(() => parseUptime('1 days 2 days 05h:32m:52s.00')).toThrow(MarkupShapeError);
  });

  it('should reject empty or non-numeric text', () => {
    expect(() => parseUptime('')).toThrow(MarkupShapeError);
    expect(() => parseUptime('unknown')).toThrow(MarkupShapeError);
  });

  it('should report the uptime error code', () => {
    try {
      parseUptime('garbage');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MarkupShapeError);
      expect((err as MarkupShapeError).code).toBe(ErrorCode.UPTIME_UNPARSABLE);
    }
  });
});
