import { TransformFailure } from '../../common/errors';
import { CanonicalMappingEntry } from '../../mapping/interfaces/canonical-mapping.interface';
import { buildEntry } from '../../../test/utils/entry-builder';
import {
  AURORA_EPOCH_OFFSET,
  ValueTransformRegistry,
  toFiniteNumber,
  toKilowattHours,
} from './value-transforms';

describe('ValueTransformRegistry', () => {
  const registry = new ValueTransformRegistry({ temperatureThreshold: 70 });

  const vsn300 = (entry: CanonicalMappingEntry) => ({
    entry,
    vocabulary: 'vsn300' as const,
  });
  const vsn700 = (entry: CanonicalMappingEntry) => ({
    entry,
    vocabulary: 'vsn700' as const,
  });

  describe('leakage current', () => {
    const entry = buildEntry({
      canonicalName: 'ILeakDcAc',
      unit: 'mA',
      deviceClass: 'current',
    });

    it('should convert vsn300 microamps to milliamps', () => {
      expect(registry.apply(5000, vsn300(entry))).toEqual({
        value: 5,
        unit: 'mA',
      });
    });

    it('should convert vsn700 amps to milliamps', () => {
      const result = registry.apply(0.005, vsn700(entry));

      expect(result.unit).toBe('mA');
      expect(result.value).toBeCloseTo(5);
    });

    it('should reject non-numeric readings', () => {
      expect(() => registry.apply('n/a', vsn300(entry))).toThrow(
        new TransformFailure('ILeakDcAc', 'n/a', 'expected a number'),
      );
    });
  });

  describe('temperature', () => {
    const entry = buildEntry({ canonicalName: 'TmpCab', unit: '°C' });

    it('should scale readings above the plausibility threshold', () => {
      expect(registry.apply(244, vsn300(entry))).toEqual({ value: 24.4 });
    });

    it('should keep plausible readings', () => {
      expect(registry.apply(45, vsn700(entry))).toEqual({ value: 45 });
      expect(registry.apply(70, vsn700(entry))).toEqual({ value: 70 });
    });

    it('should honour the configured threshold', () => {
      const strict = new ValueTransformRegistry({ temperatureThreshold: 40 });

      expect(strict.apply(45, vsn700(entry))).toEqual({ value: 4.5 });
    });

    it('should accept numeric strings', () => {
      expect(registry.apply('244', vsn300(entry))).toEqual({ value: 24.4 });
    });
  });

  describe('device clock', () => {
    const entry = buildEntry({ canonicalName: 'SysTime' });

    it('should translate device epoch seconds to an ISO timestamp', () => {
      const result = registry.apply(825000000, vsn700(entry));

      expect(result.value).toBe('2026-02-21T14:40:00.000Z');
      expect(result.timestamp).toEqual(
        new Date((825000000 + AURORA_EPOCH_OFFSET) * 1000),
      );
    });

    it('should reject non-positive clock values', () => {
      expect(() => registry.apply(0, vsn700(entry))).toThrow(TransformFailure);
      expect(() => registry.apply(-5, vsn700(entry))).toThrow(
        'device clock must be positive',
      );
    });

    it('should reject clock values beyond the representable date range', () => {
      expect(() => registry.apply(1e16, vsn700(entry))).toThrow(
        new TransformFailure('SysTime', 1e16, 'device clock out of range'),
      );
    });
  });

  describe('state codes', () => {
    it('should translate codes and keep the raw code', () => {
      expect(
        registry.apply(6, vsn300(buildEntry({ canonicalName: 'GlobState' }))),
      ).toEqual({ value: 'Run', rawCode: 6 });
    });

    it('should render unknown codes', () => {
      expect(
        registry.apply(99, vsn700(buildEntry({ canonicalName: 'AlarmState' }))),
      ).toEqual({ value: 'Unknown (99)', rawCode: 99 });
    });

    it('should reject fractional codes', () => {
      expect(() =>
        registry.apply(1.5, vsn700(buildEntry({ canonicalName: 'AlarmState' }))),
      ).toThrow('state code must be an integer');
    });
  });

  describe('energy counters', () => {
    it('should convert Wh to kWh', () => {
      const entry = buildEntry({
        canonicalName: 'TotWhExp',
        unit: 'Wh',
        deviceClass: 'energy',
      });

      expect(registry.apply(12500000, vsn700(entry))).toEqual({
        value: 12500,
        unit: 'kWh',
      });
    });

    it('should convert MWh to kWh', () => {
      const entry = buildEntry({
        canonicalName: 'E_Total',
        unit: 'MWh',
        deviceClass: 'energy',
      });

      expect(registry.apply(2, vsn700(entry))).toEqual({
        value: 2000,
        unit: 'kWh',
      });
    });
  });

  describe('text and memory points', () => {
    it('should convert bytes to megabytes', () => {
      expect(
        registry.apply(
          10485760,
          vsn300(buildEntry({ canonicalName: 'flash_free', unit: 'MB' })),
        ),
      ).toEqual({ value: 10, unit: 'MB' });
    });

    it('should strip surrounding dashes from model numbers', () => {
      expect(
        registry.apply(
          '-PVI-10.0-OUTD-',
          vsn700(buildEntry({ canonicalName: 'Md' })),
        ),
      ).toEqual({ value: 'PVI-10.0-OUTD' });
    });

    it('should title-case device types', () => {
      expect(
        registry.apply(
          'SOLAR INVERTER',
          vsn300(buildEntry({ canonicalName: 'type' })),
        ),
      ).toEqual({ value: 'Solar Inverter' });
    });
  });

  it('should pass null readings through', () => {
    expect(
      registry.apply(null, vsn300(buildEntry({ canonicalName: 'ILeakDcAc' }))),
    ).toEqual({ value: null });
  });

  it('should pass points without a rule through unchanged', () => {
    expect(
      registry.apply(8524, vsn700(buildEntry({ canonicalName: 'W', unit: 'W' }))),
    ).toEqual({ value: 8524 });
    expect(
      registry.apply(true, vsn700(buildEntry({ canonicalName: 'Enabled' }))),
    ).toEqual({ value: true });
  });
});

describe('toKilowattHours', () => {
  it.each([
    [5, 'kWh', 5],
    [5, 'MWh', 5000],
    [5000, 'Wh', 5],
    [5000, '', 5],
  ])('should convert %d %s to %d kWh', (value, unit, expected) => {
    expect(toKilowattHours(value, unit)).toBe(expected);
  });
});

describe('toFiniteNumber', () => {
  it('should reject blank strings and booleans', () => {
    expect(() => toFiniteNumber(' ', 'W')).toThrow(TransformFailure);
    expect(() => toFiniteNumber(true, 'W')).toThrow(TransformFailure);
  });

  it('should parse numeric strings', () => {
    expect(toFiniteNumber(' 42.5 ', 'W')).toBe(42.5);
  });
});
