import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RawSnapshotSchema } from '../common/raw-snapshot.schema';
import { buildSampleTable } from '../../test/utils/sample-table';
import { createTestConfig } from '../../test/utils/test-helpers';
import { CANONICAL_MAPPING_TABLE } from './canonical-mapping-table';
import { NormalizerService } from './normalizer.service';

describe('NormalizerService', () => {
  let service: NormalizerService;
  const pollTime = new Date('2026-03-01T12:00:00Z');

  const createService = async (
    env: Record<string, unknown> = {},
  ): Promise<NormalizerService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NormalizerService,
        { provide: CANONICAL_MAPPING_TABLE, useValue: buildSampleTable() },
        { provide: ConfigService, useValue: createTestConfig(env) },
      ],
    }).compile();
    return module.get<NormalizerService>(NormalizerService);
  };

  beforeEach(async () => {
    service = await createService();
  });

  describe('normalize', () => {
    it('should express a vsn700 reading in the canonical vocabulary', () => {
      const result = service.normalize(
        'vsn700',
        'INV-1',
        [{ name: 'Pgrid', value: 8524 }],
        pollTime,
      );

      expect(result).toEqual({
        deviceId: 'INV-1',
        points: [
          {
            deviceId: 'INV-1',
            canonicalName: 'W',
            sourceName: 'Pgrid',
            value: 8524,
            unit: 'W',
            label: 'Watts',
            displayName: 'AC Power',
            description: 'AC Power',
            category: 'Inverter',
            deviceClass: 'power',
            stateClass: 'measurement',
            models: ['M103'],
            compatibleWithVsn300: true,
            compatibleWithVsn700: true,
            timestamp: '2026-03-01T12:00:00.000Z',
          },
        ],
        issues: [],
      });
    });

    it('should produce the same canonical point from either vocabulary', () => {
      const fromVsn300 = service.normalize(
        'vsn300',
        'INV-1',
        [{ name: 'm103_1_W', value: 8524 }],
        pollTime,
      );
      const fromVsn700 = service.normalize(
        'vsn700',
        'INV-1',
        [{ name: 'Pgrid', value: 8524 }],
        pollTime,
      );

      expect({ ...fromVsn300.points[0], sourceName: '' }).toEqual({
        ...fromVsn700.points[0],
        sourceName: '',
      });
    });

    it('should report unknown points and keep the rest', () => {
      const result = service.normalize(
        'vsn700',
        'INV-1',
        [
          { name: 'Mystery', value: 1 },
          { name: 'Pgrid', value: 10 },
        ],
        pollTime,
      );

      expect(result.points.map((point) => point.canonicalName)).toEqual(['W']);
      expect(result.issues).toEqual([
        {
          kind: 'unknown-point',
          deviceId: 'INV-1',
          pointName: 'Mystery',
          vocabulary: 'vsn700',
        },
      ]);
    });

    it('should keep the first raw point when two map to one canonical name', () => {
      const result = service.normalize(
        'vsn300',
        'INV-1',
        [
          { name: 'm103_1_W', value: 1 },
          { name: 'm101_1_W', value: 2 },
        ],
        pollTime,
      );

      expect(result.points).toHaveLength(1);
      expect(result.points[0].value).toBe(1);
      expect(result.issues).toEqual([
        {
          kind: 'duplicate-canonical',
          deviceId: 'INV-1',
          canonicalName: 'W',
          keptPointName: 'm103_1_W',
          droppedPointName: 'm101_1_W',
        },
      ]);
    });

    it('should drop a point whose transform fails and report it', () => {
      const result = service.normalize(
        'vsn300',
        'INV-1',
        [
          { name: 'm64061_1_GlobState', value: 'abc' },
          { name: 'm103_1_W', value: 5 },
        ],
        pollTime,
      );

      expect(result.points.map((point) => point.canonicalName)).toEqual(['W']);
      expect(result.issues).toEqual([
        {
          kind: 'transform-failure',
          deviceId: 'INV-1',
          pointName: 'm64061_1_GlobState',
          canonicalName: 'GlobState',
          message: 'GlobState: expected a number (raw value: "abc")',
        },
      ]);
    });

    it('should keep a later duplicate when the first point fails its transform', () => {
      const result = service.normalize(
        'vsn300',
        'INV-1',
        [
          { name: 'm103_1_TmpCab', value: 'bad' },
          { name: 'm101_1_TmpCab', value: 45 },
        ],
        pollTime,
      );

      expect(result.points.map((point) => point.value)).toEqual([45]);
      expect(result.points[0].sourceName).toBe('m101_1_TmpCab');
      expect(result.issues.map((issue) => issue.kind)).toEqual([
        'transform-failure',
      ]);
    });

    it('should drop an out-of-range device clock and keep the other points', () => {
      const result = service.normalize(
        'vsn700',
        'LOG-0001',
        [
          { name: 'SysTime', value: 1e16 },
          { name: 'Pgrid', value: 5 },
        ],
        pollTime,
      );

      expect(result.points.map((point) => point.canonicalName)).toEqual(['W']);
      expect(result.issues).toEqual([
        expect.objectContaining({
          kind: 'transform-failure',
          canonicalName: 'SysTime',
        }),
      ]);
    });

    it('should translate state codes and keep the raw code', () => {
      const [point] = service.normalize(
        'vsn700',
        'INV-1',
        [{ name: 'GlobState', value: 6 }],
        pollTime,
      ).points;

      expect(point.value).toBe('Run');
      expect(point.rawCode).toBe(6);
      expect(point.compatibleWithVsn300).toBe(true);
    });

    it('should stamp the system time point with the device clock', () => {
      const [point] = service.normalize(
        'vsn700',
        'LOG-0001',
        [{ name: 'SysTime', value: 825000000 }],
        pollTime,
      ).points;

      expect(point.value).toBe('2026-02-21T14:40:00.000Z');
      expect(point.timestamp).toBe('2026-02-21T14:40:00.000Z');
      expect(point.entityCategory).toBe('diagnostic');
      expect(point.icon).toBe('mdi:clock-outline');
      expect(point.compatibleWithVsn300).toBe(false);
    });

    it('should apply the configured temperature threshold', async () => {
      const raw = [{ name: 'Temp1', value: 65 }];

      expect(service.normalize('vsn700', 'INV-1', raw).points[0].value).toBe(65);

      const strict = await createService({
        TEMPERATURE_PLAUSIBILITY_THRESHOLD: '60',
      });
      expect(strict.normalize('vsn700', 'INV-1', raw).points[0].value).toBe(6.5);
    });

    it('should resolve vsn700 spelling variants', () => {
      const [point] = service.normalize(
        'vsn700',
        'INV-1',
        [{ name: 'TSoc', value: 87 }],
        pollTime,
      ).points;

      expect(point.canonicalName).toBe('Soc');
      expect(point.sourceName).toBe('TSoc');
      expect(point.unit).toBe('%');
    });

    it('should pass null readings through', () => {
      const [point] = service.normalize(
        'vsn700',
        'INV-1',
        [{ name: 'Pgrid', value: null }],
        pollTime,
      ).points;

      expect(point.value).toBeNull();
    });

    it('should return frozen points', () => {
      const [point] = service.normalize(
        'vsn700',
        'INV-1',
        [{ name: 'Pgrid', value: 1 }],
        pollTime,
      ).points;

      expect(Object.isFrozen(point)).toBe(true);
      expect(Object.isFrozen(point.models)).toBe(true);
    });

    it('should return an empty result for an empty snapshot', () => {
      expect(service.normalize('vsn300', 'INV-1', [], pollTime)).toEqual({
        deviceId: 'INV-1',
        points: [],
        issues: [],
      });
    });
  });

  describe('normalizeSnapshot', () => {
    it('should normalize every device and name datalogger devices by serial', () => {
      const snapshot = RawSnapshotSchema.parse({
        'a4:06:e9:7d:1c:2f': {
          points: [
            { name: 'sn', value: 'LOG-0001' },
            { name: 'SysTime', value: 825000000 },
          ],
        },
        'INV-1': { points: [{ name: 'Pgrid', value: 8524 }] },
        silent: {},
      });

      const results = service.normalizeSnapshot('vsn700', snapshot, pollTime);

      expect(results.map((result) => result.deviceId)).toEqual([
        'LOG-0001',
        'INV-1',
      ]);
      expect(results[0].points.map((point) => point.canonicalName)).toEqual([
        'sn',
        'SysTime',
      ]);
    });

    it('should keep a MAC device id when no serial number is reported', () => {
      const snapshot = RawSnapshotSchema.parse({
        'a4:06:e9:7d:1c:2f': { points: [{ name: 'SysTime', value: 1 }] },
      });

      const [result] = service.normalizeSnapshot('vsn700', snapshot, pollTime);

      expect(result.deviceId).toBe('a4:06:e9:7d:1c:2f');
    });

    it('should treat a point without a value as null', () => {
      const snapshot = RawSnapshotSchema.parse({
        'INV-1': { points: [{ name: 'Pgrid' }] },
      });

      const [result] = service.normalizeSnapshot('vsn700', snapshot, pollTime);

      expect(result.points[0].value).toBeNull();
    });
  });
});
