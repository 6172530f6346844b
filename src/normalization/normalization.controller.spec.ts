import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';
import {
  SAMPLE_RULES_VERSION,
  buildSampleTable,
} from '../../test/utils/sample-table';
import { CANONICAL_MAPPING_TABLE } from './canonical-mapping-table';
import { NormalizedSnapshot } from './interfaces/normalized-point.interface';
import { NormalizationController } from './normalization.controller';
import { NormalizerService } from './normalizer.service';

describe('NormalizationController', () => {
  let controller: NormalizationController;
  let service: jest.Mocked<NormalizerService>;

  const mockNormalizerService = {
    normalizeSnapshot: jest.fn(),
  };

  const normalized: NormalizedSnapshot[] = [
    { deviceId: 'INV-1', points: [], issues: [] },
  ];

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [NormalizationController],
      providers: [
        {
          provide: NormalizerService,
          useValue: mockNormalizerService,
        },
        {
          provide: CANONICAL_MAPPING_TABLE,
          useValue: buildSampleTable(),
        },
      ],
    }).compile();

    controller = module.get<NormalizationController>(NormalizationController);
    service = module.get(NormalizerService);
    jest.clearAllMocks();
  });

  describe('normalize', () => {
    it('should normalize a valid snapshot', () => {
      service.normalizeSnapshot.mockReturnValue(normalized);

      const result = controller.normalize('vsn700', {
        'INV-1': { points: [{ name: 'Pgrid', value: 8524 }] },
      });

      expect(result).toEqual({
        vocabulary: 'vsn700',
        rulesVersion: SAMPLE_RULES_VERSION,
        devices: normalized,
      });
      expect(service.normalizeSnapshot).toHaveBeenCalledWith('vsn700', {
        'INV-1': { points: [{ name: 'Pgrid', value: 8524 }] },
      });
    });

    it('should default missing point values to null', () => {
      service.normalizeSnapshot.mockReturnValue(normalized);

      controller.normalize('vsn300', { 'INV-1': { points: [{ name: 'sn' }] } });

      expect(service.normalizeSnapshot).toHaveBeenCalledWith('vsn300', {
        'INV-1': { points: [{ name: 'sn', value: null }] },
      });
    });

    it('should throw BadRequestException for an unknown vocabulary', () => {
      expect(() => controller.normalize('vsn900', {})).toThrow(
        new BadRequestException(
          "Unknown vocabulary 'vsn900'. Expected one of: vsn300, vsn700",
        ),
      );
      expect(service.normalizeSnapshot).not.toHaveBeenCalled();
    });

    it('should throw BadRequestException with the path of an invalid field', () => {
      expect(() =>
        controller.normalize('vsn700', {
          'INV-1': { points: [{ name: 'Pgrid', value: { nested: true } }] },
        }),
      ).toThrow("Invalid snapshot at 'INV-1.points.0.value'");
    });

    it('should reject a body that is not an object', () => {
      expect(() => controller.normalize('vsn700', [1, 2])).toThrow(
        BadRequestException,
      );
    });
  });

  describe('getMapping', () => {
    it('should return the table summary', () => {
      const summary = controller.getMapping();

      expect(summary.rulesVersion).toBe(SAMPLE_RULES_VERSION);
      expect(summary.pointCount).toBe(7);
      expect(summary.needsReview).toBe(1);
    });
  });
});
