import { CorrectionOrderError } from '../../common/errors';
import { loadRuleTables } from '../rules/rule-tables';
import { buildEntry } from '../../../test/utils/entry-builder';
import {
  CORRECTION_PASS_ORDER,
  CorrectionPipeline,
  passOrderChecksum,
} from './correction-pipeline';
import { createCorrectionPasses } from './correction-passes';

describe('CorrectionPipeline', () => {
  const rules = loadRuleTables().corrections;

  const sysTime = buildEntry({
    canonicalName: 'SysTime',
    models: ['ABB_Proprietary'],
    vsn700Name: 'SysTime',
    label: 'Sys Time',
    displayName: 'System Time',
    description: 'System Time',
    descriptionSource: 'feed-title',
    category: 'System',
  });

  it('should run the passes in the registered order', () => {
    expect(CorrectionPipeline.fromRules(rules).passNames).toEqual([
      ...CORRECTION_PASS_ORDER,
    ]);
  });

  describe('order sensitivity', () => {
    it('should apply device-class fixes keyed by the corrected label', () => {
      const { entries } = CorrectionPipeline.fromRules(rules).run([sysTime]);

      expect(entries[0]).toMatchObject({
        label: 'System Time',
        deviceClass: 'timestamp',
        entityCategory: 'diagnostic',
        icon: 'mdi:clock-outline',
        unit: '',
      });
    });

    it('should refuse to run with label and device-class passes swapped', () => {
      const [display, label, deviceClass, ...rest] =
        createCorrectionPasses(rules);
      const swapped = new CorrectionPipeline([
        display,
        deviceClass,
        label,
        ...rest,
      ]);

      expect(() => swapped.run([sysTime])).toThrow(CorrectionOrderError);
    });

    it('should leave the device class unset when run unchecked in the wrong order', () => {
      const [display, label, deviceClass, ...rest] =
        createCorrectionPasses(rules);
      const swapped = new CorrectionPipeline(
        [display, deviceClass, label, ...rest],
        { unchecked: true },
      );

      const { entries } = swapped.run([sysTime]);

      expect(entries[0].label).toBe('System Time');
      expect(entries[0].deviceClass).toBeUndefined();
      expect(entries[0].icon).toBeUndefined();
    });
  });

  describe('passes', () => {
    const run = (entry: ReturnType<typeof buildEntry>) =>
      CorrectionPipeline.fromRules(rules).run([entry]).entries[0];

    it('should replace display names', () => {
      expect(
        run(
          buildEntry({
            canonicalName: 'DCA_1',
            displayName: 'DC current measurement for string 1',
          }),
        ).displayName,
      ).toBe('DC current #1');
    });

    it('should let the display name follow a corrected label it mirrored', () => {
      expect(
        run(
          buildEntry({
            canonicalName: 'wlan0_essid',
            label: 'Wlan0 Essid',
            displayName: 'Wlan0 Essid',
          }),
        ),
      ).toMatchObject({
        label: 'WiFi SSID',
        displayName: 'WiFi SSID',
        entityCategory: 'diagnostic',
        icon: 'mdi:wifi',
      });
    });

    it('should remove the device class where the fix clears it', () => {
      expect(
        run(
          buildEntry({
            canonicalName: 'DA',
            label: 'Device Address',
            unit: 'W',
            deviceClass: 'power',
            stateClass: 'measurement',
          }),
        ),
      ).toEqual(
        expect.objectContaining({ unit: '', label: 'Device Address' }),
      );
      const corrected = run(
        buildEntry({
          canonicalName: 'DA',
          label: 'Device Address',
          deviceClass: 'power',
        }),
      );
      expect('deviceClass' in corrected).toBe(false);
    });

    it('should strip redundant prefixes and collapse repeated words', () => {
      expect(
        run(
          buildEntry({
            canonicalName: 'X',
            displayName: 'Measurement of voltage Voltage AN',
          }),
        ).displayName,
      ).toBe('Voltage AN');
    });

    it('should keep a prefix when no word follows it', () => {
      expect(
        run(
          buildEntry({
            canonicalName: 'E4_7D',
            displayName: 'Energy counter 4 accumulated',
          }),
        ).displayName,
      ).toBe('Energy counter 4 accumulated');
    });

    it('should standardize period phrases', () => {
      const periods = [
        ['Export energy counter last 7 days', 'Export energy counter - Week'],
        ['Energy produced in last 30 days', 'Energy produced in - Month'],
        ['Energy produced yearly', 'Energy produced - Year'],
        ['Total energy lifetime total', 'Total energy - Lifetime'],
      ];
      for (const [displayName, expected] of periods) {
        expect(run(buildEntry({ canonicalName: 'E', displayName })).displayName).toBe(
          expected,
        );
      }
    });

    it('should apply unit overrides by canonical name', () => {
      expect(
        run(buildEntry({ canonicalName: 'ILeakDcAc', unit: 'uA' })).unit,
      ).toBe('mA');
    });
  });

  describe('mismatch reporting', () => {
    it('should report rule keys that matched nothing', () => {
      const { warnings } = CorrectionPipeline.fromRules(rules).run([sysTime]);
      const labelWarnings = warnings.filter(
        (warning) => warning.pass === 'label',
      );

      expect(labelWarnings.map((warning) => warning.ruleKey)).toEqual(
        Object.keys(rules.labelCorrections).filter((key) => key !== 'Sys Time'),
      );
      expect(labelWarnings[0]).toEqual({
        kind: 'correction-mismatch',
        pass: 'label',
        ruleKey: 'Flash Free',
        message: "Correction rule 'Flash Free' in pass 'label' matched no entry",
      });
    });

    it('should count corrected entries', () => {
      const untouched = buildEntry({ canonicalName: 'Hz', label: 'Hertz' });
      const { correctedCount, entries } = CorrectionPipeline.fromRules(rules).run([
        sysTime,
        untouched,
      ]);

      expect(correctedCount).toBe(1);
      expect(entries[1]).toBe(untouched);
    });
  });

  describe('passOrderChecksum', () => {
    it('should change when the order changes', () => {
      expect(passOrderChecksum(['a', 'b'])).not.toBe(
        passOrderChecksum(['b', 'a']),
      );
      expect(passOrderChecksum([...CORRECTION_PASS_ORDER])).toMatch(
        /^[0-9a-f]{64}$/,
      );
    });
  });
});
