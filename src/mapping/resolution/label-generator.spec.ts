import { generateLabel, splitWords, titleCase } from './label-generator';

describe('label-generator', () => {
  describe('titleCase', () => {
    it.each([
      ['wlan0 ipaddr', 'Wlan0 Ipaddr'],
      ['INVERTER_3PHASE', 'Inverter_3Phase'],
      ['7d', '7D'],
    ])('should title-case "%s" -> "%s"', (input, expected) => {
      expect(titleCase(input)).toBe(expected);
    });
  });

  describe('splitWords', () => {
    it('should split CamelCase', () => {
      expect(splitWords('WChaMax')).toBe('W Cha Max');
    });

    it('should split snake_case', () => {
      expect(splitWords('wlan0_ipaddr')).toBe('Wlan0 Ipaddr');
    });
  });

  describe('generateLabel', () => {
    it('should drop the vsn300 model prefix', () => {
      expect(generateLabel('m103_1_W')).toBe('W');
      expect(generateLabel('m1_Mn')).toBe('Mn');
    });

    it('should expand known abbreviations at a word boundary', () => {
      expect(generateLabel('m103_1_TmpCab')).toBe('Temperature Cab');
      expect(generateLabel('Soc')).toBe('State of Charge');
      expect(generateLabel('Vbat')).toBe('Battery Voltage');
    });

    it('should append the period for counter suffixes', () => {
      expect(generateLabel('E0_7D')).toBe('E0 7 Day');
      expect(generateLabel('E1_30D')).toBe('E1 30 Day');
      expect(generateLabel('E2_runtime')).toBe('E2 Lifetime');
    });

    it('should use fixed labels for state and system points', () => {
      expect(generateLabel('IsolResist')).toBe('Isolation Resistance');
      expect(generateLabel('flash_free')).toBe('Flash Memory Free');
      expect(generateLabel('sn')).toBe('Serial Number');
    });

    it('should fall back to word splitting', () => {
      expect(generateLabel('SysTime')).toBe('Sys Time');
      expect(generateLabel('ILeakDcAc')).toBe('I Leak Dc Ac');
      expect(generateLabel('GlobalSt')).toBe('Global St');
    });
  });
});
