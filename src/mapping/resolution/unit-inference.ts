export interface UnitInference {
  unit: string;
  deviceClass?: string;
  stateClass?: string;
}

const measurement = (unit: string, deviceClass?: string): UnitInference => ({
  unit,
  ...(deviceClass ? { deviceClass } : {}),
  stateClass: 'measurement',
});

const counter = (unit: string): UnitInference => ({
  unit,
  deviceClass: 'energy',
  stateClass: 'total_increasing',
});

/**
 * Source unit spellings (workbook and feed) to display unit and classes.
 * Keys are matched case-sensitively first, then case-insensitively.
 */
const UNIT_TABLE: Readonly<Record<string, UnitInference>> = {
  W: measurement('W', 'power'),
  kW: measurement('kW', 'power'),
  VA: measurement('VA', 'apparent_power'),
  var: measurement('var', 'reactive_power'),
  VAr: measurement('var', 'reactive_power'),
  Wh: counter('Wh'),
  kWh: counter('kWh'),
  MWh: counter('MWh'),
  A: measurement('A', 'current'),
  mA: measurement('mA', 'current'),
  uA: measurement('uA', 'current'),
  V: measurement('V', 'voltage'),
  Hz: measurement('Hz', 'frequency'),
  C: measurement('°C', 'temperature'),
  '°C': measurement('°C', 'temperature'),
  degC: measurement('°C', 'temperature'),
  Pct: measurement('%'),
  '%': measurement('%'),
  Secs: measurement('s', 'duration'),
  s: measurement('s', 'duration'),
  Ohm: measurement('Ω'),
  kOhm: measurement('kΩ'),
  MOhm: measurement('MΩ'),
  B: measurement('B', 'data_size'),
  MB: measurement('MB', 'data_size'),
};

const LOWERCASE_INDEX = new Map(
  Object.entries(UNIT_TABLE).map(([key, value]) => [key.toLowerCase(), value]),
);

/**
 * Infer display unit, device class and state class from a source unit.
 * Unknown units pass through without classes.
 */
export function inferUnit(sourceUnit: string | undefined): UnitInference {
  const unit = (sourceUnit ?? '').trim();
  if (unit === '') {
    return { unit: '' };
  }
  return (
    UNIT_TABLE[unit] ?? LOWERCASE_INDEX.get(unit.toLowerCase()) ?? { unit }
  );
}
