import {
  ModelId,
  PROPRIETARY_MODEL,
  PointCategory,
  VENDOR_ONLY_MODELS,
} from '../interfaces/canonical-mapping.interface';

export interface CategoryInputs {
  label: string;
  /** Standards or feed description when one was accepted, else '' */
  description: string;
  models: readonly ModelId[];
  vsn700Name?: string;
}

const ENERGY_COUNTER_LABEL = /\be[0-8]\b/;

const SYSTEM_MONITORING_KEYWORDS = [
  /flash/,
  /\bram\b/,
  /uptime/,
  /\bload\b/,
  /sys_/,
  /wlan/,
  /\bip\b/,
  /essid/,
];

const BATTERY_KEYWORDS = [
  /battery/,
  /batt/,
  /\bcell/,
  /\bsoc\b/,
  /\bsoh\b/,
  /charge/,
  /discharge/,
];

const STATUS_KEYWORDS = [
  /status/,
  /state/,
  /alarm/,
  /fault/,
  /event/,
  /\bmode\b/,
  /control/,
];

const PHASE_KEYWORDS = [/phase/, /\bl[123]\b/, /phv/, /aph/, /wph/];

const isInverterModel = (model: ModelId) =>
  /^M(?:10[1-3]|11[1-3])$/.test(model);
const isMpptModel = (model: ModelId) => model === 'M160';
const isMeterModel = (model: ModelId) => /^M(?:20[1-4]|21[1-4])$/.test(model);
const isBatteryModel = (model: ModelId) => /^M80[2-4]$/.test(model);

/**
 * Model-tag fallback, consulted in this order when no keyword matched
 */
const MODEL_FALLBACK: ReadonlyArray<
  readonly [(model: ModelId) => boolean, PointCategory]
> = [
  [isInverterModel, 'Inverter'],
  [isMpptModel, 'MPPT'],
  [isMeterModel, 'Meter'],
  [isBatteryModel, 'Battery'],
  [(model) => model === 'M64061', 'Inverter'],
  [(model) => model === PROPRIETARY_MODEL, 'System'],
  [
    (model) =>
      model === VENDOR_ONLY_MODELS.vsn300 ||
      model === VENDOR_ONLY_MODELS.vsn700,
    'Datalogger',
  ],
];

const matchesAny = (text: string, patterns: readonly RegExp[]) =>
  patterns.some((pattern) => pattern.test(text));

/**
 * Keyword and model cascade. Earlier rules win:
 * energy counters, house meter, system monitoring, battery, status,
 * device info (common model), phase measurements, DC measurements,
 * then the model fallback. Returns 'Unknown' when nothing applies.
 */
export function resolveCategory(inputs: CategoryInputs): PointCategory {
  const label = inputs.label.toLowerCase();
  const description = inputs.description.toLowerCase();
  const models = inputs.models;
  const has = (predicate: (model: ModelId) => boolean) =>
    models.some(predicate);

  if (
    ENERGY_COUNTER_LABEL.test(label) &&
    !label.includes('charge') &&
    !label.includes('discharge')
  ) {
    return 'Energy Counter';
  }
  if (
    (label.includes('energy') || description.includes('energy')) &&
    !label.includes('battery') &&
    !description.includes('battery')
  ) {
    return 'Energy Counter';
  }

  if (
    label.includes('house') ||
    description.includes('house') ||
    inputs.vsn700Name?.startsWith('House')
  ) {
    return 'House Meter';
  }

  if (matchesAny(label, SYSTEM_MONITORING_KEYWORDS)) {
    return 'System Monitoring';
  }

  if (matchesAny(label, BATTERY_KEYWORDS) && !label.includes('energy')) {
    return 'Battery';
  }

  if (matchesAny(label, STATUS_KEYWORDS)) {
    return 'Status';
  }

  if (models.includes('M1')) {
    return 'Device Info';
  }

  if (matchesAny(label, PHASE_KEYWORDS)) {
    if (has(isInverterModel) || has(isMpptModel)) {
      return 'Inverter';
    }
    if (has(isMeterModel)) {
      return 'Meter';
    }
  }

  if (label.startsWith('dc') || label.includes('mppt')) {
    return has(isMpptModel) ? 'MPPT' : 'Inverter';
  }

  for (const [predicate, category] of MODEL_FALLBACK) {
    if (has(predicate)) {
      return category;
    }
  }
  return 'Unknown';
}
