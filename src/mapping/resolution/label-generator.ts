/**
 * Human-readable labels for points no standards workbook describes.
 */

const VSN300_MODEL_PATTERN = /^m\d+_(?:\d+_)?(.+)$/;

const STATE_CODE_LABELS: Readonly<Record<string, string>> = {
  Alm1: 'Alarm 1',
  Alm2: 'Alarm 2',
  Alm3: 'Alarm 3',
  AlarmState: 'Alarm State',
  FaultStatus: 'Fault Status',
  BatteryMode: 'Battery Mode',
  BatteryStatus: 'Battery Status',
  IsolResist: 'Isolation Resistance',
};

const SYSTEM_POINT_LABELS: Readonly<Record<string, string>> = {
  flash_free: 'Flash Memory Free',
  free_ram: 'Free RAM',
  fw_ver: 'Firmware Version',
  hw_ver: 'Hardware Version',
  store_size: 'Storage Size',
  sys_load: 'System Load',
  uptime: 'System Uptime',
  sn: 'Serial Number',
};

const PERIOD_LABELS: Readonly<Record<string, string>> = {
  runtime: 'Lifetime',
  '7D': '7 Day',
  '30D': '30 Day',
  '1Y': '1 Year',
};

const ABBREVIATIONS: ReadonlyArray<readonly [string, string]> = [
  ['Soc', 'State of Charge'],
  ['Soh', 'State of Health'],
  ['Tmp', 'Temperature'],
  ['Vbat', 'Battery Voltage'],
  ['Ibat', 'Battery Current'],
  ['Pbat', 'Battery Power'],
];

/**
 * Capitalize the first letter of every alphabetic run, lowercase the rest
 * (`wlan0 ipaddr` -> `Wlan0 Ipaddr`, `7d` -> `7D`).
 */
export function titleCase(text: string): string {
  return text.replace(
    /[A-Za-z]+/g,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
  );
}

/**
 * Split CamelCase and snake_case into title-cased words
 */
export function splitWords(name: string): string {
  const words = name
    .replace(/([A-Z])/g, ' $1')
    .split(/\s+/)
    .flatMap((word) => word.split('_'))
    .filter((word) => word.length > 0);
  return titleCase(words.join(' '));
}

/**
 * Generate a label from a raw or canonical point name.
 *
 * @example
 * generateLabel('m103_1_TmpCab') // 'Temperature Cab'
 * generateLabel('E0_7D')         // 'E0 7 Day'
 * generateLabel('SysTime')       // 'Sys Time'
 */
export function generateLabel(pointName: string): string {
  const sunspec = VSN300_MODEL_PATTERN.exec(pointName);
  if (sunspec) {
    return generateLabel(sunspec[1]);
  }

  const stateLabel = STATE_CODE_LABELS[pointName];
  if (stateLabel) {
    return stateLabel;
  }

  const systemLabel = SYSTEM_POINT_LABELS[pointName];
  if (systemLabel) {
    return systemLabel;
  }

  const separator = pointName.lastIndexOf('_');
  if (separator > 0) {
    const period = PERIOD_LABELS[pointName.slice(separator + 1)];
    if (period) {
      return `${generateLabel(pointName.slice(0, separator))} ${period}`;
    }
  }

  for (const [abbreviation, full] of ABBREVIATIONS) {
    if (!pointName.startsWith(abbreviation)) {
      continue;
    }
    const rest = pointName.slice(abbreviation.length);
    if (rest === '') {
      return full;
    }
    // only at a word boundary: `TmpCab`, not `Social`
    if (/^[A-Z0-9_]/.test(rest)) {
      return `${full} ${generateLabel(rest.replace(/^_/, ''))}`;
    }
  }

  return splitWords(pointName);
}
