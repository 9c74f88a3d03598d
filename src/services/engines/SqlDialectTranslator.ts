/**
 * Athena (Presto/Trino) to DuckDB syntax translation for LOCAL runs.
 * Only the constructs the templates actually use are covered.
 */

const DATE_ADD_UNITS: Record<string, string> = {
  year: 'years',
  month: 'months',
  week: 'weeks',
  day: 'days',
  hour: 'hours',
  minute: 'minutes',
  second: 'seconds',
};

const FUNCTION_RENAMES: ReadonlyArray<[RegExp, string]> = [
  [/\barray\s*\[/gi, '['],
  [/\bsequence\s*\(/gi, 'generate_series('],
  [/\barbitrary\s*\(/gi, 'any_value('],
  [/\bcardinality\s*\(/gi, 'len('],
  [/\bfrom_unixtime\s*\(/gi, 'to_timestamp('],
  [/\bapprox_distinct\s*\(/gi, 'approx_count_distinct('],
];

/**
 * date_add('year', -3, CURRENT_DATE) -> CURRENT_DATE - INTERVAL '3' years
 */
function translateDateAdd(sql: string): string {
  return sql.replace(
    /date_add\s*\(\s*['"](\w+)['"]\s*,\s*([+-]?\d+)\s*,\s*([^)]+)\)/gi,
    (_match: string, unit: string, value: string, dateExpr: string) => {
      const amount = value.trim();
      const negative = amount.startsWith('-');
      const magnitude = amount.replace(/^[+-]/, '');
      const lowerUnit = unit.toLowerCase();
      const duckUnit = DATE_ADD_UNITS[lowerUnit] ?? `${lowerUnit}s`;
      return `${dateExpr.trim()} ${negative ? '-' : '+'} INTERVAL '${magnitude}' ${duckUnit}`;
    }
  );
}

export function translateAthenaToDuckDb(sql: string): string {
  let translated = translateDateAdd(sql);
  translated = translated
    .replace(/\bCURRENT_TIMESTAMP\b/gi, 'current_timestamp')
    .replace(/\bCURRENT_DATE\b/gi, 'current_date');
  for (const [pattern, replacement] of FUNCTION_RENAMES) {
    translated = translated.replace(pattern, replacement);
  }
  return translated;
}
