import { parseDistance, parseLocaleAmount, toIsoDate } from './parsers.js';

export interface PatternRule<T> {
  name: string;
  /** Must carry the `g` flag; group 1 (and for dates 2 and 3) hold the value. */
  pattern: RegExp;
  parse(match: RegExpMatchArray): T | null;
}

export interface RuleMatch<T> {
  value: T;
  rule: string;
}

// Not preceded or followed by further digits, so dates like 04.05.2023 never read as 04.05
const AMOUNT = String.raw`(?<![\d.,])(?:\d{1,3}(?:[ \u00a0]\d{3})+[,.]\d{2}|\d+[,.]\d{2})(?![.,]?\d)`;
const GROUPED_DISTANCE = String.raw`\d{1,3}(?:[ \u00a0]\d{3})+`;

function group(match: RegExpMatchArray, index: number): string | null {
  const value = match[index];
  return value === undefined ? null : value;
}

function amountFrom(match: RegExpMatchArray): number | null {
  const raw = group(match, 1);
  return raw === null ? null : parseLocaleAmount(raw);
}

function distanceFrom(match: RegExpMatchArray): number | null {
  const raw = group(match, 1);
  return raw === null ? null : parseDistance(raw);
}

function dayMonthYearFrom(match: RegExpMatchArray): string | null {
  const day = group(match, 1);
  const month = group(match, 2);
  const year = group(match, 3);
  if (day === null || month === null || year === null) return null;
  return toIsoDate(Number(day), Number(month), Number(year));
}

function textFrom(match: RegExpMatchArray): string | null {
  const raw = group(match, 1);
  return raw === null ? null : raw.trim();
}

export const DATE_RULES: readonly PatternRule<string>[] = [
  {
    name: 'labelled-date',
    pattern: /(?:Laskupvm|Päivämäärä|Päiväys|Pvm)\.?\s*:?\s*(\d{1,2})\.(\d{1,2})\.(\d{4}|\d{2})(?!\d)/gi,
    parse: dayMonthYearFrom,
  },
  {
    name: 'day-month-year',
    pattern: /(?<![\d.])(\d{1,2})\.(\d{1,2})\.(\d{4}|\d{2})(?!\.?\d)/g,
    parse: dayMonthYearFrom,
  },
  {
    name: 'iso-date',
    pattern: /(?<!\d)(\d{4})-(\d{2})-(\d{2})(?!\d)/g,
    parse: (match) => {
      const year = group(match, 1);
      const month = group(match, 2);
      const day = group(match, 3);
      if (year === null || month === null || day === null) return null;
      return toIsoDate(Number(day), Number(month), Number(year));
    },
  },
];

export const AMOUNT_RULES: readonly PatternRule<number>[] = [
  {
    name: 'total-label-eur',
    pattern: new RegExp(String.raw`Yhteensä\s*:\s*(${AMOUNT})\s*(?:EUR|€)`, 'gi'),
    parse: amountFrom,
  },
  {
    name: 'total-label',
    pattern: new RegExp(String.raw`(?:MAKSETTAVA\s+)?YHTEENSÄ[^\n]*?(${AMOUNT})`, 'gi'),
    parse: amountFrom,
  },
  {
    name: 'amount-eur',
    pattern: new RegExp(String.raw`(${AMOUNT})\s*(?:EUR|€)`, 'gi'),
    parse: amountFrom,
  },
];

export const VAT_RULES: readonly PatternRule<number>[] = [
  {
    name: 'vat-rate-prefix',
    pattern: new RegExp(String.raw`\+?\bALV\s+\d{1,2}(?:[,.]\d{1,2})?\s*%\s*(${AMOUNT})`, 'gi'),
    parse: amountFrom,
  },
  {
    name: 'vat-label',
    pattern: new RegExp(String.raw`(?:\bALV\b|Arvonlisävero)[^\n]*?(${AMOUNT})`, 'gi'),
    parse: amountFrom,
  },
  {
    name: 'vat-rate',
    pattern: new RegExp(String.raw`(?<![\d,.])(?:24|25[,.]5)\s*%[^\n]*?(${AMOUNT})`, 'g'),
    parse: amountFrom,
  },
];

export const INVOICE_RULES: readonly PatternRule<string>[] = [
  {
    name: 'invoice-label',
    pattern: /(?:Laskun\s*numero|Laskunumero|Lasku\s*nro|Invoice(?:\s*(?:no|number|#))?)\.?\s*:?\s*(\d{4,})/gi,
    parse: textFrom,
  },
  {
    name: 'eight-digits',
    pattern: /(?<![\d-])(\d{8})(?![\d-])/g,
    parse: textFrom,
  },
];

export const ODOMETER_RULES: readonly PatternRule<number>[] = [
  {
    name: 'odometer-label',
    pattern: new RegExp(
      String.raw`(?:Mittarilukema|Mittarilkm|Km-lukema|Mileage|Odometer)[\s:.]*(${GROUPED_DISTANCE}|\d{3,7})(?![\d,.]?\d)`,
      'gi',
    ),
    parse: distanceFrom,
  },
  {
    name: 'odometer-label-next-line',
    pattern: /Mittarilukema[^\n]*\n+\s*(\d{6,7})(?!\d)/gi,
    parse: distanceFrom,
  },
  {
    name: 'km-suffix',
    pattern: new RegExp(String.raw`(?<![\d,.])(${GROUPED_DISTANCE}|\d{4,7})\s*km\b`, 'gi'),
    parse: distanceFrom,
  },
  {
    name: 'six-digit-line',
    pattern: /^[ \t]*(\d{6})[ \t]*$/gm,
    parse: distanceFrom,
  },
];

export const VEHICLE_REG_RULES: readonly PatternRule<string>[] = [
  {
    name: 'registration-label',
    pattern: /(?:Rekisterinumero|Rek\.?\s*nro|Rek\.?\s*tunnus|Rekno)\.?\s*:?\s*([A-ZÅÄÖ]{2,3}-\d{1,3})(?!\d)/gi,
    parse: (match) => textFrom(match)?.toUpperCase() ?? null,
  },
  {
    name: 'plate',
    pattern: /(?<![A-Za-zÅÄÖåäö-])([A-ZÅÄÖ]{2,3}-\d{1,3})(?![\d-])/g,
    parse: textFrom,
  },
];

/** First rule, in order, with a match that parses to a value. */
export function firstMatch<T>(text: string, rules: readonly PatternRule<T>[]): RuleMatch<T> | null {
  for (const rule of rules) {
    for (const match of text.matchAll(rule.pattern)) {
      const value = rule.parse(match);
      if (value !== null) {
        return { value, rule: rule.name };
      }
    }
  }
  return null;
}
