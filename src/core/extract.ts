import {
  expandTwoDigitYear,
  isSeparator,
  isValidCalendarDate,
  pad2,
  splitExtension,
  toYYYYMMDD,
  trimSeparators,
} from "./utils.js";

export type DateFormat =
  | "datetime-compact"
  | "ymd-separated"
  | "dmy-separated"
  | "ymd-compact"
  | "mdy-compact"
  | "day-month-name"
  | "month-name-day";

export type TimeOfDay = {
  hour: number;
  minute: number;
  second: number;
  millis: string | null;
};

export type DateCandidate = {
  /** Offsets into the stem that was scanned. */
  start: number;
  end: number;
  year: number;
  month: number;
  day: number;
  format: DateFormat;
  time: TimeOfDay | null;
};

export type ExtractionResult = {
  /** Always `YYYYMMDD`. */
  canonicalDate: string;
  /** `HHMMSS` or `HHMMSS.mmm` when a date-time matched, otherwise null. */
  canonicalTime: string | null;
  matched: string;
  residualName: string;
  extension: string;
  candidate: DateCandidate;
};

export type ExtractOptions = {
  pivotYear?: number;
  includeTime?: boolean;
};

export const DEFAULT_PIVOT_YEAR = 80;

export const MONTHS: ReadonlyMap<string, number> = new Map([
  ["jan", 1],
  ["feb", 2],
  ["mar", 3],
  ["apr", 4],
  ["may", 5],
  ["jun", 6],
  ["jul", 7],
  ["aug", 8],
  ["sep", 9],
  ["oct", 10],
  ["nov", 11],
  ["dec", 12],
]);

const MONTH_ALT = [...MONTHS.keys()].join("|");

type ParsedDate = {
  year: number;
  month: number;
  day: number;
  time?: TimeOfDay;
};

type Matcher = {
  format: DateFormat;
  re: RegExp;
  parse: (m: RegExpExecArray, pivotYear: number) => ParsedDate | null;
};

function year(token: string, pivotYear: number) {
  const n = Number(token);
  return token.length === 2 ? expandTwoDigitYear(n, pivotYear) : n;
}

function monthNumber(token: string) {
  return MONTHS.get(token.toLowerCase()) ?? null;
}

function parseDateTime(m: RegExpExecArray): ParsedDate | null {
  const time = {
    hour: Number(m[4]),
    minute: Number(m[5]),
    second: Number(m[6]),
    millis: m[7] ?? null,
  };
  if (time.hour > 23 || time.minute > 59 || time.second > 59) return null;
  return { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]), time };
}

// Every regex is sticky: it only matches at the offset put in lastIndex.
const DATETIME_MATCHER: Matcher = {
  format: "datetime-compact",
  re: /(?<!\d)(\d{4})(\d{2})(\d{2})[-_T](\d{2})(\d{2})(\d{2})(?:\.?(\d{3}))?(?!\d)/y,
  parse: parseDateTime,
};

// A stamp this tool already wrote keeps its time even without includeTime.
const STAMP_MATCHER: Matcher = {
  format: "datetime-compact",
  re: /(?<!\d)(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(?:\.(\d{3}))?(?!\d)/y,
  parse: parseDateTime,
};

const DATE_MATCHERS: readonly Matcher[] = [
  {
    format: "ymd-separated",
    re: /(\d{4})[-_](\d{2})[-_](\d{2})/y,
    parse: (m) => ({ year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) }),
  },
  {
    // Day first, always: 12-03-2024 is the 12th of March.
    format: "dmy-separated",
    re: /(\d{2})[-_](\d{2})[-_](\d{4})/y,
    parse: (m) => ({ year: Number(m[3]), month: Number(m[2]), day: Number(m[1]) }),
  },
  {
    format: "ymd-compact",
    re: /(?<!\d)((?:19|20)\d{2})(\d{2})(\d{2})(?!\d)/y,
    parse: (m) => ({ year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) }),
  },
  {
    format: "mdy-compact",
    re: /(?<!\d)(\d{2})(\d{2})(\d{4})(?!\d)/y,
    parse: (m) => ({ year: Number(m[3]), month: Number(m[1]), day: Number(m[2]) }),
  },
  {
    format: "day-month-name",
    re: new RegExp(
      `(?<!\\d)(\\d{1,2})[-_]?(${MONTH_ALT})[-_]?(\\d{4}|\\d{2})(?!\\d)`,
      "iy",
    ),
    parse: (m, pivotYear) => {
      const month = monthNumber(m[2]);
      if (month === null) return null;
      return { year: year(m[3], pivotYear), month, day: Number(m[1]) };
    },
  },
  {
    format: "month-name-day",
    re: new RegExp(
      `(?<![a-z])(${MONTH_ALT})[-_]?(\\d{1,2})[-_,]?(\\d{4}|\\d{2})(?!\\d)`,
      "iy",
    ),
    parse: (m, pivotYear) => {
      const month = monthNumber(m[1]);
      if (month === null) return null;
      return { year: year(m[3], pivotYear), month, day: Number(m[2]) };
    },
  },
];

function matchAt(
  matcher: Matcher,
  text: string,
  offset: number,
  pivotYear: number,
): DateCandidate | null {
  matcher.re.lastIndex = offset;
  const m = matcher.re.exec(text);
  if (!m) return null;

  const parsed = matcher.parse(m, pivotYear);
  if (!parsed || !isValidCalendarDate(parsed.year, parsed.month, parsed.day)) {
    return null;
  }

  return {
    start: m.index,
    end: m.index + m[0].length,
    year: parsed.year,
    month: parsed.month,
    day: parsed.day,
    format: matcher.format,
    time: parsed.time ?? null,
  };
}

/**
 * Leftmost match wins; at a given offset the first format in priority order
 * that yields a real calendar date wins. Invalid dates never stop the scan.
 */
export function findDate(
  text: string,
  options: ExtractOptions = {},
): DateCandidate | null {
  if (!/\d/.test(text)) return null;

  const pivotYear = options.pivotYear ?? DEFAULT_PIVOT_YEAR;
  const matchers = options.includeTime
    ? [DATETIME_MATCHER, ...DATE_MATCHERS]
    : [STAMP_MATCHER, ...DATE_MATCHERS];

  for (let offset = 0; offset < text.length; offset++) {
    for (const matcher of matchers) {
      const candidate = matchAt(matcher, text, offset, pivotYear);
      if (candidate) return candidate;
    }
  }
  return null;
}

export function removeSpan(text: string, start: number, end: number) {
  let left = text.slice(0, start);
  let right = text.slice(end);
  while (left && isSeparator(left[left.length - 1])) left = left.slice(0, -1);
  while (right && isSeparator(right[0])) right = right.slice(1);

  let joined: string;
  if (!left || !right) joined = left + right;
  else if (left.endsWith(".") || right.startsWith(".")) joined = left + right;
  else joined = `${left}_${right}`;

  return trimSeparators(joined);
}

function formatTime(time: TimeOfDay) {
  const hms = `${pad2(time.hour)}${pad2(time.minute)}${pad2(time.second)}`;
  return time.millis ? `${hms}.${time.millis}` : hms;
}

export function extractDate(
  filename: string,
  options: ExtractOptions = {},
): ExtractionResult | null {
  const { stem, ext } = splitExtension(filename);
  const candidate = findDate(stem, options);
  if (!candidate) return null;

  return {
    canonicalDate: toYYYYMMDD(candidate.year, candidate.month, candidate.day),
    canonicalTime: candidate.time ? formatTime(candidate.time) : null,
    matched: stem.slice(candidate.start, candidate.end),
    residualName: removeSpan(stem, candidate.start, candidate.end),
    extension: ext,
    candidate,
  };
}

export const FALLBACK_BASE_NAME = "file";

/** `YYYYMMDD_residual.ext`, or `YYYYMMDDTHHMMSS_residual.ext` for date-times. */
export function composeName(result: ExtractionResult) {
  const stamp = result.canonicalTime
    ? `${result.canonicalDate}T${result.canonicalTime}`
    : result.canonicalDate;
  const base = result.residualName || FALLBACK_BASE_NAME;
  return `${stamp}_${base}${result.extension}`;
}
