import path from "node:path";

const SEPARATORS = "_- ";

export function isSeparator(ch: string) {
  return ch.length === 1 && SEPARATORS.includes(ch);
}

export function trimSeparators(s: string) {
  let start = 0;
  let end = s.length;
  while (start < end && isSeparator(s[start])) start++;
  while (end > start && isSeparator(s[end - 1])) end--;
  return s.slice(start, end);
}

export function pad2(n: number) {
  return String(n).padStart(2, "0");
}

export function toYYYYMMDD(year: number, month: number, day: number) {
  return `${String(year).padStart(4, "0")}${pad2(month)}${pad2(day)}`;
}

export function isLeapYear(year: number) {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number) {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidCalendarDate(year: number, month: number, day: number) {
  if (!Number.isInteger(year) || year < 1) return false;
  if (!Number.isInteger(month) || month < 1 || month > 12) return false;
  if (!Number.isInteger(day) || day < 1) return false;
  return day <= daysInMonth(year, month);
}

/**
 * Two-digit years below `pivot` land in 2000-20xx, the rest in 19xx.
 * A pivot of 80 maps 00-79 to 2000-2079 and 80-99 to 1980-1999.
 */
export function expandTwoDigitYear(yy: number, pivot: number) {
  return yy < pivot ? 2000 + yy : 1900 + yy;
}

export function splitExtension(filename: string): { stem: string; ext: string } {
  const ext = path.extname(filename);
  const stem = ext ? filename.slice(0, -ext.length) : filename;
  return { stem, ext };
}

/**
 * Returns `desiredName` if free, otherwise `name (2).ext`, `name (3).ext`, ...
 */
export function makeUniqueName(
  desiredName: string,
  isTaken: (name: string) => boolean,
) {
  if (!isTaken(desiredName)) return desiredName;

  const { stem, ext } = splitExtension(desiredName);
  for (let counter = 2; counter < 10_000; counter++) {
    const candidate = `${stem} (${counter})${ext}`;
    if (!isTaken(candidate)) return candidate;
  }

  throw new Error(`Unable to find a free name for ${desiredName}`);
}
