import { LIMITS } from "./extraction-constants.js";

interface DateFormat {
  re:    RegExp;
  order: "mdy" | "ymd";
}

// US cards print month first; ISO-style year-first dates show up on newer layouts.
const DATE_FORMATS: readonly DateFormat[] = [
  { re: /^(\d{1,2})([/.-])(\d{1,2})\2(\d{4})$/, order: "mdy" },
  { re: /^(\d{4})([/.-])(\d{1,2})\2(\d{1,2})$/, order: "ymd" },
  { re: /^(\d{2})()(\d{2})(\d{4})$/,            order: "mdy" },
];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isCalendarDate(year: number, month: number, day: number): boolean {
  return year >= LIMITS.MIN_BIRTH_YEAR
    && month >= 1 && month <= 12
    && day >= 1 && day <= daysInMonth(year, month);
}

const pad = (n: number, width: number) => String(n).padStart(width, "0");

/**
 * Parse a printed date of birth into YYYY-MM-DD.
 *
 * Accepts MM/DD/YYYY, MM-DD-YYYY, MM.DD.YYYY, YYYY-MM-DD, YYYY/MM/DD and
 * MMDDYYYY. Spaces around separators are ignored and anything after the
 * first token is dropped ("01/15/1990 SEX M"). Returns undefined for
 * anything else, including impossible dates like 02/30/1990.
 */
export function parseDateOfBirth(value: string): string | undefined {
  const token = value.trim().replace(/\s*([/.-])\s*/g, "$1").split(/\s+/)[0] ?? "";

  for (const { re, order } of DATE_FORMATS) {
    const m = token.match(re);
    if (!m) continue;
    const [a, b, c] = [Number(m[1]), Number(m[3]), Number(m[4])];
    const [year, month, day] = order === "ymd" ? [a, b, c] : [c, a, b];
    if (!isCalendarDate(year, month, day)) return undefined;
    return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
  }
  return undefined;
}
