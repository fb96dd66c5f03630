/** Accent-stripped, lower-cased text for lexical matching. */
export function normalizeForMatching(text: string): string {
  return text.normalize("NFD").replace(/\p{Mn}/gu, "").toLowerCase();
}

export function containsAny(text: string, terms: readonly string[]): boolean {
  return terms.some((term) => text.includes(term));
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

const DEFAULT_YEAR = 2025;

/** True when the text carries a day/month date that cannot exist, e.g. `31/2`. */
export function hasInvalidCalendarDate(text: string): boolean {
  for (const match of text.matchAll(/\b(\d{1,2})\/(\d{1,2})(?:\/(\d{2,4}))?\b/g)) {
    const day = Number(match[1]);
    const month = Number(match[2]);
    const year = match[3] ? Number(match[3]) : DEFAULT_YEAR;
    if (month < 1 || month > 12) return true;
    if (day < 1 || day > daysInMonth(year, month)) return true;
  }
  return false;
}
