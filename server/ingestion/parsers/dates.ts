import { format, isExists, isValid, parseISO } from "date-fns";

// Genitive month names as printed on the federation site ("12. května 2024")
const CZECH_MONTHS: Record<string, number> = {
  ledna: 1,
  února: 2,
  března: 3,
  dubna: 4,
  května: 5,
  června: 6,
  července: 7,
  srpna: 8,
  září: 9,
  října: 10,
  listopadu: 11,
  prosince: 12,
};

const NUMERIC_DATE = /^(\d{1,2})\.\s*(\d{1,2})\.\s*(\d{4})(?:\s|$)/;
const NAMED_MONTH_DATE = /^(\d{1,2})\.\s*(\p{L}+)\s+(\d{4})(?:\s|$)/u;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T\s]|$)/;

function toIsoDate(year: number, month: number, day: number): string | null {
  if (!isExists(year, month - 1, day)) return null;
  return format(new Date(year, month - 1, day), "yyyy-MM-dd");
}

/**
 * Reads the date part of a match meta line and returns it as `yyyy-MM-dd`.
 * Accepts "12. 5. 2024 10:00", "12.05.2024", "12. května 2024" and ISO dates;
 * anything after the date (kick-off time) is ignored.
 */
export function parseMatchDate(raw: string): string | null {
  const text = raw.replace(/\s+/g, " ").trim();

  const numeric = text.match(NUMERIC_DATE);
  if (numeric) {
    return toIsoDate(Number(numeric[3]), Number(numeric[2]), Number(numeric[1]));
  }

  const named = text.match(NAMED_MONTH_DATE);
  if (named) {
    const month = CZECH_MONTHS[named[2].toLowerCase()];
    return month ? toIsoDate(Number(named[3]), month, Number(named[1])) : null;
  }

  if (ISO_DATE.test(text)) {
    const parsed = parseISO(text.slice(0, 10));
    return isValid(parsed) ? format(parsed, "yyyy-MM-dd") : null;
  }

  return null;
}
