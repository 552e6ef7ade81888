import { formatInTimeZone } from "date-fns-tz";

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

function getOrdinalSuffix(day: number): string {
  if (day > 3 && day < 21) return "th";
  switch (day % 10) {
    case 1:
      return "st";
    case 2:
      return "nd";
    case 3:
      return "rd";
    default:
      return "th";
  }
}

/** "November 20th 2025", or "Unknown" for a missing or unparsable timestamp. */
export function formatDisplayDate(iso: string, timezone: string): string {
  const date = new Date(iso);
  if (!iso || Number.isNaN(date.getTime())) return "Unknown";

  const [year, month, day] = formatInTimeZone(date, timezone, "yyyy-MM-dd")
    .split("-")
    .map(Number);

  return `${MONTH_NAMES[month - 1]} ${day}${getOrdinalSuffix(day)} ${year}`;
}

export function formatFileDate(now: Date, timezone: string): string {
  return formatInTimeZone(now, timezone, "yyyyMMdd");
}
