import type { OrderSettingsValues } from "../config/orderSettings";

export const PICKUP_DAYS = 4;

type CalendarDate = { year: number; month: number; day: number };

// One formatter per field: combined patterns move markers such as the
// Japanese 月 into literal parts.
const LABEL_FIELDS: ReadonlyArray<Intl.DateTimeFormatOptions> = [
  { weekday: "short" },
  { month: "short" },
  { day: "numeric" },
];

const calendarDate = (instant: number, timeZone: string): CalendarDate => {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "numeric",
    day: "numeric",
  }).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((p) => p.type === type)?.value);
  return { year: part("year"), month: part("month"), day: part("day") };
};

const label = (formatters: ReadonlyArray<Intl.DateTimeFormat>, instant: number): string =>
  formatters.map((formatter) => formatter.format(instant)).join(" ");

/**
 * Labels like "Mon Oct 19" for today and the following days, where "today"
 * is the calendar date of `now` in the configured time zone.
 */
export const pickupOptions = (
  now: number,
  settings: Pick<OrderSettingsValues, "locale" | "timeZone">,
): ReadonlyArray<string> => {
  const today = calendarDate(now, settings.timeZone);
  // Days are stepped on the UTC calendar at noon so DST shifts never repeat or skip one.
  const formatters = LABEL_FIELDS.map(
    (field) => new Intl.DateTimeFormat(settings.locale, { ...field, timeZone: "UTC" }),
  );
  return Array.from({ length: PICKUP_DAYS }, (_, offset) =>
    label(formatters, Date.UTC(today.year, today.month - 1, today.day + offset, 12)),
  );
};
