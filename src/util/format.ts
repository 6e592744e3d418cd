/**
 * Rendering rules shared by the bulletin sections.
 * Percent values arrive as signed percents (2.3 means +2.3%).
 */

const headlinePriceFormat = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 0,
});

/** 19500.4 → "19,500" */
export function formatHeadlinePrice(value: number): string {
  return headlinePriceFormat.format(value);
}

/** 2.3 → "+2.3%", -0.456 → "-0.46%", 0 → "0%" */
export function formatHeadlinePercent(value: number): string {
  const rounded = Number(value.toFixed(2));
  const normalized = rounded === 0 ? 0 : rounded;
  const sign = normalized > 0 ? "+" : "";
  return `${sign}${String(normalized)}%`;
}

/** 1.234 → "+1.23%", -0.5 → "-0.50%", 0 → "0.00%" */
export function formatSignedPercent(value: number): string {
  let fixed = value.toFixed(2);
  if (fixed === "-0.00") fixed = "0.00";
  const sign = Number(fixed) > 0 ? "+" : "";
  return `${sign}${fixed}%`;
}

/** Plain two-decimal price for table rows. */
export function formatTablePrice(value: number): string {
  return value.toFixed(2);
}

/**
 * YYYY-MM-DD; in UTC unless a time zone is given.
 */
export function formatDate(d: Date, timeZone?: string): string {
  if (!timeZone) {
    const y = d.getUTCFullYear();
    const m = String(d.getUTCMonth() + 1).padStart(2, "0");
    const day = String(d.getUTCDate()).padStart(2, "0");
    return `${y}-${m}-${day}`;
  }
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(d);
  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? "";
  return `${pick("year")}-${pick("month")}-${pick("day")}`;
}
