export type Trend = "up" | "down" | "flat";

export const TREND_COLORS: Record<Trend, string> = {
  up: "#1e8e3e",
  down: "#d93025",
  flat: "#5f6368",
};

export function trendOf(value: number): Trend {
  if (value > 0) {
    return "up";
  }
  if (value < 0) {
    return "down";
  }
  return "flat";
}

export function formatPrice(value: number): string {
  return value.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function formatSignedFixed(value: number, digits = 2): string {
  const fixed = Math.abs(value).toFixed(digits);
  if (Number(fixed) === 0) {
    return fixed;
  }
  return `${value > 0 ? "+" : "-"}${fixed}`;
}

export function formatPercent(value: number): string {
  return `${formatSignedFixed(value)}%`;
}

const MONTHS = [
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

/** "March 1, 2025" in UTC. */
export function formatLongDate(date: Date): string {
  return `${MONTHS[date.getUTCMonth()] ?? ""} ${date.getUTCDate()}, ${date.getUTCFullYear()}`;
}

/** "March 1, 2025 at 12:30 PM UTC". */
export function formatTimestamp(date: Date): string {
  const hours = date.getUTCHours();
  const minutes = String(date.getUTCMinutes()).padStart(2, "0");
  const suffix = hours >= 12 ? "PM" : "AM";
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  return `${formatLongDate(date)} at ${hour12}:${minutes} ${suffix} UTC`;
}

export type FeedHealth = "good" | "warning" | "error";

export function feedHealth(succeeded: number, total: number): FeedHealth {
  if (total === 0) {
    return "error";
  }
  if (succeeded === total) {
    return "good";
  }
  return succeeded >= total * 0.8 ? "warning" : "error";
}
