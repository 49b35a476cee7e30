/** One dated observation of a raw series (close, VIX level or Fear & Greed score). */
export interface DailyValue {
  date: string; // YYYY-MM-DD
  value: number;
}

export function toIsoDate(d: Date): string {
  return d.toISOString().split("T")[0];
}
