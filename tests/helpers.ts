import { DatedSignal, PriceRecord, SentimentRecord, Signal } from "../src/analyzers/types";

/** Consecutive calendar days starting 2024-01-01. */
export function isoDay(i: number): string {
  return new Date(Date.UTC(2024, 0, 1 + i)).toISOString().slice(0, 10);
}

export function sentimentSeries(rows: Array<[number, number]>): SentimentRecord[] {
  return rows.map(([vix, fearGreed], i) => ({ date: isoDay(i), vix, fearGreed }));
}

export function priceSeries(closes: number[]): PriceRecord[] {
  return closes.map((close, i) => ({ date: isoDay(i), close }));
}

export function signalSeries(signals: Signal[]): DatedSignal[] {
  return signals.map((signal, i) => ({ date: isoDay(i), signal }));
}

// Readings that satisfy the default rules
export const FEAR: [number, number]    = [35, 10];
export const GREED: [number, number]   = [12, 90];
export const NEUTRAL: [number, number] = [20, 50];
