import { parseCount } from '@label-sheet/lib';

import type { CanonicalOrderRow } from './schema';

export interface AggregatedOrder {
  readonly name: string;
  readonly carryOut: number;
  readonly dineIn: number;
}

export interface DineInSummaryEntry {
  readonly name: string;
  readonly count: number;
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sums carry-out and dine-in counts per trimmed name. Names group case-sensitively
 * and the result is ordered by code unit, so the output depends only on the row contents.
 */
export function aggregateOrders(rows: readonly CanonicalOrderRow[]): AggregatedOrder[] {
  const totals = new Map<string, { carryOut: number; dineIn: number }>();

  for (const row of rows) {
    const name = row.name.trim();
    if (!name) {
      continue;
    }

    const current = totals.get(name) ?? { carryOut: 0, dineIn: 0 };
    current.carryOut += parseCount(row.carry_out);
    current.dineIn += parseCount(row.dine_in);
    totals.set(name, current);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => compareNames(a, b))
    .map(([name, { carryOut, dineIn }]) => ({ name, carryOut, dineIn }));
}

export function summarizeDineIn(orders: readonly AggregatedOrder[]): DineInSummaryEntry[] {
  return orders.filter((order) => order.dineIn > 0).map((order) => ({ name: order.name, count: order.dineIn }));
}
