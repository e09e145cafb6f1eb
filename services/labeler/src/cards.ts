import type { AggregatedOrder } from './aggregate';
import { MAX_LABEL_CARDS, PACK_SUMMARY_TITLE } from './constants';
import { LabelLimitError } from './errors';

export interface PrimaryCard {
  readonly kind: 'primary';
  readonly name: string;
  readonly count: number;
}

export interface ContinuationCard {
  readonly kind: 'continuation';
  readonly name: string;
  readonly count: null;
}

export interface PackSummaryCard {
  readonly kind: 'pack-summary';
  readonly name: string;
  readonly doubles: number;
  readonly singles: number;
}

export type LabelCard = PrimaryCard | ContinuationCard | PackSummaryCard;

export interface PackSplit {
  doubles: number;
  singles: number;
}

export interface SequenceOptions {
  maxCards?: number;
}

export interface CardSequence {
  cards: readonly LabelCard[];
  totals: PackSplit;
}

export function splitPacks(carryOut: number): PackSplit {
  if (carryOut <= 0) {
    return { doubles: 0, singles: 0 };
  }
  return { doubles: Math.floor(carryOut / 2), singles: carryOut % 2 };
}

export function requiredLabelCount(carryOut: number): number {
  const { doubles, singles } = splitPacks(carryOut);
  return doubles + singles;
}

/** Cards the orders expand to, pack summary included. */
export function countLabelCards(orders: readonly AggregatedOrder[]): number {
  const labels = orders.reduce((sum, order) => sum + requiredLabelCount(order.carryOut), 0);
  return labels > 0 ? labels + 1 : 0;
}

/** Throws {@link LabelLimitError} before allocating anything when the orders need more than `maxCards` cards. */
export function sequenceLabelCards(
  orders: readonly AggregatedOrder[],
  { maxCards = MAX_LABEL_CARDS }: SequenceOptions = {}
): CardSequence {
  const required = countLabelCards(orders);
  if (required > maxCards) {
    throw new LabelLimitError(required, maxCards);
  }

  const cards: LabelCard[] = [];
  const totals: PackSplit = { doubles: 0, singles: 0 };

  for (const order of orders) {
    if (order.carryOut <= 0) {
      continue;
    }

    const split = splitPacks(order.carryOut);
    totals.doubles += split.doubles;
    totals.singles += split.singles;

    cards.push(Object.freeze({ kind: 'primary', name: order.name, count: order.carryOut }));
    for (let index = 1; index < split.doubles + split.singles; index += 1) {
      cards.push(Object.freeze({ kind: 'continuation', name: order.name, count: null }));
    }
  }

  if (totals.doubles || totals.singles) {
    cards.push(
      Object.freeze({
        kind: 'pack-summary',
        name: PACK_SUMMARY_TITLE,
        doubles: totals.doubles,
        singles: totals.singles
      })
    );
  }

  return { cards: Object.freeze(cards), totals };
}
