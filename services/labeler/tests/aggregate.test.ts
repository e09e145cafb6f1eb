import { describe, expect, it } from 'vitest';

import { aggregateOrders, compareNames, summarizeDineIn } from '../src/aggregate';
import { normalizeOrderRows } from '../src/schema';

describe('aggregateOrders', () => {
  it('keeps names that differ only by case in separate groups', () => {
    const rows = normalizeOrderRows([
      { Name: 'Alice', 'Carry-Out': '3', 'Dine In': '2' },
      { Name: 'alice', 'Carry-Out': '1', 'Dine In': '0' }
    ]);

    expect(aggregateOrders(rows)).toEqual([
      { name: 'Alice', carryOut: 3, dineIn: 2 },
      { name: 'alice', carryOut: 1, dineIn: 0 }
    ]);
  });

  it('sums duplicate trimmed names', () => {
    const orders = aggregateOrders([
      { name: ' Bob', carry_out: '2', dine_in: '1' },
      { name: 'Bob ', carry_out: '3', dine_in: '' },
      { name: 'Bob', carry_out: '1', dine_in: '4' }
    ]);

    expect(orders).toEqual([{ name: 'Bob', carryOut: 6, dineIn: 5 }]);
  });

  it('drops blank names and degrades bad numbers to zero', () => {
    const orders = aggregateOrders([
      { name: '   ', carry_out: '9', dine_in: '9' },
      { name: '', carry_out: '1', dine_in: '1' },
      { name: 'Cara', carry_out: 'two', dine_in: '-3' },
      { name: 'Cara', carry_out: '2.9', dine_in: ' 4 ' }
    ]);

    expect(orders).toEqual([{ name: 'Cara', carryOut: 2, dineIn: 4 }]);
  });

  it('reads only decimal counts', () => {
    const orders = aggregateOrders([
      { name: 'Hex', carry_out: '0x10', dine_in: '0b11' },
      { name: 'Oct', carry_out: '0o7', dine_in: '' },
      { name: 'Sci', carry_out: '2e1', dine_in: '+3' }
    ]);

    expect(orders).toEqual([
      { name: 'Hex', carryOut: 0, dineIn: 0 },
      { name: 'Oct', carryOut: 0, dineIn: 0 },
      { name: 'Sci', carryOut: 20, dineIn: 3 }
    ]);
  });

  it('orders names by code unit', () => {
    const orders = aggregateOrders([
      { name: 'zed', carry_out: '1', dine_in: '0' },
      { name: 'Zed', carry_out: '1', dine_in: '0' },
      { name: 'Amy', carry_out: '1', dine_in: '0' },
      { name: 'amy', carry_out: '1', dine_in: '0' }
    ]);

    expect(orders.map((order) => order.name)).toEqual(['Amy', 'Zed', 'amy', 'zed']);
    expect(compareNames('b', 'a')).toBe(1);
    expect(compareNames('a', 'a')).toBe(0);
  });
});

describe('summarizeDineIn', () => {
  it('lists only names with dine-in orders, in aggregate order', () => {
    const summary = summarizeDineIn([
      { name: 'Ana', carryOut: 2, dineIn: 0 },
      { name: 'Ben', carryOut: 0, dineIn: 3 },
      { name: 'Cy', carryOut: 1, dineIn: 1 }
    ]);

    expect(summary).toEqual([
      { name: 'Ben', count: 3 },
      { name: 'Cy', count: 1 }
    ]);
  });
});
