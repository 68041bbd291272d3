import { describe, expect, it } from 'vitest';

import { Tally, Tally2, Tally3, counterOf, presence } from '@/modules/aggregation/index.js';

import { plain } from '../../fixtures/builders.js';

describe('Tally', () => {
  it('adds to and overwrites keys', () => {
    const tally = new Tally().add('a').add('a').add('b', '2.5').set('c', 0);

    expect(tally.size).toBe(3);
    expect(plain(tally.toCounter())).toEqual({ a: '2', b: '2.5', c: '0' });

    tally.set('a', 7);
    expect(plain(tally.toCounter())).toEqual({ a: '7', b: '2.5', c: '0' });
  });
});

describe('Tally2 and Tally3', () => {
  it('nest counters', () => {
    const two = new Tally2().add('1', '2013').add('1', '2013').add('2', '2014', 10);
    const three = new Tally3().add('3', 'EUR', '2013', 5).add('3', 'EUR', '2013', 5).add('3', 'USD', '2014');

    expect(plain(two.toCounter())).toEqual({ '1': { '2013': '2' }, '2': { '2014': '10' } });
    expect(plain(three.toCounter())).toEqual({ '3': { EUR: { '2013': '10' }, USD: { '2014': '1' } } });
  });
});

describe('presence', () => {
  it('counts each key once', () => {
    expect(plain(presence(['a', 'b', 'a']))).toEqual({ a: '1', b: '1' });
  });
});

describe('counterOf', () => {
  it('builds a counter from plain numbers', () => {
    expect(plain(counterOf({ pass: 1, fail: 0 }))).toEqual({ pass: '1', fail: '0' });
  });
});
