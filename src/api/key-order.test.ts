import { describe, it, expect } from 'vitest';
import { keysInOrder, readKeyOrder } from './key-order.js';

describe('readKeyOrder', () => {
  it('records the keys of object-valued fields as written', () => {
    const order = readKeyOrder('{"crimes":{"7":{"success":80},"2":{"success":80}},"education":{"9":{},"3":{}}}');
    expect(order.get('crimes')).toEqual(['7', '2']);
    expect(order.get('education')).toEqual(['9', '3']);
  });

  it('ignores nested objects, arrays and scalar fields', () => {
    const order = readKeyOrder('{"name":"Tester","inventory":[{"id":"5"}],"status":{"state":"Okay","detail":{"b":1,"a":2}}}');
    expect([...order.keys()]).toEqual(['status']);
    expect(order.get('status')).toEqual(['state', 'detail']);
  });

  it('is not fooled by braces, quotes and commas inside strings', () => {
    const order = readKeyOrder('{"crimes":{"5":{"name":"Rob a \\"bank\\", {fast}"},"1":{"name":"x,\\"y\\":{"}}}');
    expect(order.get('crimes')).toEqual(['5', '1']);
  });

  it('decodes escaped keys', () => {
    expect(readKeyOrder('{"m":{"a\\u0062":1}}').get('m')).toEqual(['ab']);
  });

  it('handles whitespace between tokens', () => {
    expect(readKeyOrder('{ "m" : { "10" : 1 ,\n "4" : 2 } }').get('m')).toEqual(['10', '4']);
  });
});

describe('keysInOrder', () => {
  it('falls back to own key order without an order', () => {
    expect(keysInOrder({ '7': 1, '2': 2 })).toEqual(['2', '7']);
  });

  it('puts listed keys first and drops ones the record lacks', () => {
    expect(keysInOrder({ '1': 1, '4': 4, '9': 9 }, ['9', '3', '1'])).toEqual(['9', '1', '4']);
  });
});
