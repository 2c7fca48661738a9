/**
 * Key order of every object-valued top-level field, as listed in the JSON
 * text. `JSON.parse` enumerates integer-like keys ("2", "7") in ascending
 * numeric order, which loses the order the API sent its id-keyed mappings in.
 */
export type KeyOrder = ReadonlyMap<string, readonly string[]>;

interface Frame {
  kind: 'object' | 'array';
  expectingKey: boolean;
  /** Set on the object that is the value of a top-level field. */
  keys?: string[];
}

/** Reads the key order from text that `JSON.parse` has already accepted. */
export function readKeyOrder(text: string): KeyOrder {
  const order = new Map<string, string[]>();
  const stack: Frame[] = [];
  let field: string | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const top = stack[stack.length - 1];

    if (ch === '"') {
      const start = i;
      for (i++; text[i] !== '"'; i++) {
        if (text[i] === '\\') i++;
      }
      if (!top || top.kind !== 'object' || !top.expectingKey) continue;

      const key = String(JSON.parse(text.slice(start, i + 1)));
      top.expectingKey = false;
      if (stack.length === 1) field = key;
      else top.keys?.push(key);
    } else if (ch === '{') {
      const frame: Frame = { kind: 'object', expectingKey: true };
      if (stack.length === 1 && field !== null) {
        frame.keys = [];
        order.set(field, frame.keys);
      }
      stack.push(frame);
    } else if (ch === '[') {
      stack.push({ kind: 'array', expectingKey: false });
    } else if (ch === '}' || ch === ']') {
      stack.pop();
    } else if (ch === ',' && top?.kind === 'object') {
      top.expectingKey = true;
    }
  }

  return order;
}

/** Own keys of `record`, listed keys first in their given order, then the rest. */
export function keysInOrder(record: Record<string, unknown>, order?: readonly string[]): string[] {
  const own = Object.keys(record);
  if (!order) return own;
  const listed = order.filter(key => Object.hasOwn(record, key));
  const seen = new Set(listed);
  return [...listed, ...own.filter(key => !seen.has(key))];
}
