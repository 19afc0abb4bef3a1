import { locateJson } from './json-locator';

const located = (text: string) => {
  const location = locateJson(text);
  return location.status === 'found' ? location.value : location.status;
};

describe('locateJson', () => {
  it('finds an object surrounded by prose', () => {
    expect(located('Here is the result: {"order_number":"PO-1"} Let me know!')).toEqual({
      order_number: 'PO-1',
    });
  });

  it('prefers a fenced json block', () => {
    const text = 'Example {"order_number":"WRONG"}\n```json\n{"order_number":"PO-2"}\n```';

    expect(located(text)).toEqual({ order_number: 'PO-2' });
  });

  it('reads a plain fenced block', () => {
    expect(located('```\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it('skips braces that are not JSON', () => {
    expect(located('Fields {order_number} were found: {"order_number":"PO-3"}')).toEqual({
      order_number: 'PO-3',
    });
  });

  it('ignores brackets inside strings', () => {
    expect(located('{"description":"Bolt } [M8]","quantity":4}')).toEqual({
      description: 'Bolt } [M8]',
      quantity: 4,
    });
  });

  it('takes the first object of a top-level array', () => {
    expect(located('[{"order_number":"PO-4"},{"order_number":"PO-5"}]')).toEqual({
      order_number: 'PO-4',
    });
  });

  it('passes over arrays without objects', () => {
    expect(located('See note [1]. {"ok":true}')).toEqual({ ok: true });
  });

  it('reports text without a JSON object as absent', () => {
    expect(located('I could not read this document.')).toBe('absent');
  });

  it('reports a reply cut off inside the outer object as truncated', () => {
    expect(located('{"truncated": ')).toBe('truncated');
    expect(
      located(
        'Result: {"order_number":"PO-77","vendor":{"name":"Acme Supply"},"line_items":[{"description":"Bolt","quantity":2},{"descr',
      ),
    ).toBe('truncated');
  });

  it('falls back to a complete fence when another fence is cut short', () => {
    const text = '```json\n{"order_number":"PO-8",\n```\n```\n{"order_number":"PO-9"}\n```';

    expect(located(text)).toEqual({ order_number: 'PO-9' });
  });
});
