import { pageImage } from '../../../test/fixtures';
import { RequestBuildError } from './errors';
import { ExtractionRequestBuilder, USER_PROMPT } from './extraction-request.builder';
import { ADVANCED_ONLY_FIELDS, BASIC_FIELDS } from './purchase-order.fields';

const listedFields = (instruction: string): string[] =>
  [...instruction.matchAll(/^- ([a-z_.[\]]+) \(/gm)].map((match) => match[1] ?? '');

describe('ExtractionRequestBuilder', () => {
  const builder = new ExtractionRequestBuilder();

  it('refuses to build a request without pages', () => {
    expect(() => builder.build([], 'basic')).toThrow(RequestBuildError);
  });

  it('lists exactly the basic fields in basic mode', () => {
    const request = builder.build([pageImage(1)], 'basic');

    expect(listedFields(request.instruction)).toEqual(BASIC_FIELDS.map((field) => field.path));
    expect(request.fields).toEqual(BASIC_FIELDS.map((field) => field.path));
    for (const field of ADVANCED_ONLY_FIELDS) {
      expect(request.instruction).not.toContain(field.path.split('[')[0]);
    }
  });

  it('adds the advanced fields on top of the basic ones', () => {
    const basic = builder.build([pageImage(1)], 'basic');
    const advanced = builder.build([pageImage(1)], 'advanced');

    expect(listedFields(advanced.instruction)).toEqual([
      ...BASIC_FIELDS.map((field) => field.path),
      ...ADVANCED_ONLY_FIELDS.map((field) => field.path),
    ]);
    expect(advanced.fields.slice(0, basic.fields.length)).toEqual(basic.fields);
    expect(advanced.instruction).toContain('- grand_total (number): Final amount payable including tax');
  });

  it('keeps the pages in order without copying them', () => {
    const pages = [pageImage(1), pageImage(2), pageImage(3)];

    const request = builder.build(pages, 'basic');

    expect(request.pages).toBe(pages);
    expect(request.pages.map((page) => page.pageNumber)).toEqual([1, 2, 3]);
    expect(request.prompt).toBe(USER_PROMPT);
    expect(request.mode).toBe('basic');
  });

  it('describes date fields with their format', () => {
    const request = builder.build([pageImage(1)], 'basic');

    expect(request.instruction).toContain('- order_date (string, YYYY-MM-DD): Date the order was issued');
    expect(request.instruction).toContain('- line_items[].quantity (number): Ordered quantity');
  });
});
