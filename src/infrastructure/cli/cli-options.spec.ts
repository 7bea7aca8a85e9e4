import { InvalidInputException } from '../../application/errors/batch.errors';
import { CliArgumentError, formatSummary, parseCliArgs, readCompanyEntries } from './cli-options';

describe('parseCliArgs', () => {
  it('lee flags largos y cortos', () => {
    expect(parseCliArgs(['-i', 'in.json', '--output', 'out.json', '--start', '2', '-e', '5'])).toEqual({
      input: 'in.json',
      output: 'out.json',
      start: 2,
      end: 5,
    });
  });

  it('start y end son opcionales', () => {
    expect(parseCliArgs(['--input', 'in.json', '--output', 'out.json'])).toEqual({
      input: 'in.json',
      output: 'out.json',
    });
  });

  it('exige --input y --output', () => {
    expect(() => parseCliArgs(['--input', 'in.json'])).toThrow(
      new CliArgumentError('--output es obligatorio'),
    );
  });

  it('rechaza índices no enteros y flags desconocidos', () => {
    expect(() => parseCliArgs(['-i', 'a', '-o', 'b', '--start', 'abc'])).toThrow(CliArgumentError);
    expect(() => parseCliArgs(['-i', 'a', '-o', 'b', '--verbose'])).toThrow(CliArgumentError);
  });
});

describe('readCompanyEntries', () => {
  it('acepta ids numéricos e ignora campos extra', () => {
    expect(
      readCompanyEntries([
        { id: 7, fname: 'Acme', city: 'Pune' },
        { id: 'b-2', fname: 'Beta Tools' },
      ]),
    ).toEqual([
      { id: '7', fname: 'Acme' },
      { id: 'b-2', fname: 'Beta Tools' },
    ]);
  });

  it('rechaza lo que no es un array', () => {
    expect(() => readCompanyEntries({ id: 1 })).toThrow(InvalidInputException);
  });

  it('indica la entrada inválida', () => {
    expect(() => readCompanyEntries([{ id: '1', fname: 'Acme' }, null])).toThrow(
      'Entrada #2: se esperaba un objeto { id, fname }',
    );
    expect(() => readCompanyEntries([{ id: '1' }])).toThrow(/^Entrada #1: /);
  });
});

describe('formatSummary', () => {
  it('imprime el resumen del lote', () => {
    const rule = '='.repeat(50);
    expect(
      formatSummary({
        totalInput: 10,
        processedRange: '1-10',
        rangeCount: 10,
        skipped: 1,
        success: 6,
        partial: 2,
        failed: 1,
      }),
    ).toBe(
      [
        '',
        rule,
        'SCRAPING COMPLETE',
        rule,
        'Range:    1-10 (10 items)',
        'Success:  6',
        'Partial:  2',
        'Failed:   1',
        'Skipped:  1',
        rule,
      ].join('\n'),
    );
  });
});
