import { describe, expect, it } from 'vitest';
import { renderMarkdownTable } from '../markdown-table.js';

describe('renderMarkdownTable', () => {
  it('renders a header, separator and one line per row', () => {
    const rendered = renderMarkdownTable({
      columns: ['Source', 'Points'],
      rows: [
        ['Google Trends', 240],
        ['Crossref', 888],
      ],
    });

    expect(rendered).toBe(
      ['| Source | Points |', '| --- | --- |', '| Google Trends | 240 |', '| Crossref | 888 |'].join('\n'),
    );
  });

  it('puts a bold title above the table', () => {
    const rendered = renderMarkdownTable({ title: 'Peaks', columns: ['Year'], rows: [[2004]] });
    expect(rendered.split('\n')).toEqual(['**Peaks**', '', '| Year |', '| --- |', '| 2004 |']);
  });

  it('escapes pipes and backslashes and flattens newlines', () => {
    const rendered = renderMarkdownTable({ columns: ['Note'], rows: [['a|b\\c\nnext line']] });
    expect(rendered.split('\n')[2]).toBe('| a\\|b\\\\c next line |');
  });

  it('pads short rows, drops extra cells and renders null as empty', () => {
    const rendered = renderMarkdownTable({
      columns: ['A', 'B', 'C'],
      rows: [['x', 1], ['y', null, 'z', 'extra']],
    });
    const lines = rendered.split('\n');
    expect(lines[2]).toBe('| x | 1 |  |');
    expect(lines[3]).toBe('| y |  | z |');
  });

  it('returns an empty string when there are no columns', () => {
    expect(renderMarkdownTable({ columns: [], rows: [['orphan']] })).toBe('');
  });
});
