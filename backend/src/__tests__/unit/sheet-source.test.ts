import { parseCsv, parseCsvRecords } from '../../utils/csv';
import { CsvSheetSource, EmptySheetSource, parseSheetCsv, sheetCsvUrl } from '../../ingestion/sheet-source';
import { fakeFetch } from '../helpers/fakes';

describe('parseCsv', () => {
  it('handles quotes, doubled quotes, CRLF, a BOM and blank rows', () => {
    const text = '\uFEFFa,b\r\n"x, y","he said ""hi"""\n\n1,2\n';
    expect(parseCsv(text)).toEqual([
      ['a', 'b'],
      ['x, y', 'he said "hi"'],
      ['1', '2'],
    ]);
  });

  it('keeps line breaks inside quoted fields', () => {
    expect(parseCsv('"line one\nline two",x')).toEqual([['line one\nline two', 'x']]);
  });
});

describe('parseCsvRecords', () => {
  it('keys rows by normalized headers and fills missing cells', () => {
    const text = ' Headline ,LINK,Date\nStory, https://x.test ,2024-05-03\nShort';
    expect(parseCsvRecords(text)).toEqual([
      { headline: 'Story', link: 'https://x.test', date: '2024-05-03' },
      { headline: 'Short', link: '', date: '' },
    ]);
  });

  it('returns nothing for empty input', () => {
    expect(parseCsvRecords('')).toEqual([]);
  });
});

describe('parseSheetCsv', () => {
  it('fills every sheet column and drops unknown ones', () => {
    expect(parseSheetCsv('headline,link,extra\nA,https://a.test,zzz')).toEqual([
      {
        headline: 'A',
        news: '',
        summary: '',
        categories: '',
        category: '',
        link: 'https://a.test',
        image_url: '',
        date: '',
      },
    ]);
  });
});

describe('sheetCsvUrl', () => {
  it('builds the CSV export URL', () => {
    expect(sheetCsvUrl('abc 1')).toBe('https://docs.google.com/spreadsheets/d/abc%201/export?format=csv&gid=0');
    expect(sheetCsvUrl('abc', '42')).toBe('https://docs.google.com/spreadsheets/d/abc/export?format=csv&gid=42');
  });
});

describe('CsvSheetSource', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('fetches and parses the export', async () => {
    const url = 'https://sheet.test/export.csv';
    const fetchImpl = fakeFetch({
      [url]: { body: 'Headline,News,Link\nProbe launched,It flew.,https://a.test', contentType: 'text/csv' },
    });
    const rows = await new CsvSheetSource(url, { fetchImpl }).fetchRows();

    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ headline: 'Probe launched', news: 'It flew.', link: 'https://a.test' });
  });

  it('yields no rows when the export cannot be fetched', async () => {
    const fetchImpl = fakeFetch({ 'https://sheet.test/down.csv': new Error('ENOTFOUND') });

    expect(await new CsvSheetSource('https://sheet.test/missing.csv', { fetchImpl }).fetchRows()).toEqual([]);
    expect(await new CsvSheetSource('https://sheet.test/down.csv', { fetchImpl }).fetchRows()).toEqual([]);
    expect(errorSpy).toHaveBeenCalledTimes(2);
  });

  it('has an empty stand-in', async () => {
    expect(await new EmptySheetSource().fetchRows()).toEqual([]);
  });
});
