import { parseSortBy } from './sort-by.util';

describe('parseSortBy', () => {
  it('should parse ascending fields', () => {
    expect(parseSortBy('from_date')).toEqual({
      field: 'fromDate',
      direction: 'ASC',
    });
    expect(parseSortBy('date_of_request')).toEqual({
      field: 'dateOfRequest',
      direction: 'ASC',
    });
  });

  it('should treat a leading dash as descending', () => {
    expect(parseSortBy('-from_date')).toEqual({
      field: 'fromDate',
      direction: 'DESC',
    });
  });

  it('should ignore missing and unknown fields', () => {
    expect(parseSortBy()).toBeNull();
    expect(parseSortBy('')).toBeNull();
    expect(parseSortBy('-purpose')).toBeNull();
    expect(parseSortBy('constructor')).toBeNull();
  });
});
