import { expect, test } from '@playwright/test';
import { generateTitles, ordinal } from '../../../src/scrapers/ballotpedia';

test.describe('Ballotpedia title generation', () => {
  test('ordinal should use the right English suffix', () => {
    const cases: Array<[string, string]> = [
      ['1', '1st'],
      ['2', '2nd'],
      ['3', '3rd'],
      ['4', '4th'],
      ['11', '11th'],
      ['12', '12th'],
      ['13', '13th'],
      ['21', '21st'],
      ['22', '22nd'],
      ['111', '111th'],
      ['at-large', 'at-large'],
    ];
    for (const [input, expected] of cases) {
      expect(ordinal(input)).toBe(expected);
    }
  });

  test('Senate titles should come in both phrasings', () => {
    expect(generateTitles('California', 'SENATE', 2024)).toEqual([
      '2024 United States Senate election in California',
      'United States Senate election in California, 2024',
      '2024 elections in California',
    ]);
  });

  test('Governor titles should use the gubernatorial phrasing', () => {
    expect(generateTitles('North Carolina', 'GOVERNOR', 2024)).toEqual([
      'North Carolina gubernatorial election, 2024',
      '2024 North Carolina gubernatorial election',
      '2024 elections in North Carolina',
    ]);
  });

  test('House titles should name the district when one is given', () => {
    expect(generateTitles('Pennsylvania', 'HOUSE', 2024, '7')).toEqual([
      "2024 United States House of Representatives election in Pennsylvania's 7th congressional district",
      '2024 United States House of Representatives elections in Pennsylvania',
      '2024 elections in Pennsylvania',
    ]);
    expect(generateTitles('Pennsylvania', 'HOUSE', 2024)).toEqual([
      '2024 United States House of Representatives elections in Pennsylvania',
      '2024 elections in Pennsylvania',
    ]);
  });

  test('President and unknown offices should still end with the state page', () => {
    expect(generateTitles('Ohio', 'PRESIDENT', 2024)).toEqual([
      'United States presidential election, 2024',
      '2024 elections in Ohio',
    ]);
    expect(generateTitles('Texas', 'MAYOR', 2025)).toEqual(['2025 elections in Texas']);
  });

  test('office matching should ignore case', () => {
    expect(generateTitles('Ohio', 'senate', 2024)[0]).toBe('2024 United States Senate election in Ohio');
  });
});
