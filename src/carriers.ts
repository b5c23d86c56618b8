import fs from 'node:fs';
import * as fastcsv from 'fast-csv';
import type { Carrier } from './types';

const NAME_COLUMNS = ['name', 'Top Fleet Company Name', 'Company'];
const WEBSITE_COLUMNS = ['website', 'Top Fleet Website', 'Website'];

function pick(row: Record<string, string>, columns: readonly string[]): string {
  for (const column of columns) {
    const value = row[column];
    if (value !== undefined && value.trim() !== '') return value.trim();
  }
  return '';
}

/**
 * Normalizes a website cell: first of several comma-separated values, https:// added
 * when there is no scheme, trailing slashes removed. Empty cells and 'nan' become ''.
 */
export function cleanWebsite(raw: string): string {
  let url = raw.trim();
  if (url === '' || url.toLowerCase() === 'nan') return '';
  url = url.split(',')[0].trim();
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) url = `https://${url}`;
  return url.replace(/\/+$/, '');
}

/**
 * Reads the carrier list from a CSV file with a header row.
 * Accepts `name`/`website` columns or the fleet-list export headings.
 * Rows without a name or a usable website are dropped.
 * @param csvPath - Path to the CSV file.
 */
export function loadCarriers(csvPath: string): Promise<Carrier[]> {
  return new Promise((resolve, reject) => {
    const carriers: Carrier[] = [];
    fs.createReadStream(csvPath)
      .on('error', reject)
      .pipe(fastcsv.parse({ headers: true }))
      .on('error', reject)
      .on('data', (row: Record<string, string>) => {
        const name = pick(row, NAME_COLUMNS);
        const website = cleanWebsite(pick(row, WEBSITE_COLUMNS));
        if (name && website) carriers.push({ name, website });
      })
      .on('end', () => resolve(carriers));
  });
}
