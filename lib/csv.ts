import type { RawRow } from './batch';

/**
 * Parse CSV text into rows of fields. Handles quoted fields (with embedded commas,
 * doubled quotes and newlines), CRLF or LF line endings, and skips blank lines.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  const endRow = () => {
    row.push(field);
    field = '';
    if (row.length > 1 || row[0] !== '') rows.push(row);
    row = [];
  };

  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  for (let i = 0; i < src.length; i++) {
    const ch = src[i];
    if (inQuotes) {
      if (ch === '"') {
        if (src[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n') {
      endRow();
    } else if (ch === '\r') {
      if (src[i + 1] === '\n') i++;
      endRow();
    } else {
      field += ch;
    }
  }
  if (field !== '' || row.length > 0) endRow();

  return rows;
}

const REQUIRED_COLUMNS = ['ip_address', 'device_hostname'] as const;

/**
 * Turn a parsed table whose first row is the header into input rows.
 * `domain_name` is accepted as an alias of `domain`.
 */
export function tableToRows(table: readonly string[][]): RawRow[] {
  if (table.length === 0) return [];

  const header = table[0].map((h) => h.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length > 0) {
    throw new Error(`CSV header is missing required column(s): ${missing.join(', ')}`);
  }

  const column = (name: string) => header.indexOf(name);
  const ipCol = column('ip_address');
  const hostCol = column('device_hostname');
  const ifCol = column('interface_name');
  const domainCol = column('domain') >= 0 ? column('domain') : column('domain_name');

  return table.slice(1).map((cells) => {
    const row: RawRow = {
      ip_address: cells[ipCol] ?? '',
      device_hostname: cells[hostCol] ?? '',
    };
    if (ifCol >= 0) row.interface_name = cells[ifCol] ?? '';
    if (domainCol >= 0) row.domain = cells[domainCol] ?? '';
    return row;
  });
}
