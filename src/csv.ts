export type CsvRecord = Record<string, string>;

export interface CsvTable {
  columns: string[];
  records: CsvRecord[];
}

export class CsvSyntaxError extends Error {
  constructor(message: string, public line: number) {
    super(`${message} (line ${line})`);
    this.name = 'CsvSyntaxError';
  }
}

interface RawRow {
  line: number;
  cells: string[];
}

function splitRows(text: string): RawRow[] {
  const rows: RawRow[] = [];
  let cells: string[] = [];
  let field = '';
  let quoted = false;
  let line = 1;
  let rowLine = 1;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      if (field.length > 0) throw new CsvSyntaxError('Unexpected quote inside unquoted field', line);
      quoted = true;
    } else if (ch === ',') {
      cells.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      cells.push(field);
      rows.push({ line: rowLine, cells });
      cells = [];
      field = '';
      line++;
      rowLine = line;
    } else {
      field += ch;
    }
  }

  if (quoted) throw new CsvSyntaxError('Unterminated quoted field', rowLine);
  if (field.length > 0 || cells.length > 0) {
    cells.push(field);
    rows.push({ line: rowLine, cells });
  }
  // blank lines carry no record
  return rows.filter((row) => !(row.cells.length === 1 && row.cells[0] === ''));
}

/**
 * Parses CSV text whose first row names the columns. Each following row
 * becomes a record keyed by those names; missing trailing cells are ''.
 */
export function parseCsv(text: string): CsvTable {
  const rows = splitRows(text.startsWith('\uFEFF') ? text.slice(1) : text);
  if (rows.length === 0) return { columns: [], records: [] };

  const columns = rows[0].cells.map((name) => name.trim());
  const records = rows.slice(1).map(({ line, cells }) => {
    if (cells.length > columns.length) {
      throw new CsvSyntaxError(`Expected ${columns.length} fields, found ${cells.length}`, line);
    }
    const record: CsvRecord = {};
    columns.forEach((name, index) => {
      record[name] = cells[index] ?? '';
    });
    return record;
  });
  return { columns, records };
}

export function missingColumns(table: CsvTable, required: readonly string[]): string[] {
  return required.filter((column) => !table.columns.includes(column));
}
