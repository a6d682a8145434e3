// pattern: Functional Core

/**
 * Markdown report primitives shared by every tool handler.
 * Handlers pick which fields to surface; this module only fixes how headings, fields and tables look.
 */

export type HeadingLevel = 1 | 2 | 3 | 4;

export type FieldValue = string | number | boolean;

export type ReportBuilder = {
  heading(level: HeadingLevel, text: string): ReportBuilder;
  field(label: string, value: FieldValue): ReportBuilder;
  optionalField(label: string, value: FieldValue | undefined): ReportBuilder;
  bullet(text: string): ReportBuilder;
  nestedList(label: string, items: ReadonlyArray<string>): ReportBuilder;
  numbered(items: ReadonlyArray<string>): ReportBuilder;
  table(headers: ReadonlyArray<string>, rows: ReadonlyArray<ReadonlyArray<string>>): ReportBuilder;
  code(text: string, language?: string): ReportBuilder;
  paragraph(text: string): ReportBuilder;
  toString(): string;
};

const RFC3339 =
  /^((\d{4})-(\d{2})-(\d{2}))[Tt]((\d{2}):(\d{2}):(\d{2}))(?:\.\d+)?(?:[Zz]|[+-](\d{2}):(\d{2}))$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return month === 2 && leap ? 29 : (DAYS_IN_MONTH[month - 1] ?? 0);
}

function inRange(value: string | undefined, min: number, max: number): boolean {
  const n = Number(value ?? '0');
  return n >= min && n <= max;
}

/**
 * Render an RFC3339 timestamp as `YYYY-MM-DD HH:MM:SS`, keeping the wall-clock time as written.
 * Values that do not parse, including out-of-range fields such as Feb 30 or hour 24, are returned unchanged.
 */
export function formatTimestamp(value: string): string {
  const match = RFC3339.exec(value);
  if (!match) {
    return value;
  }

  const [, date, year, month, day, time, hour, minute, second, offsetHour, offsetMinute] = match;
  const valid =
    inRange(month, 1, 12) &&
    inRange(day, 1, daysInMonth(Number(year), Number(month))) &&
    inRange(hour, 0, 23) &&
    inRange(minute, 0, 59) &&
    inRange(second, 0, 59) &&
    inRange(offsetHour, 0, 23) &&
    inRange(offsetMinute, 0, 59);

  return valid && date !== undefined && time !== undefined ? `${date} ${time}` : value;
}

export function enabledLabel(enabled: boolean): string {
  return enabled ? 'Enabled' : 'Disabled';
}

export function yesNo(flag: boolean): string {
  return flag ? 'Yes' : 'No';
}

function tableRow(cells: ReadonlyArray<string>): string {
  return `| ${cells.join(' | ')} |`;
}

export function createReportBuilder(): ReportBuilder {
  const lines: Array<string> = [];

  function separate(): void {
    if (lines.length > 0 && lines[lines.length - 1] !== '') {
      lines.push('');
    }
  }

  const builder: ReportBuilder = {
    heading(level, text) {
      separate();
      lines.push(`${'#'.repeat(level)} ${text}`, '');
      return builder;
    },

    field(label, value) {
      lines.push(`- **${label}**: ${String(value)}`);
      return builder;
    },

    optionalField(label, value) {
      if (value === undefined || value === '') {
        return builder;
      }
      return builder.field(label, value);
    },

    bullet(text) {
      lines.push(`- ${text}`);
      return builder;
    },

    nestedList(label, items) {
      if (items.length === 0) {
        return builder;
      }
      lines.push(`- **${label}**:`, ...items.map((item) => `  - ${item}`));
      return builder;
    },

    numbered(items) {
      lines.push(...items.map((item, i) => `${i + 1}. ${item}`));
      return builder;
    },

    table(headers, rows) {
      lines.push(
        tableRow(headers),
        tableRow(headers.map(() => '---')),
        ...rows.map((row) => tableRow(row)),
      );
      return builder;
    },

    code(text, language = '') {
      lines.push('```' + language, text, '```');
      return builder;
    },

    paragraph(text) {
      separate();
      lines.push(text, '');
      return builder;
    },

    toString() {
      let end = lines.length;
      while (end > 0 && lines[end - 1] === '') {
        end--;
      }
      return lines.slice(0, end).join('\n');
    },
  };

  return builder;
}
