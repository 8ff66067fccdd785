import {
  NormalizedReturns,
  ReturnMatrix,
  ReturnSeries,
  ReturnTable,
  ReturnsInput,
  RiskMetricsError,
  RiskMetricsErrorCode
} from '../types';

function invalid(message: string, details?: Record<string, unknown>): RiskMetricsError {
  return new RiskMetricsError(RiskMetricsErrorCode.INVALID_PARAMETER, message, details);
}

function isReturnSeries(input: ReturnSeries | ReturnMatrix): input is ReturnSeries {
  return typeof input[0] === 'number';
}

function positionalColumns(count: number): string[] {
  return Array.from({ length: count }, (_, index) => String(index));
}

/**
 * Transpose time-major rows into column-major series, checking that every row
 * has `width` finite numbers.
 */
function toColumns(rows: readonly unknown[], width: number): number[][] {
  const series: number[][] = Array.from({ length: width }, () => []);

  rows.forEach((row, t) => {
    if (!Array.isArray(row) || row.length !== width) {
      throw invalid(`Row ${t} has ${Array.isArray(row) ? row.length : 'no'} values, expected ${width}`, {
        row: t
      });
    }
    row.forEach((value: unknown, c) => {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw invalid(`Non-finite return at row ${t}, column ${c}`, { row: t, column: c });
      }
      series[c].push(value);
    });
  });

  return series;
}

function normalizeSeries(input: ReturnSeries): NormalizedReturns {
  input.forEach((value: unknown, t) => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw invalid(`Non-finite return at index ${t}`, { row: t });
    }
  });

  return { columns: ['0'], series: [[...input]], observations: input.length };
}

function normalizeTable(input: ReturnTable): NormalizedReturns {
  const { columns, rows } = input;
  if (columns.length === 0) {
    throw invalid('Return table has no columns');
  }
  if (new Set(columns).size !== columns.length) {
    throw invalid('Return table has duplicate column names', { columns });
  }
  if (rows.length === 0) {
    throw invalid('Return table has no observations');
  }

  return { columns: [...columns], series: toColumns(rows, columns.length), observations: rows.length };
}

/**
 * Bring any accepted return shape into the canonical column-major form.
 * A bare series becomes a single column named "0"; unlabelled matrices get
 * positional column names.
 */
export function normalizeReturns(input: ReturnsInput): NormalizedReturns {
  if (!Array.isArray(input)) {
    return normalizeTable(input);
  }
  if (input.length === 0) {
    throw invalid('Return series is empty');
  }
  if (isReturnSeries(input)) {
    return normalizeSeries(input);
  }

  const first: unknown = input[0];
  const width = Array.isArray(first) ? first.length : 0;
  if (width === 0) {
    throw invalid('Return matrix has no columns');
  }

  return { columns: positionalColumns(width), series: toColumns(input, width), observations: input.length };
}
