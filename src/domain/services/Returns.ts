import type { AlignedTable, TableRow } from '@/domain/models/MarketData';

/**
 * 対数収益率 ln(p_t / p_{t-1}) を列ごとに計算する。先頭行は落ちる。
 */
export function logReturns(table: AlignedTable): AlignedTable {
  const rows: TableRow[] = [];
  for (let i = 1; i < table.rows.length; i++) {
    const previous = table.rows[i - 1];
    const current = table.rows[i];
    if (!previous || !current) {
      continue;
    }
    rows.push({
      timestamp: current.timestamp,
      values: current.values.map((value, column) => Math.log(value / (previous.values[column] ?? Number.NaN))),
    });
  }
  return { symbols: table.symbols, rows };
}

/**
 * 単純収益率 exp(対数収益率) - 1。
 */
export function arithmeticReturns(table: AlignedTable): AlignedTable {
  const log = logReturns(table);
  return {
    symbols: log.symbols,
    rows: log.rows.map((row) => ({
      timestamp: row.timestamp,
      values: row.values.map((value) => Math.expm1(value)),
    })),
  };
}

/**
 * 列ごとの平均。行がなければ NaN。
 */
export function columnMeans(table: AlignedTable): Map<string, number> {
  const means = new Map<string, number>();
  table.symbols.forEach((symbol, column) => {
    let sum = 0;
    for (const row of table.rows) {
      sum += row.values[column] ?? Number.NaN;
    }
    means.set(symbol, table.rows.length > 0 ? sum / table.rows.length : Number.NaN);
  });
  return means;
}
