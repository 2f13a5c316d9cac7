import type { PriceSeries, PriceTable, TableRow } from '@/domain/models/MarketData';

/**
 * 複数の時系列をタイムスタンプで内部結合する。
 *
 * - 列の順序は引数の順序
 * - どれか 1 つでも値を持たないタイムスタンプの行は捨てる
 * - 行はタイムスタンプ昇順
 */
export function alignSeries(seriesList: readonly PriceSeries[]): PriceTable {
  const symbols = seriesList.map((series) => series.symbol);
  const lookups = seriesList.map(
    (series) => new Map(series.points.map((point) => [point.timestamp.getTime(), point.value]))
  );

  const rows: TableRow[] = [];
  const [first, ...rest] = lookups;
  if (first) {
    for (const [time, firstValue] of first) {
      const values = [firstValue];
      for (const lookup of rest) {
        const value = lookup.get(time);
        if (value === undefined) {
          break;
        }
        values.push(value);
      }
      if (values.length === lookups.length) {
        rows.push({ timestamp: new Date(time), values });
      }
    }
  }
  rows.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  return {
    symbols,
    rows,
    series: new Map(seriesList.map((series) => [series.symbol, series])),
  };
}
