import type { AssetClass } from '@/domain/models/MarketData';

/**
 * プロバイダが暗号資産として扱うシンボル。
 * これ以外はすべて株式として扱う（外部への問い合わせはしない）。
 */
export const CRYPTO_SYMBOLS: readonly string[] = [
  'BTC',
  'ETH',
  'DOGE',
  'AVAX',
  'SHIB',
  'LINK',
  'BCH',
  'LTC',
  'ETC',
  'AAVE',
];

const cryptoSymbolSet = new Set(CRYPTO_SYMBOLS);

/**
 * シンボルから資産クラスを判定する（完全一致）。
 * @param symbol ティッカーシンボル
 */
export function classifyAsset(symbol: string): AssetClass {
  return cryptoSymbolSet.has(symbol) ? 'crypto' : 'equity';
}
