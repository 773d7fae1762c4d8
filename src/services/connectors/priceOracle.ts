/**
 * Price Oracle
 * Values a connector's native balance in the pool's asset when they differ
 */

import {
  add,
  mul,
  mulDivRaw,
  ONE,
  UFIX64_SCALE,
  ZERO,
  type UFix64,
} from "../../utils/ufix64.js";

export interface PriceOracle {
  /** Units of the pool asset per unit of `ofAsset`, or null when unknown */
  price(ofAsset: string): UFix64 | null;
}

export class StaticPriceOracle implements PriceOracle {
  private readonly prices = new Map<string, UFix64>();

  constructor(prices: Record<string, UFix64> = {}) {
    for (const [asset, price] of Object.entries(prices)) {
      this.prices.set(asset, price);
    }
  }

  setPrice(asset: string, price: UFix64): void {
    this.prices.set(asset, price);
  }

  price(ofAsset: string): UFix64 | null {
    return this.prices.get(ofAsset) ?? null;
  }
}

/**
 * Pool-asset units per unit of `assetId`: ONE for the pool's own asset, null
 * for a foreign asset without a usable quote
 */
export function conversionRate(
  assetId: string,
  poolAssetId: string,
  oracle: PriceOracle | null,
): UFix64 | null {
  if (assetId === poolAssetId) {
    return ONE;
  }
  const rate = oracle?.price(assetId) ?? null;
  return rate === null || rate === ZERO ? null : rate;
}

/**
 * Value `amount` of `assetId` in the pool's asset. Without an oracle, or
 * without a quote, a foreign balance is worth nothing to the pool.
 */
export function valueInPoolAsset(
  amount: UFix64,
  assetId: string,
  poolAssetId: string,
  oracle: PriceOracle | null,
): UFix64 {
  const rate = conversionRate(assetId, poolAssetId, oracle);
  return rate === null ? ZERO : mul(amount, rate);
}

/**
 * Native units worth `value` of the pool asset at `rate`. Rounded up, the
 * result is the fewest units whose value covers `value`.
 */
export function nativeUnitsFor(value: UFix64, rate: UFix64, roundUp = false): UFix64 {
  const units = mulDivRaw(value, UFIX64_SCALE, rate);
  return roundUp && mul(units, rate) < value ? add(units, 1n) : units;
}
