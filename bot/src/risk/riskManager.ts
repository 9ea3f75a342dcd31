import type { FilterConfig, RiskConfig } from '../config/env';
import type { FilterBand } from '../markets/candidateFilter';
import type { CategoryClass } from '../types';
import { Logger } from '../utils/logger';

export interface SizingInput {
  rawKelly: number;
  category: string;
  entryPrice: number;
  /** Collateral available for new positions, in USDC. */
  capital: number;
}

export interface StakeFraction {
  fraction: number;
  categoryClass: CategoryClass;
  reason: string | null;
}

export interface SizingDecision extends StakeFraction {
  stakeUsdc: number;
}

const round2 = (value: number) => Math.floor(value * 100) / 100;

/**
 * Turns a raw Kelly fraction into a stake. Pure: the same inputs always give
 * the same stake, and the result is never negative, never above
 * `maxStakeFraction` of capital and never above `maxStakeUsdc`.
 */
export class RiskManager {
  constructor(
    private readonly risk: RiskConfig,
    private readonly filter: FilterConfig
  ) {}

  public get defensive(): boolean {
    return this.risk.mode === 'DEFENSIVE';
  }

  public classify(category: string): CategoryClass {
    if (this.risk.highRiskCategories.includes(category)) return 'HIGH_RISK';
    if (this.risk.preferredCategories.includes(category)) return 'PREFERRED';
    return 'STANDARD';
  }

  /**
   * Filter thresholds in effect for the current mode. Defensive mode narrows
   * the price band on both sides and raises the liquidity floor.
   */
  public filterBand(): FilterBand {
    const base: FilterBand = {
      priceMin: this.filter.priceBandMin,
      priceMax: this.filter.priceBandMax,
      minDays: this.filter.resolutionMinDays,
      maxDays: this.filter.resolutionMaxDays,
      minLiquidity: this.filter.minBidLiquidity,
    };
    if (!this.defensive) return base;

    const margin = this.risk.defensiveBandMargin;
    const narrowed = {
      priceMin: base.priceMin + margin,
      priceMax: base.priceMax - margin,
    };
    // a band too narrow to tighten keeps its normal bounds
    const band = narrowed.priceMin <= narrowed.priceMax ? narrowed : { priceMin: base.priceMin, priceMax: base.priceMax };

    return {
      ...base,
      ...band,
      minLiquidity: base.minLiquidity * this.risk.defensiveLiquidityFactor,
    };
  }

  /** Fraction of capital to stake, in [0, maxStakeFraction]. */
  public stakeFraction(rawKelly: number, category: string, entryPrice: number): StakeFraction {
    const categoryClass = this.classify(category);

    if (!Number.isFinite(rawKelly) || rawKelly <= 0) {
      return { fraction: 0, categoryClass, reason: `non-positive kelly ${rawKelly}` };
    }
    if (!Number.isFinite(entryPrice) || entryPrice <= 0 || entryPrice >= 1) {
      return { fraction: 0, categoryClass, reason: `invalid entry price ${entryPrice}` };
    }

    if (categoryClass === 'HIGH_RISK') {
      const band = this.filterBand();
      const midpoint = (band.priceMin + band.priceMax) / 2;
      if (entryPrice > midpoint) {
        return {
          fraction: 0,
          categoryClass,
          reason: `high-risk entry ${entryPrice} above band midpoint ${midpoint.toFixed(3)}`,
        };
      }
    }

    let fraction = rawKelly * this.risk.multipliers[categoryClass];
    if (this.defensive) fraction *= this.risk.defensiveMultiplier;

    fraction = Math.max(0, Math.min(this.risk.maxStakeFraction, fraction));
    return { fraction, categoryClass, reason: null };
  }

  public size(input: SizingInput): SizingDecision {
    const stake = this.stakeFraction(input.rawKelly, input.category, input.entryPrice);
    if (stake.fraction === 0) return { ...stake, stakeUsdc: 0 };

    if (!Number.isFinite(input.capital) || input.capital <= 0) {
      return { ...stake, fraction: 0, stakeUsdc: 0, reason: `no capital (${input.capital})` };
    }

    const stakeUsdc = round2(Math.min(input.capital * stake.fraction, this.risk.maxStakeUsdc));
    if (stakeUsdc < this.risk.minStakeUsdc) {
      return {
        ...stake,
        fraction: 0,
        stakeUsdc: 0,
        reason: `stake ${stakeUsdc} below minimum ${this.risk.minStakeUsdc}`,
      };
    }

    Logger.debug(
      `[RISK] ${stake.categoryClass} kelly=${input.rawKelly.toFixed(3)} fraction=${stake.fraction.toFixed(3)} stake=${stakeUsdc}`
    );
    return { ...stake, stakeUsdc };
  }
}
