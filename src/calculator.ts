import { CalculatorConfig, SLIDER } from './config';
import { mapError, ValidationError } from './errors';
import { createSessionState, recompute } from './modules/session';
import { Logger, Result } from './types/common';
import {
  CalculatorView,
  Recomputation,
  SessionField,
  SessionState,
} from './types/session';
import { formatNumber } from './utils/format';
import { priceToSlider, sliderToPrice } from './utils/slider';
import { parseFieldInput } from './utils/validation';

/**
 * Main entry point for a calculator session.
 *
 * Owns the single mutable SessionState and applies the field-level edit
 * rules, so a presentation layer only forwards raw text and renders the
 * returned view. Rejected edits leave the session untouched.
 */
export class CpmmCalculator {
  readonly config: CalculatorConfig;

  private session: SessionState;
  private readonly logger?: Logger;

  constructor(config: CalculatorConfig = {}) {
    this.config = config;
    this.logger = config.logger;
    this.session = createSessionState(config.initial);

    this.logger?.info('CpmmCalculator: initialized', { ...this.session });
  }

  /**
   * Snapshot of the current inputs.
   */
  get state(): Readonly<SessionState> {
    return { ...this.session };
  }

  /**
   * Recompute every output from the current inputs.
   */
  recompute(): Recomputation {
    const recomputation = recompute(this.session);
    this.logger?.debug('CpmmCalculator: recomputed', {
      direction: recomputation.result.direction,
      priceDelta: recomputation.result.priceDelta,
    });
    return recomputation;
  }

  /**
   * Current outputs rendered for display.
   */
  view(): CalculatorView {
    return this.render(this.recompute());
  }

  /**
   * Apply raw input typed into one field.
   *
   * Price edits move the matching slider and slider edits move the
   * matching price; calibration edits move both sliders.
   */
  edit(field: SessionField, raw: string): Result<CalculatorView> {
    let next: SessionState;
    try {
      next = this.apply(field, parseFieldInput(field, raw));
    } catch (err) {
      const error = mapError(err);
      this.logger?.debug('CpmmCalculator: rejected edit', {
        field,
        raw,
        reason: error.message,
      });
      return { success: false, error: error.toJSON() };
    }

    const recomputation = recompute(next);
    this.session = next;
    this.logger?.debug('CpmmCalculator: applied edit', { field, raw });
    return { success: true, data: this.render(recomputation) };
  }

  /**
   * Restore the configured starting session.
   */
  reset(): CalculatorView {
    this.session = createSessionState(this.config.initial);
    this.logger?.debug('CpmmCalculator: reset', { ...this.session });
    return this.view();
  }

  private apply(field: SessionField, value: number): SessionState {
    const next = { ...this.session };

    switch (field) {
      case 'initialPriceSlider':
        next.initialPrice = this.priceFromSlider(field, value);
        break;
      case 'finalPriceSlider':
        next.finalPrice = this.priceFromSlider(field, value);
        break;
      default:
        next[field] = value;
    }

    return next;
  }

  private priceFromSlider(field: SessionField, value: number): number {
    const price = sliderToPrice(value, this.session.centerPrice, this.session.decades);
    if (!(price > 0) || !Number.isFinite(price)) {
      throw new ValidationError(`${field} maps outside the representable price range`, {
        field,
        value,
        price,
      });
    }
    return price;
  }

  private render(recomputation: Recomputation): CalculatorView {
    const { initial, final, result } = recomputation;
    const { centerPrice, decades } = this.session;

    return {
      recomputation,
      initialLiquidity: formatNumber(this.session.initialLiquidity),
      initialPrice: formatNumber(this.session.initialPrice),
      finalPrice: formatNumber(this.session.finalPrice),
      feePercent: formatNumber(this.session.feePercent),
      initialPriceSlider: priceToSlider(initial.price, centerPrice, decades),
      finalPriceSlider: priceToSlider(final.price, centerPrice, decades),
      sliderRange: SLIDER,
      initialBaseReserves: formatNumber(initial.baseReserves()),
      initialQuoteReserves: formatNumber(initial.quoteReserves()),
      finalBaseReserves: formatNumber(final.baseReserves()),
      finalQuoteReserves: formatNumber(final.quoteReserves()),
      priceDelta: formatNumber(result.priceDelta),
      baseWalletDelta: formatNumber(result.baseWalletDelta),
      quoteWalletDelta: formatNumber(result.quoteWalletDelta),
      baseFeeCollected: formatNumber(result.baseFeeCollected),
      quoteFeeCollected: formatNumber(result.quoteFeeCollected),
    };
  }
}
