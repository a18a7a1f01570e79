import { SLIDER_CENTER } from '../config';

/**
 * Map a slider position to a price on a logarithmic axis.
 *
 * Position 0.5 maps to `centerPrice`; the sweep from 0 to 1 spans
 * `2 * decades` orders of magnitude. Positions outside [0, 1] extrapolate.
 */
export function sliderToPrice(
  sliderValue: number,
  centerPrice: number,
  decades: number,
): number {
  const exponent = (sliderValue - SLIDER_CENTER) * 2 * decades;
  return centerPrice * Math.pow(10, exponent);
}

/**
 * Inverse of sliderToPrice.
 *
 * Returns 0.5 when either price is not positive, since the log axis has no
 * position for it.
 */
export function priceToSlider(
  price: number,
  centerPrice: number,
  decades: number,
): number {
  if (price <= 0 || centerPrice <= 0) {
    return SLIDER_CENTER;
  }
  const exponent = Math.log10(price / centerPrice);
  return SLIDER_CENTER + exponent / (2 * decades);
}
