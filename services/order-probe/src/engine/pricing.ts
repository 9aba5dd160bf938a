import type { OrderSide } from '../types';

/**
 * Round to the nearest multiple of the instrument's tick size.
 */
export function quantizePrice(price: number, tickSize: number): number {
  if (!(tickSize > 0)) {
    return price;
  }
  const steps = Math.round(price / tickSize);
  const decimals = Math.min(15, Math.max(0, 2 - Math.floor(Math.log10(tickSize))));
  return Number((steps * tickSize).toFixed(decimals));
}

/**
 * Signed offset (percent) for the opening quote: buys sit below the reference
 * price, sells above, so the order rests away from the touch.
 */
export function initialOffsetPercent(side: OrderSide, priceOffsetPercent: number): number {
  const magnitude = Math.abs(priceOffsetPercent);
  return side === 'buy' ? -magnitude : magnitude;
}

/**
 * Each edit moves the quote a further step away from the market.
 */
export function editedOffsetPercent(side: OrderSide, offsetPercent: number, stepPercent: number): number {
  const step = Math.abs(stepPercent);
  return side === 'buy' ? offsetPercent - step : offsetPercent + step;
}

export function priceAtOffset(referencePrice: number, offsetPercent: number, tickSize: number): number {
  return quantizePrice(referencePrice * (1 + offsetPercent / 100), tickSize);
}
