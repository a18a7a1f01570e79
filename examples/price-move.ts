/**
 * Price Move Example
 *
 * Walks one calculator session through the edits a form would forward:
 * a price typed by hand, a slider drag, a fee change and a rejected
 * liquidity entry.
 */

import { CpmmCalculator } from '../src/calculator';
import { Logger } from '../src/types/common';
import { CalculatorView } from '../src/types/session';

const logger: Logger = {
  debug: (msg, data) => console.debug(msg, data ?? ''),
  info: (msg, data) => console.info(msg, data ?? ''),
  error: (msg, err) => console.error(msg, err ?? ''),
};

function print(label: string, view: CalculatorView): void {
  console.log(`\n${label}`);
  console.log(`  price ${view.initialPrice} -> ${view.finalPrice} (delta ${view.priceDelta})`);
  console.log(`  reserves before: ${view.initialBaseReserves} base / ${view.initialQuoteReserves} quote`);
  console.log(`  reserves after:  ${view.finalBaseReserves} base / ${view.finalQuoteReserves} quote`);
  console.log(`  wallet: ${view.baseWalletDelta} base, ${view.quoteWalletDelta} quote`);
  console.log(`  fees:   ${view.baseFeeCollected} base, ${view.quoteFeeCollected} quote`);
  console.log(`  sliders: ${view.initialPriceSlider.toFixed(3)} / ${view.finalPriceSlider.toFixed(3)}`);
}

function main(): void {
  const calculator = new CpmmCalculator({ logger });
  print('Defaults', calculator.view());

  const edits: Array<[Parameters<CpmmCalculator['edit']>[0], string]> = [
    ['finalPrice', '1.21'],
    ['finalPriceSlider', '0.4'],
    ['feePercent', '1'],
    ['initialLiquidity', '-5'],
  ];

  for (const [field, raw] of edits) {
    const result = calculator.edit(field, raw);
    if (result.success && result.data) {
      print(`${field} = ${raw}`, result.data);
    } else {
      console.log(`\n${field} = ${raw} rejected: ${result.error?.message}`);
    }
  }
}

main();
