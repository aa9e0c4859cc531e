import type { PricingModel } from './tokenizer.js';

/**
 * Estimates what a text costs to process under a single pricing model
 */
export class CostCalculator {
  constructor(
    private model: PricingModel,
    private encode: (text: string, model: PricingModel) => number[]
  ) {}

  /**
   * Calculates the cost of a text from its encoded token count
   * @param text - The text to price
   * @returns The estimated cost in the pricing model's currency
   */
  public calculateCost(text: string): number {
    if (text.trim().length === 0) {
      return 0;
    }
    return this.costForTokens(this.encode(text, this.model).length);
  }

  public costForTokens(tokenCount: number): number {
    return (tokenCount / 1000) * this.model.pricePer1000;
  }
}
