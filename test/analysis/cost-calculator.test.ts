import { expect } from 'chai';
import * as sinon from 'sinon';
import { CostCalculator } from '../../src/analysis/cost-calculator.js';
import { fixedEncoder, model } from '../helpers/stubs.js';

describe('CostCalculator', () => {
  it('should price 1000 tokens at the per-1000 rate of each model', () => {
    const encoder = fixedEncoder(1000);
    const cheap = new CostCalculator(model('cheap', 0.01), (text) => encoder.encode(text));
    const pricey = new CostCalculator(model('pricey', 0.02), (text) => encoder.encode(text));

    expect(cheap.calculateCost('some book text')).to.be.closeTo(0.01, 1e-12);
    expect(pricey.calculateCost('some book text')).to.be.closeTo(0.02, 1e-12);
  });

  it('should be linear in the token count', () => {
    const calculator = new CostCalculator(model('m', 0.03), () => []);
    expect(calculator.costForTokens(2000)).to.be.closeTo(calculator.costForTokens(1000) * 2, 1e-12);
    expect(calculator.costForTokens(0)).to.equal(0);
  });

  it('should never decrease as the token count grows', () => {
    const calculator = new CostCalculator(model('m', 0.0025), () => []);
    let previous = -1;
    for (const count of [0, 1, 10, 999, 1000, 123456]) {
      const cost = calculator.costForTokens(count);
      expect(cost).to.be.at.least(previous);
      previous = cost;
    }
  });

  it('should cost nothing for empty or blank text without encoding', () => {
    const encode = sinon.stub().returns([1, 2, 3]);
    const calculator = new CostCalculator(model('m', 5), encode);

    expect(calculator.calculateCost('')).to.equal(0);
    expect(calculator.calculateCost('   ')).to.equal(0);
    expect(encode.called).to.equal(false);
  });

  it('should pass the model to the encoder', () => {
    const pricing = model('m', 1, 'cl100k_base');
    const encode = sinon.stub().returns([1, 2]);
    new CostCalculator(pricing, encode).calculateCost('abc');

    expect(encode.calledOnceWithExactly('abc', pricing)).to.equal(true);
  });
});
