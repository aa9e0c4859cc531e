import { expect } from 'chai';
import * as sinon from 'sinon';
import { EncodingError } from '../../src/analysis/errors.js';
import {
  RegexWordTokenizer,
  TokenizerAdapter,
  loadTiktokenEncoder,
} from '../../src/analysis/tokenizer.js';
import { model, whitespaceEncoder } from '../helpers/stubs.js';

describe('RegexWordTokenizer', () => {
  const tokenizer = new RegexWordTokenizer();

  it('should split punctuation into separate tokens', () => {
    expect(tokenizer.tokenize('Hello, world!')).to.deep.equal(['Hello', ',', 'world', '!']);
  });

  it('should keep inner apostrophes inside a word', () => {
    expect(tokenizer.tokenize("don't stop l’homme")).to.deep.equal(["don't", 'stop', 'l’homme']);
  });

  it('should handle accented letters and digits', () => {
    expect(tokenizer.tokenize('Café 42 au lait')).to.deep.equal(['Café', '42', 'au', 'lait']);
  });

  it('should emit each character of an ellipsis', () => {
    expect(tokenizer.tokenize('wait...')).to.deep.equal(['wait', '.', '.', '.']);
  });

  it('should return an empty array for blank text', () => {
    expect(tokenizer.tokenize('')).to.deep.equal([]);
    expect(tokenizer.tokenize(' \n\t ')).to.deep.equal([]);
  });

  it('should be deterministic', () => {
    const text = 'The cat, the dog; the end.';
    expect(tokenizer.tokenize(text)).to.deep.equal(tokenizer.tokenize(text));
  });
});

describe('TokenizerAdapter', () => {
  afterEach(() => {
    sinon.restore();
  });

  it('should load one encoder per distinct encoding', () => {
    const loader = sinon.stub().returns(whitespaceEncoder);
    const adapter = new TokenizerAdapter(new RegexWordTokenizer(), loader);

    adapter.prepare([model('a', 1), model('b', 2), model('c', 3, 'cl100k_base')]);
    adapter.prepare([model('a', 1)]);

    expect(loader.callCount).to.equal(2);
    expect(loader.firstCall.args[0]).to.equal('o200k_base');
    expect(loader.secondCall.args[0]).to.equal('cl100k_base');
  });

  it('should encode with the model encoder', () => {
    const adapter = new TokenizerAdapter(new RegexWordTokenizer(), () => whitespaceEncoder);
    expect(adapter.encodeTokens('one two three', model('a', 1))).to.deep.equal([0, 1, 2]);
  });

  it('should tokenize words with the word tokenizer', () => {
    const adapter = new TokenizerAdapter(new RegexWordTokenizer(), () => whitespaceEncoder);
    expect(adapter.tokenizeWords('the cat sat')).to.deep.equal(['the', 'cat', 'sat']);
  });

  it('should wrap encoder load failures in EncodingError', () => {
    const adapter = new TokenizerAdapter(new RegexWordTokenizer(), () => {
      throw new Error('missing ranks');
    });

    expect(() => adapter.prepare([model('a', 1, 'p50k_base')]))
      .to.throw(EncodingError, 'Encoding "p50k_base" failed: missing ranks')
      .with.property('encoding', 'p50k_base');
  });

  it('should wrap encode failures in EncodingError', () => {
    const adapter = new TokenizerAdapter(new RegexWordTokenizer(), () => ({
      encode: () => {
        throw new Error('special token');
      },
    }));

    expect(() => adapter.encodeTokens('text', model('a', 1))).to.throw(EncodingError, 'special token');
  });

  it('should load real encoders through create', () => {
    const gpt4 = model('gpt-4', 0.03, 'cl100k_base');
    const adapter = TokenizerAdapter.create([gpt4]);
    expect(adapter.encodeTokens('hello world', gpt4)).to.deep.equal([15339, 1917]);
  });
});

describe('loadTiktokenEncoder', () => {
  it('should encode empty text to no tokens', () => {
    expect(loadTiktokenEncoder('cl100k_base').encode('')).to.deep.equal([]);
  });
});
