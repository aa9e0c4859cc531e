import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import { EncodingError } from './errors.js';

/**
 * A named pricing tier and the subword vocabulary its tokens are counted with
 */
export interface PricingModel {
  readonly name: string;
  readonly pricePer1000: number;
  readonly encoding: TiktokenEncoding;
}

/**
 * Splits text into human-readable word tokens
 */
export interface WordTokenizer {
  tokenize(text: string): string[];
}

/**
 * Encodes text into model-specific token ids
 */
export interface TokenEncoder {
  encode(text: string): number[];
}

export type EncoderLoader = (encoding: TiktokenEncoding) => TokenEncoder;

// Letter/digit runs with inner apostrophes, or any single other non-space character
const WORD_PATTERN = /[\p{L}\p{N}_]+(?:['’][\p{L}\p{N}_]+)*|[^\p{L}\p{N}_\s]/gu;

/**
 * Word tokenizer that keeps punctuation marks as tokens of their own
 */
export class RegexWordTokenizer implements WordTokenizer {
  public tokenize(text: string): string[] {
    return text.match(WORD_PATTERN) ?? [];
  }
}

/**
 * Loads a js-tiktoken encoder for the given encoding name
 * @param encoding - The BPE vocabulary to load
 * @returns The encoder
 */
export function loadTiktokenEncoder(encoding: TiktokenEncoding): TokenEncoder {
  const tiktoken: Tiktoken = getEncoding(encoding);
  return {
    encode: (text: string) => tiktoken.encode(text),
  };
}

/**
 * Word tokenization plus per-model subword encoding.
 *
 * Encoders are loaded once per encoding name and reused, so models that share a
 * vocabulary share an encoder. Every failure surfaces as an {@link EncodingError}.
 */
export class TokenizerAdapter {
  private encoders = new Map<TiktokenEncoding, TokenEncoder>();

  constructor(
    private wordTokenizer: WordTokenizer = new RegexWordTokenizer(),
    private loadEncoder: EncoderLoader = loadTiktokenEncoder
  ) {}

  /**
   * Creates an adapter with every encoder the models need already loaded
   * @param models - The configured pricing models
   * @param wordTokenizer - Optional word tokenizer override
   * @returns The ready adapter
   */
  public static create(
    models: readonly PricingModel[],
    wordTokenizer?: WordTokenizer
  ): TokenizerAdapter {
    const adapter = new TokenizerAdapter(wordTokenizer);
    adapter.prepare(models);
    return adapter;
  }

  /**
   * Loads the encoders for the given models. Safe to call repeatedly.
   * @param models - The models whose encoders should be available
   */
  public prepare(models: readonly PricingModel[]): void {
    for (const model of models) {
      this.encoderFor(model.encoding);
    }
  }

  public tokenizeWords(text: string): string[] {
    return this.wordTokenizer.tokenize(text);
  }

  public encodeTokens(text: string, model: PricingModel): number[] {
    const encoder = this.encoderFor(model.encoding);
    try {
      return encoder.encode(text);
    } catch (error) {
      throw new EncodingError(model.encoding, error);
    }
  }

  private encoderFor(encoding: TiktokenEncoding): TokenEncoder {
    const cached = this.encoders.get(encoding);
    if (cached) {
      return cached;
    }

    let encoder: TokenEncoder;
    try {
      encoder = this.loadEncoder(encoding);
    } catch (error) {
      throw new EncodingError(encoding, error);
    }
    this.encoders.set(encoding, encoder);
    return encoder;
  }
}
