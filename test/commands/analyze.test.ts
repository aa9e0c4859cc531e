import { expect } from 'chai';
import * as sinon from 'sinon';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { EncodingError, SourceNotFoundError } from '../../src/analysis/errors.js';
import { RegexWordTokenizer, TokenizerAdapter } from '../../src/analysis/tokenizer.js';
import { analyzeBook } from '../../src/commands/analyze.js';
import { ConfigBuilder } from '../../src/config/config-builder.js';
import { parseOverviewTotal } from '../../src/report/index.js';
import { stubTokenizer } from '../helpers/stubs.js';

describe('analyzeBook', () => {
  const config = ConfigBuilder.getDefaultConfig();
  let tempDir: string;
  let bookPath: string;

  beforeEach(async () => {
    sinon.stub(console, 'log');
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'analyze-command-'));
    bookPath = path.join(tempDir, 'novel.md');
    await fs.writeFile(bookPath, '# One\nthe cat sat\n# Two\nthe dog ran the cat\n');
  });

  afterEach(async () => {
    sinon.restore();
    await fs.remove(tempDir);
  });

  it('should write a Markdown report next to the source', async () => {
    const reportPath = await analyzeBook(bookPath, {}, config, { tokenizer: stubTokenizer() });

    expect(reportPath).to.equal(path.join(tempDir, 'novel_word_stats.md'));
    const report = await fs.readFile(reportPath, 'utf8');
    // "# One" and "# Two" add a "#" and a heading word to each chapter
    expect(parseOverviewTotal(report)).to.equal(12);
    expect(report).to.contain('| Chapter | Words | gpt-4o-mini Tokens | gpt-4o Tokens |\n');
    expect(report).to.contain('| 1 | 5 | 5 | 5 |\n');
  });

  it('should honor the format and output options', async () => {
    const output = path.join(tempDir, 'report.txt');
    const reportPath = await analyzeBook(bookPath, { format: 'text', output }, config, {
      tokenizer: stubTokenizer(),
    });

    expect(reportPath).to.equal(output);
    const lines = (await fs.readFile(output, 'utf8')).split('\n');
    expect(lines.slice(0, 4)).to.deep.equal([
      'Total Word Count: 12',
      '',
      'Chapter 1 Word Count: 5',
      'Chapter 2 Word Count: 7',
    ]);
  });

  it('should use the configured extractor override', async () => {
    const extractor = { extractChapters: sinon.stub().resolves(['a b c']) };
    const reportPath = await analyzeBook('virtual.book', { format: 'text', output: path.join(tempDir, 'v.txt') }, config, {
      tokenizer: stubTokenizer(),
      extractor,
    });

    const report = await fs.readFile(reportPath, 'utf8');
    expect(report.startsWith('Total Word Count: 3\n')).to.equal(true);
  });

  it('should reject a missing source without writing a report', async () => {
    const missing = path.join(tempDir, 'missing.md');
    try {
      await analyzeBook(missing, {}, config, { tokenizer: stubTokenizer() });
      expect.fail('analyzeBook should have rejected');
    } catch (error) {
      expect(error).to.be.instanceOf(SourceNotFoundError);
    }
    expect(await fs.pathExists(path.join(tempDir, 'missing_word_stats.md'))).to.equal(false);
  });

  it('should reject an encoder that fails to load without writing a report', async () => {
    const tokenizer = new TokenizerAdapter(new RegexWordTokenizer(), () => {
      throw new Error('ranks unavailable');
    });

    try {
      await analyzeBook(bookPath, {}, config, { tokenizer });
      expect.fail('analyzeBook should have rejected');
    } catch (error) {
      expect(error).to.be.instanceOf(EncodingError);
      expect(error).to.have.property('message', 'Encoding "o200k_base" failed: ranks unavailable');
    }
    expect(await fs.readdir(tempDir)).to.deep.equal(['novel.md']);
  });
});
