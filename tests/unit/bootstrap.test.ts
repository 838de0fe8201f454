import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config';
import { PassThroughClassifier, LlmClassifier } from '../../src/modules/classifier';
import { CsvCompanySource, DirectoryPageSource } from '../../src/modules/ingestor';
import { CsvRowSink, PreviewSink } from '../../src/modules/sink';
import { createClassifier, createSource, prepareRun } from '../../src/pipeline/bootstrap';
import { ConfigurationError, ProviderUnavailableError } from '../../src/utils/errors';

const DEFAULT_YAML = path.resolve(__dirname, '../../src/config/default.yaml');
const ENV = {
  ENABLE_GPT: '0',
  SEARCH_PROVIDER: 'serper',
  SERPER_API_KEY: 'test-key',
  SEARCH_CACHE_PATH: path.join(__dirname, 'unused-cache.json'),
};

describe('prepareRun', () => {
  it('caps the run at the smallest configured limit', () => {
    const config = loadConfig({ env: { ...ENV, MAX_COMPANIES: '40' }, configPath: DEFAULT_YAML });

    expect(prepareRun(config, 'sample_csv').maxItems).toBe(40);
    expect(prepareRun(config, 'sample_csv', { maxItems: 3 }).maxItems).toBe(3);
  });

  it('falls back to the source listing limit', () => {
    const config = loadConfig({ env: ENV, configPath: DEFAULT_YAML });
    expect(prepareRun(config, 'sample_csv').maxItems).toBe(150);
  });

  it('previews unless an output file is given', () => {
    const config = loadConfig({ env: ENV, configPath: DEFAULT_YAML });

    expect(prepareRun(config, 'sample_csv').sink).toBeInstanceOf(PreviewSink);
    expect(prepareRun(config, 'sample_csv', { outputCsv: path.join(__dirname, 'never-written.csv') }).sink)
      .toBeInstanceOf(CsvRowSink);
  });

  it('rejects an unknown source key', () => {
    const config = loadConfig({ env: ENV, configPath: DEFAULT_YAML });
    expect(() => prepareRun(config, 'nope')).toThrow(ConfigurationError);
  });

  it('fails fast without provider credentials', () => {
    const config = loadConfig({ env: { ENABLE_GPT: '0' }, configPath: DEFAULT_YAML });
    expect(() => prepareRun(config, 'sample_csv')).toThrow(ProviderUnavailableError);
  });
});

describe('createSource', () => {
  it('builds the source for its type', () => {
    expect(createSource('a', { type: 'csv', path: 'data/companies.csv', blacklist_domains: [] }))
      .toBeInstanceOf(CsvCompanySource);
    expect(createSource('b', { type: 'directory_page', url: 'https://directory.test', fallback_selectors: [], blacklist_domains: [] }))
      .toBeInstanceOf(DirectoryPageSource);
  });
});

describe('createClassifier', () => {
  it('uses the LLM only when enabled', () => {
    const off = loadConfig({ env: ENV, configPath: DEFAULT_YAML });
    const on = loadConfig({ env: { ...ENV, ENABLE_GPT: '1', OPENAI_API_KEY: 'test-secret' }, configPath: DEFAULT_YAML });

    expect(createClassifier(off)).toBeInstanceOf(PassThroughClassifier);
    expect(createClassifier(on)).toBeInstanceOf(LlmClassifier);
  });
});
