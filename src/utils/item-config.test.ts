import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigError } from './errors.js';
import { loadItemsConfig, parseItemsConfig } from './item-config.js';

const HOODIE_URL = 'https://www.abercrombie.com/shop/us/p/essential-popover-hoodie-61791319';

describe('parseItemsConfig', () => {
  it('should read items and default the frequency to daily', () => {
    const yaml = [
      'items:',
      `  - url: ${HOODIE_URL}`,
      '  - url: https://www.abercrombie.com/shop/us/p/essential-tee-5551234',
      '    scrape_frequency: weekly',
    ].join('\n');

    expect(parseItemsConfig(yaml)).toEqual([
      { url: HOODIE_URL, scrapeFrequency: 'daily' },
      {
        url: 'https://www.abercrombie.com/shop/us/p/essential-tee-5551234',
        scrapeFrequency: 'weekly',
      },
    ]);
  });

  it('should accept an empty item list', () => {
    expect(parseItemsConfig('items: []')).toEqual([]);
  });

  it('should require the items key', () => {
    expect(() => parseItemsConfig('products: []', 'items.yaml')).toThrow(
      "Config must contain 'items' key: items.yaml"
    );
    expect(() => parseItemsConfig('')).toThrow(ConfigError);
  });

  it('should reject a url without an http scheme', () => {
    expect(() => parseItemsConfig('items:\n  - url: ftp://example.com/item', 'items.yaml')).toThrow(
      'Invalid configuration in items.yaml: items.0.url: URL must start with http:// or https://'
    );
  });

  it('should reject an unknown frequency', () => {
    const yaml = `items:\n  - url: ${HOODIE_URL}\n    scrape_frequency: monthly`;

    expect(() => parseItemsConfig(yaml, 'items.yaml')).toThrow(
      'Invalid configuration in items.yaml: items.0.scrape_frequency: scrape_frequency must be one of hourly, daily, weekly'
    );
  });

  it('should report invalid YAML as ConfigError', () => {
    expect(() => parseItemsConfig('items: [unclosed', 'items.yaml')).toThrow(ConfigError);
  });
});

describe('loadItemsConfig', () => {
  it('should load items from a file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'items-'));
    try {
      const path = join(dir, 'items.yaml');
      await writeFile(path, `items:\n  - url: ${HOODIE_URL}\n    scrape_frequency: hourly\n`);

      await expect(loadItemsConfig(path)).resolves.toEqual([
        { url: HOODIE_URL, scrapeFrequency: 'hourly' },
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should fail with ConfigError when the file is missing', async () => {
    await expect(loadItemsConfig('/nonexistent/items.yaml')).rejects.toThrow(
      'Config file not found: /nonexistent/items.yaml'
    );
  });
});
