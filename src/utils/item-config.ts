import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { ItemConfig } from '../types/index.js';
import { ConfigError, errorMessage } from './errors.js';

const SCRAPE_FREQUENCIES = ['hourly', 'daily', 'weekly'] as const;

const itemSchema = z.object({
  url: z
    .string()
    .regex(/^https?:\/\//, { message: 'URL must start with http:// or https://' }),
  scrape_frequency: z
    .enum(SCRAPE_FREQUENCIES, {
      errorMap: () => ({ message: `scrape_frequency must be one of ${SCRAPE_FREQUENCIES.join(', ')}` }),
    })
    .default('daily'),
});

const itemsFileSchema = z.object({
  items: z.array(itemSchema),
});

function hasItemsKey(data: unknown): boolean {
  return typeof data === 'object' && data !== null && 'items' in data;
}

/**
 * Validate the YAML text of an items file
 */
export function parseItemsConfig(text: string, source = 'items file'): ItemConfig[] {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${source}: ${errorMessage(error)}`, { cause: error });
  }

  if (!hasItemsKey(data)) {
    throw new ConfigError(`Config must contain 'items' key: ${source}`);
  }

  const result = itemsFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`, { cause: result.error });
  }

  return result.data.items.map(item => ({
    url: item.url,
    scrapeFrequency: item.scrape_frequency,
  }));
}

export async function loadItemsConfig(path: string): Promise<ItemConfig[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Config file not found: ${path}`, { cause: error });
  }
  return parseItemsConfig(text, path);
}
