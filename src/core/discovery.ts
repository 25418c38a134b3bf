import { FetchFn, VocabularyReference } from '../types';
import { DiscoveryError, describeError } from './errors';
import { Logger, defaultLogger } from './logger';

/**
 * One section of the registry listing
 */
export interface ListingSection {
  name: string;
  values: Record<string, string>;
}

const SECTION_PATTERN = /^\[([^\]]+)\]\s*$/;
const ENTRY_PATTERN = /^([^:=\s][^:=]*?)\s*[:=]\s*(.*)$/;

/**
 * Parse the INI-style registry listing (vocabs.conf).
 *
 * Keys may be separated by ':' or '='; lines starting with '#' or ';' are
 * comments; indented lines continue the previous value.
 */
export function parseListing(text: string): ListingSection[] {
  const sections: ListingSection[] = [];
  let current: ListingSection | undefined;
  let lastKey: string | undefined;

  for (const rawLine of text.split(/\r?\n/)) {
    const trimmed = rawLine.trim();
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith(';')) {
      continue;
    }

    const section = SECTION_PATTERN.exec(trimmed);
    if (section) {
      current = { name: section[1].trim(), values: {} };
      sections.push(current);
      lastKey = undefined;
      continue;
    }

    if (!current) continue;

    if (/^\s/.test(rawLine) && lastKey !== undefined) {
      current.values[lastKey] = `${current.values[lastKey]}\n${trimmed}`;
      continue;
    }

    const entry = ENTRY_PATTERN.exec(trimmed);
    if (entry) {
      lastKey = entry[1].toLowerCase();
      current.values[lastKey] = entry[2].trim();
    }
  }

  return sections;
}

/**
 * Compute vocabulary URIs from a parsed listing
 */
export function vocabularyUris(sections: ListingSection[], vocabularyRoot: string): VocabularyReference[] {
  const seen = new Set<string>();
  const uris: VocabularyReference[] = [];

  for (const section of sections) {
    if (section.name === 'DEFAULT') continue;
    const uri = vocabularyRoot + (section.values.path || section.name);
    if (!seen.has(uri)) {
      seen.add(uri);
      uris.push(uri);
    }
  }

  return uris;
}

export interface DiscoveryOptions {
  registryUrl: string;
  vocabularyRoot: string;
  timeoutMs: number;
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * Returns the URIs of all vocabularies in the registry listing.
 *
 * There is no registry API for this; the listing file the vocabulary
 * repository is built from is the source of truth.
 */
export async function discoverVocabularies(options: DiscoveryOptions): Promise<VocabularyReference[]> {
  const doFetch = options.fetch ?? fetch;
  const logger = options.logger ?? defaultLogger;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  let text: string;
  try {
    const response = await doFetch(options.registryUrl, { signal: controller.signal });
    if (!response.ok) {
      throw new DiscoveryError(
        `Registry listing ${options.registryUrl} returned ${response.status} ${response.statusText}`
      );
    }
    text = await response.text();
  } catch (error) {
    if (error instanceof DiscoveryError) throw error;
    throw new DiscoveryError(
      `Cannot reach registry listing ${options.registryUrl}: ${describeError(error)}`
    );
  } finally {
    clearTimeout(timeout);
  }

  const uris = vocabularyUris(parseListing(text), options.vocabularyRoot);
  logger.log(`Discovered ${uris.length} vocabularies in ${options.registryUrl}`);
  return uris;
}
