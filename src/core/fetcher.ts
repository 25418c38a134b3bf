import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { FetchFn, RdfDocument, RdfMediaType, VocabularyReference } from '../types';
import { FetchError, UnsupportedFormatError, describeError } from './errors';
import { Logger, defaultLogger } from './logger';

/**
 * Accept header for content negotiation; RDF/XML is what every IVOA
 * vocabulary is guaranteed to have.
 */
export const ACCEPT_HEADER = [
  RdfMediaType.RdfXml,
  `${RdfMediaType.Turtle};q=0.9`,
  `${RdfMediaType.NTriples};q=0.8`,
].join(', ');

/**
 * The JSON term list the vocabulary repository serves next to the RDF
 */
export const DESISE_MEDIA_TYPE = 'application/x-desise+json';

const MEDIA_TYPE_ALIASES: Record<string, RdfMediaType> = {
  'application/rdf+xml': RdfMediaType.RdfXml,
  'text/turtle': RdfMediaType.Turtle,
  'application/x-turtle': RdfMediaType.Turtle,
  'application/n-triples': RdfMediaType.NTriples,
};

const EXTENSIONS: Record<string, RdfMediaType> = {
  '.rdf': RdfMediaType.RdfXml,
  '.xml': RdfMediaType.RdfXml,
  '.owl': RdfMediaType.RdfXml,
  '.ttl': RdfMediaType.Turtle,
  '.nt': RdfMediaType.NTriples,
};

export function isRemote(reference: VocabularyReference): boolean {
  return /^https?:\/\//i.test(reference);
}

/**
 * Map a Content-Type header value to a parseable media type
 */
export function toRdfMediaType(contentType: string | null): RdfMediaType | undefined {
  if (!contentType) return undefined;
  const essence = contentType.split(';')[0].trim().toLowerCase();
  return MEDIA_TYPE_ALIASES[essence];
}

export interface FetcherOptions {
  timeoutMs: number;
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * Retrieves vocabulary serializations over HTTP or from local files
 */
export class VocabularyFetcher {
  private timeoutMs: number;
  private doFetch: FetchFn;
  private logger: Logger;

  constructor(options: FetcherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.doFetch = options.fetch ?? fetch;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Retrieve a vocabulary, negotiating for any RDF serialization, or for
   * exactly `mediaType` when given.
   */
  async fetch(reference: VocabularyReference, mediaType?: RdfMediaType): Promise<RdfDocument> {
    if (!isRemote(reference)) {
      return this.readLocal(reference);
    }
    return this.fetchRemote(reference, mediaType);
  }

  /**
   * Retrieve the desise (term list as JSON) serialization of a remote
   * vocabulary and return its body.
   */
  async fetchDesise(reference: VocabularyReference): Promise<string> {
    this.logger.log(`Fetching ${reference} (${DESISE_MEDIA_TYPE})`);
    const { response, body } = await this.request(reference, DESISE_MEDIA_TYPE);

    const contentType = response.headers.get('content-type');
    const essence = contentType?.split(';')[0].trim().toLowerCase();
    if (essence !== DESISE_MEDIA_TYPE && essence !== 'application/json') {
      throw new UnsupportedFormatError(
        contentType ?? '',
        `${reference} has no ${DESISE_MEDIA_TYPE} serialization (received ${contentType || 'no content type'})`
      );
    }
    return body;
  }

  private async request(reference: VocabularyReference, accept: string): Promise<{ response: Response; body: string }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let body: string;
    try {
      response = await this.doFetch(reference, {
        headers: { accept },
        redirect: 'follow',
        signal: controller.signal,
      });
      body = await response.text();
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs} ms`
        : describeError(error);
      throw new FetchError(reference, `Cannot retrieve ${reference}: ${reason}`);
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const status = [response.status, response.statusText].filter(Boolean).join(' ');
      throw new FetchError(reference, `HTTP ${status} from ${reference}`, response.status);
    }
    return { response, body };
  }

  private async fetchRemote(reference: VocabularyReference, mediaType?: RdfMediaType): Promise<RdfDocument> {
    this.logger.log(`Fetching ${reference} (${mediaType ?? 'any RDF'})`);
    const { response, body } = await this.request(reference, mediaType ?? ACCEPT_HEADER);

    const contentType = response.headers.get('content-type');
    const received = toRdfMediaType(contentType);
    if (!received) {
      throw new UnsupportedFormatError(
        contentType ?? '',
        `${reference} did not negotiate to RDF (received ${contentType || 'no content type'})`
      );
    }
    if (mediaType && received !== mediaType) {
      throw new UnsupportedFormatError(
        received,
        `${reference} has no ${mediaType} serialization (received ${received})`
      );
    }

    return {
      reference,
      location: response.url || reference,
      mediaType: received,
      body,
    };
  }

  private async readLocal(reference: VocabularyReference): Promise<RdfDocument> {
    const extension = path.extname(reference).toLowerCase();
    const mediaType = EXTENSIONS[extension];
    if (!mediaType) {
      throw new UnsupportedFormatError(
        extension,
        `Cannot tell the RDF serialization of ${reference} from its extension`
      );
    }

    try {
      const body = await fs.promises.readFile(reference, 'utf-8');
      return { reference, location: pathToFileURL(path.resolve(reference)).href, mediaType, body };
    } catch (error) {
      throw new FetchError(reference, `Cannot read ${reference}: ${describeError(error)}`);
    }
  }
}
