/**
 * Secret Message Service
 *
 * Fetches a published document, reads its coordinate table and renders
 * the hidden message.
 */

import type { Span } from '@opentelemetry/api';
import { DecodeError, ValidationError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { httpClient, type HttpClient } from '../http/http-client.js';
import { instrumentWithSpan } from '../trace/instrument.js';
import { parseCharacterTable, renderGrid, type GridCell } from './grid.js';

export class SecretMessageService {
  constructor(private readonly http: HttpClient = httpClient) {}

  /**
   * Download the document and return the cells of its character table
   *
   * @throws ValidationError for a missing or non-http URL
   * @throws DecodeError when the download fails or the table is missing or empty
   */
  readonly fetchCells = instrumentWithSpan(
    async (span: Span, url: string): Promise<GridCell[]> => {
      if (!url) {
        throw new ValidationError('URL is required', 'url');
      }
      if (!url.startsWith('http')) {
        throw new ValidationError(`Invalid URL: ${url}`, 'url');
      }
      span.setAttribute('url.full', url);

      const response = await this.http.create(url).get();
      span.setAttribute('http.response.status_code', response.statusCode);
      if (response.statusCode !== 200) {
        throw new DecodeError('Getting the document failed.', {
          statusCode: response.statusCode,
          body: response.text()
        });
      }

      const cells = parseCharacterTable(response.text());
      if (cells === null) {
        throw new DecodeError('No table found in the document.', { url });
      }
      if (cells.length === 0) {
        throw new DecodeError('No valid data found in the document.', { url });
      }
      span.setAttribute('decode.cells', cells.length);
      logger.debug('Parsed character table', { url, cells: cells.length });
      return cells;
    },
    { namespace: 'SecretMessageService', spanName: 'SecretMessageService.fetchCells' }
  );

  /**
   * The message as lines of text, top row first
   */
  async decode(url: string): Promise<string[]> {
    return renderGrid(await this.fetchCells(url));
  }
}
