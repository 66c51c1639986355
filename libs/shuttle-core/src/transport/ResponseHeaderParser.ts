import { TransportError } from '../errors';
import { HeaderBag } from '../HeaderBag';
import { Response } from '../Response';
import { isValidStatusCode } from '../status';
import type { Stream } from '../stream/Stream';
import type { ProtocolVersion } from '../types';
import { splitHeaderLine } from './engine';

const STATUS_LINE = /^HTTP\/(\d(?:\.\d)?)\s+(\d{3})(?:\s+(.*))?$/;

function toProtocolVersion(token: string): ProtocolVersion {
  if (token === '1' || token === '1.0') return '1.0';
  if (token.startsWith('2')) return '2';
  return '1.1';
}

/**
 * Collects a response head from header-callback lines as they arrive.
 *
 * A status line starts a new head, so the head of an intermediate response
 * (a redirect hop, a 100 Continue) is discarded once the next one begins.
 */
export class ResponseHeaderParser {
  private version: ProtocolVersion = '1.1';
  private statusCode?: number;
  private reasonPhrase?: string;
  private headers: Array<[string, string]> = [];

  feed(line: string): void {
    const text = line.replace(/\r?\n$/, '');
    if (text.trim() === '') return;

    const status = STATUS_LINE.exec(text);
    if (status) {
      this.version = toProtocolVersion(status[1]);
      this.statusCode = Number(status[2]);
      this.reasonPhrase = status[3]?.trim() || undefined;
      this.headers = [];
      return;
    }

    const header = splitHeaderLine(text);
    if (!header || this.statusCode === undefined) return;
    this.headers.push(header);
  }

  getStatusCode(): number | undefined {
    return this.statusCode;
  }

  getHeaderCount(): number {
    return this.headers.length;
  }

  build(body: Stream): Response {
    if (this.statusCode === undefined) {
      throw new TransportError('No status line received from the HTTP engine');
    }
    if (!isValidStatusCode(this.statusCode)) {
      throw new TransportError(
        `HTTP engine reported an invalid status code: ${this.statusCode}`
      );
    }
    return new Response(
      this.statusCode,
      body,
      new HeaderBag(this.headers),
      this.version,
      this.reasonPhrase
    );
  }
}
