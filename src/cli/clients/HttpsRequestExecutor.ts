/**
 * HTTPS request executor - verifies the server against a pinned CA pool
 * and server name, and buffers response bodies
 */

import https from 'https';
import { HttpRequest, HttpResponse, RequestExecutor } from '../../core/engine/interfaces';

export interface TlsSettings {
  /** PEM certificates trusted as roots; replace the system store */
  ca: string[];
  /** Name sent for SNI and checked against the server certificate */
  servername: string;
}

export class HttpsRequestExecutor implements RequestExecutor {
  private readonly agent: https.Agent;

  constructor(private readonly tls: TlsSettings) {
    this.agent = new https.Agent({ ca: tls.ca, servername: tls.servername });
  }

  execute(request: HttpRequest): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
      const req = https.request(this.buildRequestOptions(request), (res) => {
        const chunks: Buffer[] = [];

        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });

        res.on('end', () => {
          resolve({
            statusCode: res.statusCode ?? 0,
            body: Buffer.concat(chunks),
          });
        });

        res.on('error', reject);
      });

      req.on('error', reject);

      if (request.body) {
        req.write(request.body);
      }
      req.end();
    });
  }

  /**
   * Options passed to https.request for a given request
   */
  buildRequestOptions(request: HttpRequest): https.RequestOptions {
    const headers: Record<string, string | number> = { ...request.headers };
    if (request.body) {
      headers['Content-Length'] = request.body.length;
    }

    const origin = new URL(request.origin);

    return {
      protocol: 'https:',
      hostname: origin.hostname,
      port: origin.port || 443,
      path: request.path,
      method: request.method,
      headers,
      agent: this.agent,
      ca: this.tls.ca,
      servername: this.tls.servername,
      rejectUnauthorized: true,
    };
  }

  close(): void {
    this.agent.destroy();
  }
}
