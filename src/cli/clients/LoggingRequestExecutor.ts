import { HttpRequest, HttpResponse, RequestExecutor, requestUrl } from '../../core/engine/interfaces';

export type LineSink = (line: string) => void;

/**
 * Prints "<METHOD> <URL>" for every request before handing it on
 */
export class LoggingRequestExecutor implements RequestExecutor {
  constructor(
    private readonly next: RequestExecutor,
    private readonly print: LineSink = line => process.stdout.write(`${line}\n`)
  ) {}

  execute(request: HttpRequest): Promise<HttpResponse> {
    this.print(`${request.method} ${requestUrl(request)}`);
    return this.next.execute(request);
  }

  close(): void {
    this.next.close?.();
  }
}

/**
 * Compose a logging decorator around an executor
 */
export function withRequestLogging(next: RequestExecutor, print?: LineSink): RequestExecutor {
  return new LoggingRequestExecutor(next, print);
}
