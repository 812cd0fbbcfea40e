import {
  HttpClient,
  HttpRequestOptions,
  HttpResponse,
} from "../../src/services/http-client";

type Reply = HttpResponse | Error;

export interface RecordedRequest {
  method: "GET" | "POST";
  url: string;
  body: unknown;
  options: HttpRequestOptions;
}

/**
 * In-process HttpClient: replies are queued per URL, and every request is
 * recorded. A URL with no reply queued fails like a refused connection.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  private readonly replies = new Map<string, Reply[]>();

  reply(url: string, data: unknown, status = 200): this {
    return this.enqueue(url, { status, data });
  }

  fail(url: string, message = "connect ECONNREFUSED"): this {
    return this.enqueue(url, new Error(message));
  }

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    this.requests.push({ method: "GET", url, body: undefined, options });
    return this.next(url);
  }

  async post(
    url: string,
    body: unknown,
    options: HttpRequestOptions
  ): Promise<HttpResponse> {
    this.requests.push({ method: "POST", url, body, options });
    return this.next(url);
  }

  urls(): string[] {
    return this.requests.map((request) => request.url);
  }

  private enqueue(url: string, reply: Reply): this {
    const queue = this.replies.get(url) ?? [];
    queue.push(reply);
    this.replies.set(url, queue);
    return this;
  }

  /** The last queued reply for a URL is reused once the queue drains */
  private next(url: string): HttpResponse {
    const queue = this.replies.get(url);
    if (!queue || queue.length === 0) {
      throw new Error(`connect ECONNREFUSED (${url})`);
    }
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) {
      throw new Error(`connect ECONNREFUSED (${url})`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
