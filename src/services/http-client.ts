import axios from "axios";

export interface HttpResponse {
  status: number;
  data: unknown;
}

export interface HttpRequestOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

/**
 * The slice of HTTP the monitor needs. Components depend on this interface so
 * tests can substitute an in-process fake.
 */
export interface HttpClient {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
  post(
    url: string,
    body: unknown,
    options: HttpRequestOptions
  ): Promise<HttpResponse>;
}

/**
 * axios-backed client. Non-2xx responses reject with an AxiosError.
 */
export class AxiosHttpClient implements HttpClient {
  constructor(private readonly userAgent: string) {}

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const response = await axios.get<unknown>(url, {
      timeout: options.timeoutMs,
      headers: { "User-Agent": this.userAgent, ...options.headers },
    });
    return { status: response.status, data: response.data };
  }

  async post(
    url: string,
    body: unknown,
    options: HttpRequestOptions
  ): Promise<HttpResponse> {
    const response = await axios.post<unknown>(url, body, {
      timeout: options.timeoutMs,
      headers: {
        "Content-Type": "application/json",
        "User-Agent": this.userAgent,
        ...options.headers,
      },
    });
    return { status: response.status, data: response.data };
  }
}
