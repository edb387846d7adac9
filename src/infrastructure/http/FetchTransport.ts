export interface TransportRequest {
  url: string;
  method: 'POST';
  headers: Record<string, string>;
  body: string;
}

export interface TransportResponse {
  status: number;
  body: unknown;
}

export type Transport = (input: TransportRequest) => Promise<TransportResponse>;

/** POST-only JSON transport; a body that is not JSON comes back as `{}`. */
export const createFetchTransport =
  (timeoutMs = 10_000): Transport =>
  async (input) => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(input.url, {
        method: input.method,
        headers: input.headers,
        body: input.body,
        signal: controller.signal,
      });

      const body: unknown = await response.json().catch(() => ({}));
      return { status: response.status, body };
    } finally {
      clearTimeout(timeout);
    }
  };
