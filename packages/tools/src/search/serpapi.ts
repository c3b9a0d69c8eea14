import got, { type Got } from 'got';
import { z } from 'zod';

/**
 * Google Shopping results through SerpApi.
 *
 * Requests go out on got with throwHttpErrors off, so 4xx/5xx responses come back
 * as results and are turned into SearchApiError here with SerpApi's own message.
 */

export class SearchApiError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'SearchApiError';
  }
}

const shoppingResultSchema = z.object({
  title: z.string().optional(),
  price: z.string().optional(),
  source: z.string().optional(),
  thumbnail: z.string().optional(),
  link: z.string().optional(),
  product_link: z.string().optional(),
});

export type ShoppingResult = z.infer<typeof shoppingResultSchema>;

const searchResponseSchema = z.object({
  shopping_results: z.array(shoppingResultSchema).optional(),
  error: z.string().optional(),
});

export interface ShoppingSearchClient {
  search(query: string, signal?: AbortSignal): Promise<ShoppingResult[]>;
}

export interface SerpApiOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Results requested per query; more than are rendered, since some lack links */
  num?: number;
}

export const SERPAPI_BASE_URL = 'https://serpapi.com';

export class SerpApiShoppingClient implements ShoppingSearchClient {
  private readonly client: Got;
  private readonly num: number;

  constructor(
    private readonly apiKey: string,
    options: SerpApiOptions = {},
  ) {
    this.num = options.num ?? 10;
    this.client = got.extend({
      prefixUrl: options.baseUrl ?? SERPAPI_BASE_URL,
      timeout: { request: options.timeoutMs ?? 30_000 },
      throwHttpErrors: false,
      retry: { limit: 0 },
    });
  }

  async search(query: string, signal?: AbortSignal): Promise<ShoppingResult[]> {
    const response = await this.client.get('search.json', {
      searchParams: {
        api_key: this.apiKey,
        engine: 'google_shopping',
        q: query,
        google_domain: 'google.com',
        gl: 'us',
        hl: 'en',
        num: this.num,
      },
      signal,
    });

    let body: unknown;
    try {
      body = JSON.parse(response.body);
    } catch {
      throw new SearchApiError(`SerpApi returned a non-JSON body (HTTP ${response.statusCode})`, response.statusCode);
    }

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SearchApiError(
        `Unexpected SerpApi response: ${parsed.error.issues[0]?.message ?? 'invalid payload'}`,
        response.statusCode,
      );
    }

    // A 200 with an `error` field is how SerpApi reports "no results"; treat it as empty.
    if (response.statusCode >= 400) {
      throw new SearchApiError(parsed.data.error ?? `HTTP ${response.statusCode}`, response.statusCode);
    }

    return parsed.data.shopping_results ?? [];
  }
}
