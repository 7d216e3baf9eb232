import axios, { AxiosInstance, isAxiosError } from 'axios';
import { DecodeError, NetworkError } from '@/utils/errors';

export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface IHttpClientOptions {
  baseURL: string;
  timeout?: number;
}

export const createHttpClient = ({
  baseURL,
  timeout = 5000,
}: IHttpClientOptions): AxiosInstance =>
  axios.create({
    baseURL,
    timeout,
    headers: { Accept: 'application/json' },
    // keep the raw body so a malformed payload surfaces as a DecodeError
    responseType: 'text',
    transformResponse: (data: unknown) => data,
  });

/**
 * GET `url` and parse the body as JSON. Transport failures, timeouts and
 * non-2xx statuses become NetworkError; an unparseable body a DecodeError.
 */
export async function getJson(
  client: HttpClient,
  provider: string,
  url: string,
  params?: Record<string, string>,
): Promise<unknown> {
  let body: unknown;
  try {
    const response = await client.get<unknown>(url, { params });
    body = response.data;
  } catch (error) {
    if (isAxiosError(error)) {
      const status = error.response?.status;
      const reason = status ? `HTTP ${status}` : error.code ?? error.message;
      throw new NetworkError(provider, `${provider} request failed: ${reason}`, status, {
        cause: error,
      });
    }
    throw new NetworkError(provider, `${provider} request failed`, undefined, {
      cause: error,
    });
  }

  if (typeof body !== 'string') {
    return body;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (error) {
    throw new DecodeError(provider, `${provider} returned malformed JSON`, {
      cause: error,
    });
  }
}
