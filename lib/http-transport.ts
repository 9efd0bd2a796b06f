import axios from 'axios';

export interface SearchHttpResponse {
  status: number;
  body: string;
}

export interface SearchTransport {
  post(url: string, headers: Record<string, string>, body: unknown): Promise<SearchHttpResponse>;
}

/**
 * POSTs JSON with axios and hands back the status and the untouched body text.
 * Every HTTP status resolves; only network failures reject.
 */
export const axiosTransport: SearchTransport = {
  post: async (url, headers, body) => {
    const res = await axios.post<string>(url, body, {
      headers,
      responseType: 'text',
      transformResponse: (data: string) => data,
      validateStatus: () => true,
    });
    return { status: res.status, body: typeof res.data === 'string' ? res.data : '' };
  },
};
