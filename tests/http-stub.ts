import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";

export interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
  headers: Record<string, unknown>;
}

export interface StubResponse {
  status: number;
  data: unknown;
}

/** Axios instance whose adapter answers from `handler` and records every request. */
export function stubHttp(handler: (request: RecordedRequest) => StubResponse): {
  http: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const http = axios.create({
    baseURL: "https://provider.test",
    headers: { "Content-Type": "application/json" },
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const request: RecordedRequest = {
        method: (config.method ?? "get").toUpperCase(),
        url: config.url ?? "",
        body: typeof config.data === "string" ? JSON.parse(config.data) : config.data,
        headers: config.headers.toJSON(),
      };
      requests.push(request);
      const stubbed = handler(request);
      const response: AxiosResponse = {
        data: stubbed.data,
        status: stubbed.status,
        statusText: String(stubbed.status),
        headers: {},
        config,
      };
      if (stubbed.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${stubbed.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response,
        );
      }
      return response;
    },
  });
  return { http, requests };
}
