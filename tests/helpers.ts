import axios, {
  AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import type { Clock } from "../src/util/clock.js";

/** 2024-01-02T15:00:00Z, on a 5-minute boundary */
export const T0 = Date.UTC(2024, 0, 2, 15, 0, 0);

export class FakeClock implements Clock {
  readonly slept: number[] = [];

  constructor(public t = T0) {}

  now(): number {
    return this.t;
  }

  advance(ms: number): void {
    this.t += ms;
  }

  /** Sleep that moves the clock instead of waiting */
  sleep = async (ms: number): Promise<void> => {
    this.slept.push(ms);
    this.t += ms;
  };
}

export type StubReply = { status?: number; data: unknown } | Error;

/** axios instance answered in-process; every request config is recorded */
export function stubHttp(
  reply: (config: InternalAxiosRequestConfig) => StubReply
): { http: AxiosInstance; calls: InternalAxiosRequestConfig[] } {
  const calls: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: "https://news.test/api/v1",
    adapter: async (config) => {
      calls.push(config);
      const r = reply(config);
      if (r instanceof Error) throw r;
      const status = r.status ?? 200;
      const response: AxiosResponse = {
        data: r.data,
        status,
        statusText: String(status),
        headers: {},
        config,
      };
      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response
        );
      }
      return response;
    },
  });
  return { http, calls };
}

export function article(headline: string, summary = "", n = 1) {
  return {
    category: "company",
    datetime: 1704200000 + n,
    headline,
    id: n,
    image: "",
    related: "AAPL",
    source: "Example Wire",
    summary,
    url: `https://news.example/${n}`,
  };
}

/** `n` words that are not in the lexicon */
export const filler = (n: number) => Array(n).fill("today").join(" ");
