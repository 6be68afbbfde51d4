/**
 * HTTP Client Factory
 * ===================
 *
 * Creates axios clients for outbound service calls, with an optional proxy.
 * Clients never retry: callers decide what a failed call means.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

export interface HttpClientOptions {
  baseURL: string;
  timeout: number;
  proxyUrl?: string;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const axiosConfig: AxiosRequestConfig = {
    baseURL: options.baseURL,
    timeout: options.timeout,
    headers: {
      'Content-Type': 'application/json',
      'User-Agent': 'model-promotion/1.0',
    },
  };

  if (options.proxyUrl) {
    const agent = new HttpsProxyAgent(options.proxyUrl);
    axiosConfig.httpsAgent = agent;
    axiosConfig.httpAgent = agent;
    axiosConfig.proxy = false; // use the agent, not axios' own proxy handling
  }

  return axios.create(axiosConfig);
}
