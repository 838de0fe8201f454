import { Readable } from 'stream';
import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export type StubReply =
    | { status: number; data?: unknown; finalUrl?: string }
    | { networkError: string };

export type StubHandler = (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>;

/**
 * Axios instance whose adapter answers in process. Status handling mirrors the
 * built-in adapters: `validateStatus` decides whether a response rejects.
 */
export function stubClient(handler: StubHandler): { client: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
    const requests: InternalAxiosRequestConfig[] = [];
    const client = axios.create({
        adapter: async config => {
            requests.push(config);
            const reply = await handler(config);
            if ('networkError' in reply) {
                throw new AxiosError(reply.networkError, 'ECONNREFUSED', config);
            }

            const response: AxiosResponse = {
                data: config.responseType === 'stream' ? Readable.from([]) : reply.data ?? '',
                status: reply.status,
                statusText: String(reply.status),
                headers: {},
                config,
                request: { res: { responseUrl: reply.finalUrl ?? config.url } },
            };
            if (config.validateStatus && !config.validateStatus(reply.status)) {
                throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_RESPONSE', config, response.request, response);
            }
            return response;
        },
    });
    return { client, requests };
}
