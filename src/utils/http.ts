import { ServiceConnectionError, describeError } from '../errors.js';
import { RequestThrottle } from './throttle.js';

export interface HttpResponse {
    ok: boolean;
    status: number;
    statusText: string;
    json(): Promise<unknown>;
}

export interface HttpRequestInit {
    signal: AbortSignal;
    headers: Record<string, string>;
}

/**
 * The subset of `fetch` the service clients use; tests inject a fake.
 */
export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface JsonRequestOptions {
    service: string;
    timeoutMs: number;
    throttle: RequestThrottle;
    fetchImpl: FetchLike;
}

/**
 * GET a JSON document. Every failure on the way (network, timeout, status, body)
 * surfaces as a ServiceConnectionError naming the service.
 */
export async function getJson(url: string, options: JsonRequestOptions): Promise<unknown> {
    const { service, timeoutMs, throttle, fetchImpl } = options;

    await throttle.acquire();

    let response: HttpResponse;
    try {
        response = await fetchImpl(url, {
            signal: AbortSignal.timeout(timeoutMs),
            headers: { Accept: 'application/json' },
        });
    } catch (error) {
        throw new ServiceConnectionError(service, `Unable to connect to ${service}: ${describeError(error)}`, { url });
    }

    if (!response.ok) {
        throw new ServiceConnectionError(
            service,
            `${service} request failed with ${response.status} ${response.statusText}`,
            { url, status: response.status }
        );
    }

    try {
        return await response.json();
    } catch (error) {
        throw new ServiceConnectionError(service, `${service} returned an unparseable response: ${describeError(error)}`, { url });
    }
}
