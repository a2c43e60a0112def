import { APP_CONFIG } from "@core/config/env";

// Set a delay function for retry logic
const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

// Custom Error Class for HTTP Errors
export class HttpError extends Error {
    status: number;

    constructor(message: string, status: number) {
        super(message);
        this.name = "HttpError";
        this.status = status;
    }
}

// The request never produced a response (DNS, refused connection, reset, ...)
export class TransportError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "TransportError";
    }
}

export type FetchTextOptions = {
    retries?: number;
    retryDelay?: number;
    init?: RequestInit;
};

/**
 * Fetches a URL (GET) and returns the response body as text.
 * Non-2xx responses raise `HttpError`, failures below HTTP raise `TransportError`.
 * @param url ex: `http://host/monitor?stopId=252`
 * @param options Fetch options (retries, retryDelay, init)
 */
export async function fetchText(url: string, options: FetchTextOptions = {}): Promise<string> {
    const { retries = 1, retryDelay = 1000, init } = options;
    const attempts = Math.max(1, retries);

    for (let i = 0; i < attempts; i++) {
        const isLast = i === attempts - 1;

        try {
            const headers = new Headers(init?.headers);
            if (!headers.has("Client")) headers.set("Client", APP_CONFIG.NAME);
            if (!headers.has("Accept")) headers.set("Accept", "application/json");

            const response = await fetch(url, { ...init, method: "GET", headers });

            if (!response.ok) {
                const errorText = await response.text().catch(() => "");
                throw new HttpError(
                    `[fetchText] Fetch failed for ${url} with status ${response.status}: ${errorText.slice(0, 200)}`,
                    response.status
                );
            }

            return await response.text();
        } catch (error) {
            if (isLast) {
                if (error instanceof HttpError) {
                    throw error;
                }
                const message = error instanceof Error ? error.message : String(error);
                throw new TransportError(`[fetchText] Fetch failed for ${url}: ${message}`, { cause: error });
            }

            if (APP_CONFIG.IS_DEV) {
                console.warn(`[fetchText] Attempt ${i + 1}/${attempts} failed for ${url}, retrying`);
            }
            await delay(retryDelay);
        }
    }

    throw new TransportError("[fetchText] Unhandled exception occurred.");
}
