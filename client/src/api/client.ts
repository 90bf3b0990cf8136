// =============================================================================
// api/client.ts — shared Axios instance for the analytics API.
//
// Every route answers with the same envelope:
//   { success: true,  data }
//   { success: false, error, message, statusCode }
//
// The response interceptor turns every failure into an ApiRequestError that
// carries the server's error code, so pages can tell "no data yet" (NO_DATA)
// apart from "database down" (STORE_UNAVAILABLE) without parsing strings.
// No auth: the dashboard is an internal tool and the API has no login.
// =============================================================================

import axios, { isAxiosError } from 'axios';
import type { AxiosInstance } from 'axios';

const API_BASE = import.meta.env.VITE_API_URL ?? '/api';

// ─── Envelope types ───────────────────────────────────────────────────────────

export interface ApiSuccess<T> {
    success: true;
    data: T;
}

export interface ApiErrorBody {
    success: false;
    error: string;
    message: string;
    statusCode: number;
}

function isApiErrorBody(value: unknown): value is ApiErrorBody {
    return typeof value === 'object' && value !== null
        && 'success' in value && value.success === false
        && 'error' in value && typeof value.error === 'string'
        && 'message' in value && typeof value.message === 'string';
}

// ─── Error type ───────────────────────────────────────────────────────────────

export class ApiRequestError extends Error {
    constructor(
        message: string,
        /** HTTP status, or null when the server was never reached. */
        public readonly status: number | null,
        /** Machine-readable code from the envelope, e.g. "NO_DATA". */
        public readonly code: string | null,
    ) {
        super(message);
        this.name = 'ApiRequestError';
    }
}

export function toApiRequestError(error: unknown): ApiRequestError {
    if (error instanceof ApiRequestError) return error;
    if (isAxiosError<unknown>(error)) {
        const response = error.response;
        if (!response) {
            return new ApiRequestError('Cannot reach the analytics API. Is the server running?', null, null);
        }
        if (isApiErrorBody(response.data)) {
            return new ApiRequestError(response.data.message, response.status, response.data.error);
        }
        return new ApiRequestError(`Request failed (${response.status})`, response.status, null);
    }
    return new ApiRequestError(error instanceof Error ? error.message : String(error), null, null);
}

// ─── Axios instance ───────────────────────────────────────────────────────────

export const client: AxiosInstance = axios.create({
    baseURL: API_BASE,
    timeout: 30_000,   // the AI route can take a while; the server bounds it at 15 s
    headers: {
        'Content-Type': 'application/json',
    },
});

client.interceptors.response.use(
    (response) => response,
    (error: unknown) => Promise.reject(toApiRequestError(error)),
);

// ─── Helpers ──────────────────────────────────────────────────────────────────

export async function getData<T>(path: string, params?: Record<string, string>): Promise<T> {
    const res = await client.get<ApiSuccess<T>>(path, { params });
    return res.data.data;
}

export async function postData<T>(path: string, body?: unknown): Promise<T> {
    const res = await client.post<ApiSuccess<T>>(path, body);
    return res.data.data;
}
