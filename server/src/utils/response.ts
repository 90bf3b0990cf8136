// =============================================================================
// Response helpers
//
// Centralise the response envelopes so controllers never inline them.
// Error format: { success, error, message, statusCode }
// =============================================================================

import type { Response } from 'express';
import type { ApiSuccess, ApiError } from '../types';

export function sendSuccess<T>(
    res: Response,
    data: T,
    statusCode = 200
): Response<ApiSuccess<T>> {
    return res.status(statusCode).json({ success: true, data });
}

export function sendError(
    res: Response,
    statusCode: number,
    error: string,
    message: string
): Response<ApiError> {
    return res.status(statusCode).json({ success: false, error, message, statusCode });
}
