// =============================================================================
// lib/gemini.ts — Gemini text-generation client.
//
// Wraps @google/generative-ai behind the small TextGenerator interface the
// engine depends on:
//   - Optional         — createGeminiGenerator() returns null without a key
//   - Plain text mode  — no JSON schema, the answer is returned verbatim
//   - Bounded budget   — temperature + maxOutputTokens come from config
//
// The engine enforces the timeout and maps every failure to a result kind, so
// this module lets SDK errors propagate untouched.
//
// Usage:
//   const generator = createGeminiGenerator(config.gemini);
//   const response  = await generator?.generate(prompt);
// =============================================================================

import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GeminiConfig } from '../config';
import { logger } from './logger';

const log = logger.child({ module: 'gemini' });

// ─── Response shape ───────────────────────────────────────────────────────────
// The subset of GenerateContentResponse the engine reads. The SDK's own
// response type is structurally assignable to it.

export interface GenerationPart {
    text?: string;
}

export interface GenerationCandidate {
    finishReason?: string;
    content?: {
        parts?: GenerationPart[];
    };
}

export interface GenerationResponse {
    candidates?: GenerationCandidate[];
    promptFeedback?: {
        blockReason?: string;
    };
}

export interface TextGenerator {
    readonly model: string;
    generate(prompt: string): Promise<GenerationResponse>;
}

// ─── Factory ──────────────────────────────────────────────────────────────────

export function createGeminiGenerator(config: GeminiConfig): TextGenerator | null {
    if (!config.apiKey) {
        log.warn('GEMINI_API_KEY is not set — AI analysis disabled');
        return null;
    }

    const genAI = new GoogleGenerativeAI(config.apiKey);
    const model = genAI.getGenerativeModel({
        model: config.model,
        generationConfig: {
            temperature:     config.temperature,
            maxOutputTokens: config.maxOutputTokens,
        },
    });

    log.info({ model: config.model }, 'Gemini client initialised');

    return {
        model: config.model,
        async generate(prompt: string): Promise<GenerationResponse> {
            const result = await model.generateContent(prompt);
            return result.response;
        },
    };
}
