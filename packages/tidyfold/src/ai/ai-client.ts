/**
 * AI Client
 *
 * AIInvoker implementations for the supported providers, speaking each
 * provider's JSON-over-HTTP API through organizer-core's http helpers:
 *   - openai:    POST {baseUrl}/chat/completions
 *   - anthropic: POST {baseUrl}/messages
 *   - ollama:    POST {baseUrl}/api/generate (stream: false)
 *
 * Invokers never throw; failures come back as `{ success: false, error }`.
 * API keys are read from the environment variable configured per provider.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import {
    getErrorMessage,
    getLogger,
    httpGet,
    httpPostJson,
    LogCategory,
} from '@tidyfold/organizer-core';
import type {
    AIAvailabilityResult,
    AIInvoker,
    AIInvokerOptions,
    AIInvokerResult,
} from '@tidyfold/organizer-core';
import type { AIProvider } from '../types';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_BASE_URLS: Record<AIProvider, string> = {
    openai: 'https://api.openai.com/v1',
    anthropic: 'https://api.anthropic.com/v1',
    ollama: 'http://localhost:11434',
};

/** Environment variable holding each provider's API key; ollama needs none */
export const DEFAULT_API_KEY_ENV: Record<AIProvider, string | undefined> = {
    openai: 'OPENAI_API_KEY',
    anthropic: 'ANTHROPIC_API_KEY',
    ollama: undefined,
};

/** Default request timeout (2 minutes) */
export const DEFAULT_TIMEOUT_MS = 120_000;

/** Availability probes are short */
const PROBE_TIMEOUT_MS = 10_000;

const ANTHROPIC_VERSION = '2023-06-01';
const MAX_OUTPUT_TOKENS = 4096;
const TEMPERATURE = 0.2;

// ============================================================================
// Types
// ============================================================================

export interface AIClientSettings {
    /** Per-provider endpoint overrides */
    baseUrls?: Partial<Record<AIProvider, string>>;
    /** Per-provider API key variable overrides */
    apiKeyEnvs?: Partial<Record<AIProvider, string>>;
    /** Request timeout in ms */
    timeoutMs?: number;
    /** Environment to read keys from. Default: process.env */
    env?: NodeJS.ProcessEnv;
}

/**
 * Provider access used by the stages. Tests substitute a fake.
 */
export interface AIClient {
    /** Invoker for a provider; the model id is passed per call */
    invoker(provider: AIProvider): AIInvoker;
    checkAvailability(provider: AIProvider): Promise<AIAvailabilityResult>;
}

interface ProviderRequest {
    url: string;
    payload: unknown;
    headers: Record<string, string>;
}

// ============================================================================
// Client
// ============================================================================

/**
 * Create an AIClient over the providers' HTTP APIs.
 */
export function createAIClient(settings: AIClientSettings = {}): AIClient {
    return {
        invoker: provider => createAIInvoker(provider, settings),
        checkAvailability: provider => checkAvailability(provider, settings),
    };
}

/**
 * Create an AIInvoker for one provider.
 */
export function createAIInvoker(provider: AIProvider, settings: AIClientSettings = {}): AIInvoker {
    return async (prompt: string, invokerOptions?: AIInvokerOptions): Promise<AIInvokerResult> => {
        const model = invokerOptions?.model;
        if (!model) {
            return { success: false, error: `No model specified for provider ${provider}` };
        }

        const apiKey = resolveApiKey(provider, settings);
        if (apiKey.missing) {
            return { success: false, error: apiKey.missing };
        }

        const request = buildRequest(provider, model, prompt, settings, apiKey.value);
        const timeout = invokerOptions?.timeoutMs || settings.timeoutMs || DEFAULT_TIMEOUT_MS;

        try {
            getLogger().debug(LogCategory.AI, `${provider}/${model}: sending ${prompt.length} chars`);
            const body = await httpPostJson(request.url, request.payload, { headers: request.headers, timeout });
            const response = extractResponseText(provider, body);
            if (response === undefined) {
                return { success: false, error: `Unexpected ${provider} response shape` };
            }
            return { success: true, response };
        } catch (error) {
            return { success: false, error: `${provider} request failed: ${getErrorMessage(error)}` };
        }
    };
}

/**
 * Check whether a provider answers with the configured credentials.
 */
export async function checkAvailability(
    provider: AIProvider,
    settings: AIClientSettings = {}
): Promise<AIAvailabilityResult> {
    const apiKey = resolveApiKey(provider, settings);
    if (apiKey.missing) {
        return { available: false, reason: apiKey.missing };
    }

    const baseUrl = trimSlash(settings.baseUrls?.[provider] ?? DEFAULT_BASE_URLS[provider]);
    const url = provider === 'ollama' ? `${baseUrl}/api/tags` : `${baseUrl}/models`;

    try {
        const response = await httpGet(url, {
            headers: authHeaders(provider, apiKey.value),
            timeout: PROBE_TIMEOUT_MS,
        });
        if (response.statusCode >= 200 && response.statusCode < 300) {
            return { available: true };
        }
        return { available: false, reason: `${provider} answered HTTP ${response.statusCode}` };
    } catch (error) {
        return { available: false, reason: getErrorMessage(error) };
    }
}

// ============================================================================
// Request Building
// ============================================================================

/**
 * Build the provider-specific request for a single-turn prompt.
 */
export function buildRequest(
    provider: AIProvider,
    model: string,
    prompt: string,
    settings: AIClientSettings = {},
    apiKey?: string
): ProviderRequest {
    const baseUrl = trimSlash(settings.baseUrls?.[provider] ?? DEFAULT_BASE_URLS[provider]);
    const headers = authHeaders(provider, apiKey);

    switch (provider) {
        case 'openai':
            return {
                url: `${baseUrl}/chat/completions`,
                headers,
                payload: {
                    model,
                    messages: [{ role: 'user', content: prompt }],
                    temperature: TEMPERATURE,
                    max_tokens: MAX_OUTPUT_TOKENS,
                },
            };
        case 'anthropic':
            return {
                url: `${baseUrl}/messages`,
                headers,
                payload: {
                    model,
                    max_tokens: MAX_OUTPUT_TOKENS,
                    temperature: TEMPERATURE,
                    messages: [{ role: 'user', content: prompt }],
                },
            };
        case 'ollama':
            return {
                url: `${baseUrl}/api/generate`,
                headers,
                payload: {
                    model,
                    prompt,
                    stream: false,
                    options: { temperature: TEMPERATURE, num_predict: MAX_OUTPUT_TOKENS },
                },
            };
    }
}

/**
 * Pull the generated text out of a provider's reply body.
 *
 * @returns The text, or undefined when the body has an unexpected shape
 */
export function extractResponseText(provider: AIProvider, body: unknown): string | undefined {
    if (!isRecord(body)) {
        return undefined;
    }

    switch (provider) {
        case 'openai': {
            const choices = body.choices;
            if (!Array.isArray(choices) || choices.length === 0) { return undefined; }
            const first: unknown = choices[0];
            if (!isRecord(first) || !isRecord(first.message)) { return undefined; }
            return typeof first.message.content === 'string' ? first.message.content : undefined;
        }
        case 'anthropic': {
            const content = body.content;
            if (!Array.isArray(content)) { return undefined; }
            const parts: string[] = [];
            for (const block of content) {
                if (isRecord(block) && block.type === 'text' && typeof block.text === 'string') {
                    parts.push(block.text);
                }
            }
            return parts.length > 0 ? parts.join('') : undefined;
        }
        case 'ollama':
            return typeof body.response === 'string' ? body.response : undefined;
    }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Read a provider's API key from the environment.
 */
export function resolveApiKey(
    provider: AIProvider,
    settings: AIClientSettings = {}
): { value?: string; missing?: string } {
    const envName = settings.apiKeyEnvs?.[provider] ?? DEFAULT_API_KEY_ENV[provider];
    if (envName === undefined) {
        return {};
    }
    const value = (settings.env ?? process.env)[envName];
    if (!value) {
        return { missing: `Environment variable ${envName} is not set` };
    }
    return { value };
}

function authHeaders(provider: AIProvider, apiKey: string | undefined): Record<string, string> {
    if (apiKey === undefined) {
        return {};
    }
    switch (provider) {
        case 'openai':
            return { Authorization: `Bearer ${apiKey}` };
        case 'anthropic':
            return { 'x-api-key': apiKey, 'anthropic-version': ANTHROPIC_VERSION };
        case 'ollama':
            return {};
    }
}

function trimSlash(url: string): string {
    return url.replace(/\/+$/, '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
